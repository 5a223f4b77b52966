import type { JsonValue } from '../json/document.js';
import { parseDocument } from '../json/document.js';
import { ErrorCode, Generation } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { NodeId } from '../types/ids.js';
import type { Result } from '../types/result.js';
import { err, ok } from '../types/result.js';
import type { TopologyDataset } from '../types/topology.js';
import { decodeUtf8Strict } from '../utils/utf8.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { checkBudget, unlimitedBudget } from './budget.js';
import type { HardwareLabelField } from './documents.js';
import { parseHardwareDocument, parseTopologyDocument } from './documents.js';
import { sanitizeResponse } from './transform.js';
import type { HttpResponse, HttpTransport, ResourceBudget } from './types.js';

export const DEFAULT_MAX_RESPONSE_BYTES = 2_000_000;
export const DEFAULT_BUDGET_FLOOR = 0n;

export interface FetchPipelineOptions {
  topologyUrl: string;
  hardwareUrl: string;
  transport: HttpTransport;
  budget?: ResourceBudget;
  budgetFloor?: bigint;
  maxResponseBytes?: number;
  hardwareLabels?: readonly HardwareLabelField[];
  logger?: Logger;
}

export interface FetchedDatasets {
  topology: TopologyDataset;
  generations: Map<NodeId, Generation>;
}

export class FetchPipeline {
  private readonly transport: HttpTransport;
  private readonly budget: ResourceBudget;
  private readonly budgetFloor: bigint;
  private readonly maxResponseBytes: number;
  private readonly logger: Logger;

  constructor(private readonly options: FetchPipelineOptions) {
    this.transport = options.transport;
    this.budget = options.budget ?? unlimitedBudget;
    this.budgetFloor = options.budgetFloor ?? DEFAULT_BUDGET_FLOOR;
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
    this.logger = options.logger ?? createLogger('fetch-pipeline');
  }

  budgetStatus(): { available: bigint; floor: bigint } {
    return { available: this.budget.available(), floor: this.budgetFloor };
  }

  async run(): Promise<Result<FetchedDatasets>> {
    const topology = await this.fetchTopology();
    if (!topology.ok) return topology;
    const generations = await this.fetchHardware();
    if (!generations.ok) return generations;
    return ok({ topology: topology.value, generations: generations.value });
  }

  async fetchTopology(): Promise<Result<TopologyDataset>> {
    const doc = await this.fetchDocument(this.options.topologyUrl, 'topology');
    if (!doc.ok) return doc;
    const topology = parseTopologyDocument(doc.value);
    if (topology.ok) {
      this.logger.debug({ subnets: topology.value.subnets.length }, 'topology parsed');
    }
    return topology;
  }

  async fetchHardware(): Promise<Result<Map<NodeId, Generation>>> {
    const doc = await this.fetchDocument(this.options.hardwareUrl, 'hardware');
    if (!doc.ok) return doc;
    const generations = parseHardwareDocument(doc.value, this.options.hardwareLabels);
    if (generations.ok) {
      this.logger.debug({ nodes: generations.value.size }, 'hardware parsed');
    }
    return generations;
  }

  private async fetchDocument(url: string, label: string): Promise<Result<JsonValue>> {
    const budgetError = checkBudget(this.budget, this.budgetFloor, `fetch ${label} data`);
    if (budgetError) {
      this.logger.warn({ url, code: budgetError.code }, budgetError.message);
      return err(budgetError);
    }

    let raw: HttpResponse;
    try {
      raw = await this.transport.get({ url, maxResponseBytes: this.maxResponseBytes });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.warn({ url }, `${label} request failed`);
      return err(serviceError(ErrorCode.TRANSPORT, `Failed to fetch ${label} data: ${message}`));
    }

    const response = sanitizeResponse(raw);
    if (response.status !== 200) {
      this.logger.warn({ url, status: response.status }, `${label} request returned non-success status`);
      return err(
        serviceError(ErrorCode.HTTP_STATUS, `Failed to fetch ${label} data: HTTP ${response.status}`, {
          status: response.status
        })
      );
    }

    const text = decodeUtf8Strict(response.body);
    if (text === undefined) {
      return err(serviceError(ErrorCode.DECODE, `Failed to decode ${label} response body as UTF-8`));
    }
    return parseDocument(text, `${label} response`);
  }
}
