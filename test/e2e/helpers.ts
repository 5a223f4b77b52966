import { parseServiceConfig } from '../../src/config/config.js';
import { LocalCertificationHost } from '../../src/certify/LocalCertificationHost.js';
import type { CertificationHost } from '../../src/certify/CertificationHost.js';
import { StaticBudget } from '../../src/fetch/budget.js';
import { FakeTransport, HARDWARE_URL, jsonResponse, TOPOLOGY_URL } from '../../src/fetch/testHelpers.js';
import type { HttpRequest, HttpResponse } from '../../src/fetch/types.js';
import { createSubnetCensusService } from '../../src/service/createService.js';
import { MemoryStateStore } from '../../src/store/memory/MemoryStateStore.js';
import type { StateStore } from '../../src/store/StateStore.js';
import type { Nanos } from '../../src/types/ids.js';

export const SERVICE_ID = 'census-test';
export const SECRET = 'test-secret';
export const T0: Nanos = 1_700_000_000_000_000_000n;
export const SECOND: Nanos = 1_000_000_000n;
export const MINUTE: Nanos = 60n * SECOND;
export const COOLDOWN: Nanos = 300n * SECOND;
export const BUDGET_FLOOR = 500n;

// Transport that can hold every request until released, to observe a refresh mid-flight.
export class GatedTransport extends FakeTransport {
  private gate?: Promise<void>;
  private openGate?: () => void;

  hold(): void {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = undefined;
  }

  async get(request: HttpRequest): Promise<HttpResponse> {
    if (this.gate) await this.gate;
    return super.get(request);
  }
}

// One subnet whose nodes carry one reward type each.
export function topologyDoc(extra: Record<string, unknown> = {}) {
  return {
    subnets: [{ subnet_id: 'sn-1', subnet_type: 'application', nodes: ['n1', 'n2'] }],
    ...extra
  };
}

export function hardwareDoc(labels: Record<string, string> = { n1: 'Type1', n2: 'Type3' }) {
  return { nodes: Object.entries(labels).map(([nodeId, label]) => ({ node_id: nodeId, node_reward_type: label })) };
}

export function routeDocuments(transport: FakeTransport, topology: unknown = topologyDoc(), hardware: unknown = hardwareDoc()) {
  transport.route(TOPOLOGY_URL, jsonResponse(topology)).route(HARDWARE_URL, jsonResponse(hardware));
}

export interface HarnessOptions {
  transport?: FakeTransport;
  stateStore?: StateStore;
  host?: CertificationHost;
  config?: Record<string, unknown>;
}

// Builds a service from a validated config with every outside dependency replaced in process.
export function makeHarness(options: HarnessOptions = {}) {
  const clock = { now: T0 };
  const transport = options.transport ?? new FakeTransport();
  const inspector = new LocalCertificationHost({ serviceId: SERVICE_ID, secret: SECRET });
  const host = options.host ?? inspector;
  const stateStore = options.stateStore ?? new MemoryStateStore();
  const budget = new StaticBudget(1_000_000n);
  const config = parseServiceConfig({
    serviceId: SERVICE_ID,
    endpoints: { topologyUrl: TOPOLOGY_URL, hardwareUrl: HARDWARE_URL },
    fetch: { budgetFloor: BUDGET_FLOOR.toString() },
    certification: { secret: SECRET },
    ...options.config
  });
  const service = createSubnetCensusService(config, {
    transport,
    host,
    stateStore,
    budget,
    now: () => clock.now
  });
  return { service, clock, transport, host, inspector, stateStore, budget };
}
