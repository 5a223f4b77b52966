import { CertifiedAggregateStore } from '../aggregate/CertifiedAggregateStore.js';
import type { CertificationHost } from '../certify/CertificationHost.js';
import { CertificationError } from '../certify/CertificationHost.js';
import type { FetchPipeline } from '../fetch/FetchPipeline.js';
import { RefreshController } from '../refresh/RefreshController.js';
import type { StateStore } from '../store/StateStore.js';
import { correlateTopology, MissingGenerationPolicy } from '../topology/correlate.js';
import type { SubnetFilter } from '../topology/filters.js';
import { buildSubnetsFromUpload } from '../topology/upload.js';
import { ErrorCode } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { CallerId, Nanos, ServiceId, SubnetId } from '../types/ids.js';
import type { RefreshStatus } from '../types/refresh.js';
import { RefreshPhase } from '../types/refresh.js';
import type { Result } from '../types/result.js';
import { err, ok } from '../types/result.js';
import type { CertifiedSnapshot, DataFreshness, HealthStatus, NetworkStats } from '../types/stats.js';
import { HealthState } from '../types/stats.js';
import type { SubnetRecord, UploadedNodeRecord } from '../types/topology.js';
import { toHex } from '../utils/crypto.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { nanosToMinutes, nowNanos } from '../utils/time.js';

export interface SubnetCensusServiceOptions {
  serviceId: ServiceId;
  host: CertificationHost;
  pipeline: FetchPipeline;
  stateStore: StateStore;
  cooldownNs: Nanos;
  staleAfterMinutes?: number;
  missingGeneration?: MissingGenerationPolicy;
  realSubnetFilter?: SubnetFilter;
  now?: () => Nanos;
  logger?: Logger;
}

export interface RefreshStatusWithHistory extends RefreshStatus {
  history: Map<CallerId, Nanos>;
}

const DEFAULT_STALE_AFTER_MINUTES = 60;

// start() must run first: it restores state and re-registers the fingerprint.
export class SubnetCensusService {
  readonly serviceId: ServiceId;
  private readonly host: CertificationHost;
  private readonly pipeline: FetchPipeline;
  private readonly stateStore: StateStore;
  private readonly store: CertifiedAggregateStore;
  private readonly refresh: RefreshController;
  private readonly staleAfterMinutes: number;
  private readonly missingGeneration: MissingGenerationPolicy;
  private readonly nowFn: () => Nanos;
  private readonly logger: Logger;
  private started = false;

  constructor(options: SubnetCensusServiceOptions) {
    this.serviceId = options.serviceId;
    this.host = options.host;
    this.pipeline = options.pipeline;
    this.stateStore = options.stateStore;
    this.staleAfterMinutes = options.staleAfterMinutes ?? DEFAULT_STALE_AFTER_MINUTES;
    this.missingGeneration = options.missingGeneration ?? MissingGenerationPolicy.GEN1;
    this.nowFn = options.now ?? nowNanos;
    this.logger = options.logger ?? createLogger('subnet-census');
    this.store = new CertifiedAggregateStore({
      host: options.host,
      realSubnetFilter: options.realSubnetFilter,
      now: this.nowFn,
      logger: this.logger.child({ component: 'aggregate-store' })
    });
    this.refresh = new RefreshController({
      cooldownNs: options.cooldownNs,
      now: this.nowFn,
      logger: this.logger.child({ component: 'refresh' })
    });
  }

  // --- lifecycle -----------------------------------------------------------

  start(): Result<string> {
    const persisted = this.stateStore.load();
    const outcome = this.certifying('restored state', () => {
      if (!persisted) {
        this.store.recertify();
        return 'Started with empty state';
      }
      const restored = this.store.restore(persisted.subnets.values(), persisted.lastUpdated);
      this.refresh.restore(persisted.refresh);
      if (!sameStats(restored.stats, persisted.stats)) {
        this.logger.warn({ persisted: describeStats(persisted.stats) }, 'persisted stats differ from recomputed stats');
      }
      return `Restored ${persisted.subnets.size} subnets`;
    });
    if (outcome.ok) {
      this.started = true;
      this.logger.info({ fingerprint: toHex(this.store.fingerprint()) }, outcome.value);
    }
    return outcome;
  }

  persist(): void {
    this.ensureStarted();
    this.stateStore.save({
      subnets: this.store.exportSubnets(),
      lastUpdated: this.store.lastUpdated(),
      stats: this.store.realStats(),
      refresh: this.refresh.snapshot()
    });
  }

  shutdown(): void {
    if (!this.started) return;
    this.persist();
    this.started = false;
  }

  // --- mutations -----------------------------------------------------------

  async refreshFromSources(caller: CallerId): Promise<Result<string>> {
    this.ensureStarted();
    return this.refresh.run(caller, async () => {
      const fetched = await this.pipeline.run();
      if (!fetched.ok) return fetched;
      const correlated = correlateTopology(fetched.value.topology, fetched.value.generations, {
        fallbackGeneration: this.missingGeneration
      });
      if (!correlated.ok) return correlated;
      if (correlated.value.fallbackCount > 0) {
        this.logger.info(
          { count: correlated.value.fallbackCount, fallback: this.missingGeneration },
          'nodes missing from hardware data took the fallback generation'
        );
      }
      const { subnets, totals } = correlated.value;
      return this.certifying('refreshed data', () => {
        this.store.ingest(subnets, this.nowFn());
        return `Refreshed ${subnets.length} subnets with ${totals.nodeCount} nodes`;
      });
    });
  }

  loadNodesFromFile(records: readonly UploadedNodeRecord[]): Result<string> {
    this.ensureStarted();
    const busy = this.busyError('upload nodes');
    if (busy) return err(busy);
    const { subnets, droppedCount } = buildSubnetsFromUpload(records);
    const nodeCount = subnets.reduce((sum, subnet) => sum + subnet.nodeCount, 0);
    return this.certifying('uploaded data', () => {
      this.store.ingest(subnets, this.nowFn());
      const skipped = droppedCount > 0 ? ` (${droppedCount} without subnet skipped)` : '';
      return `Loaded ${nodeCount} nodes across ${subnets.length} subnets${skipped}`;
    });
  }

  clearCache(): Result<string> {
    this.ensureStarted();
    const busy = this.busyError('clear data');
    if (busy) return err(busy);
    return this.certifying('cleared data', () => {
      this.store.clear();
      return 'Cache cleared successfully';
    });
  }

  recertify(): Result<Uint8Array> {
    this.ensureStarted();
    return this.certifying('current data', () => this.store.recertify());
  }

  // --- queries -------------------------------------------------------------

  getSubnets(): SubnetRecord[] {
    this.ensureStarted();
    return this.store.subnets();
  }

  getSubnetById(id: SubnetId): Result<SubnetRecord> {
    this.ensureStarted();
    const subnet = this.store.subnet(id);
    return subnet ? ok(subnet) : err(serviceError(ErrorCode.NOT_FOUND, `Subnet ${id} not found`));
  }

  getNetworkStats(): NetworkStats {
    this.ensureStarted();
    return this.store.realStats();
  }

  getAllNodesStats(): NetworkStats {
    this.ensureStarted();
    return this.store.allNodesStats();
  }

  getNetworkStatsCertified(): CertifiedSnapshot {
    this.ensureStarted();
    return this.store.read();
  }

  getCertifiedDataHash(): Uint8Array {
    this.ensureStarted();
    return this.store.fingerprint();
  }

  getCertificate(): Uint8Array | undefined {
    this.ensureStarted();
    return this.host.currentCertificate();
  }

  getLastUpdateTime(): Nanos {
    this.ensureStarted();
    return this.store.lastUpdated();
  }

  getRefreshStatus(): RefreshStatusWithHistory {
    this.ensureStarted();
    return { ...this.refresh.status(this.nowFn()), history: this.refresh.history() };
  }

  healthCheck(): HealthStatus {
    this.ensureStarted();
    const budget = this.pipeline.budgetStatus();
    const all = this.store.allNodesStats();
    return {
      status: budget.available >= budget.floor ? HealthState.HEALTHY : HealthState.DEGRADED,
      subnetsCount: this.store.subnetCount(),
      nodesCount: all.totalNodes,
      availableBudget: budget.available,
      hasCertificate: this.host.currentCertificate() !== undefined,
      lastUpdated: this.store.lastUpdated(),
      refreshPhase: this.refresh.phase(this.nowFn())
    };
  }

  getDataFreshness(): DataFreshness {
    this.ensureStarted();
    const now = this.nowFn();
    const lastUpdated = this.store.lastUpdated();
    const ageInMinutes = lastUpdated === 0n ? undefined : nanosToMinutes(now - lastUpdated);
    const freshness: DataFreshness = {
      lastUpdated,
      staleAfterMinutes: this.staleAfterMinutes,
      isStale: ageInMinutes === undefined || ageInMinutes >= this.staleAfterMinutes,
      canRefresh: this.refresh.phase(now) === RefreshPhase.IDLE,
      cooldownRemainingNs: this.refresh.cooldownRemaining(now),
      nextRefreshTime: this.refresh.nextRefreshTime()
    };
    if (ageInMinutes !== undefined) freshness.ageInMinutes = ageInMinutes;
    return freshness;
  }

  // --- internals -----------------------------------------------------------

  private ensureStarted(): void {
    if (!this.started) {
      throw new Error('Service not started. Call start() first.');
    }
  }

  private busyError(action: string) {
    if (!this.refresh.isInFlight()) return undefined;
    return serviceError(ErrorCode.BUSY, `Cannot ${action} while a refresh is in progress`);
  }

  private certifying<T>(what: string, action: () => T): Result<T> {
    try {
      return ok(action());
    } catch (e) {
      if (e instanceof CertificationError) {
        this.logger.error({ code: e.code }, `certification failed: ${e.message}`);
        return err(serviceError(ErrorCode.CERTIFICATION, `Failed to certify ${what}: ${e.message}`));
      }
      throw e;
    }
  }
}

function sameStats(a: NetworkStats, b: NetworkStats): boolean {
  return (
    a.totalSubnets === b.totalSubnets &&
    a.totalNodes === b.totalNodes &&
    a.gen1Nodes === b.gen1Nodes &&
    a.gen2Nodes === b.gen2Nodes &&
    a.unknownNodes === b.unknownNodes &&
    a.lastUpdated === b.lastUpdated
  );
}

function describeStats(stats: NetworkStats): Record<string, number | string> {
  return { ...stats, lastUpdated: stats.lastUpdated.toString() };
}
