import type { CertificationHost } from '../certify/CertificationHost.js';
import { statsFingerprint } from '../certify/canonical.js';
import type { Nanos, SubnetId } from '../types/ids.js';
import type { CertifiedSnapshot, NetworkStats } from '../types/stats.js';
import type { SubnetRecord } from '../types/topology.js';
import type { SubnetFilter } from '../topology/filters.js';
import { defaultRealSubnetFilter } from '../topology/filters.js';
import { recountSubnet } from '../topology/recount.js';
import { toHex } from '../utils/crypto.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { nowNanos } from '../utils/time.js';
import { computeNetworkStats } from './stats.js';

// Zero timestamp: every clear certifies the same fingerprint.
const CLEARED_AT: Nanos = 0n;

function indexRecords(records: Iterable<SubnetRecord>): Map<SubnetId, SubnetRecord> {
  const subnets = new Map<SubnetId, SubnetRecord>();
  for (const record of records) {
    subnets.set(record.id, recountSubnet(structuredClone(record)));
  }
  return subnets;
}

export interface CertifiedAggregateStoreOptions {
  host: CertificationHost;
  realSubnetFilter?: SubnetFilter;
  now?: () => Nanos;
  logger?: Logger;
}

interface CommittedState {
  subnets: ReadonlyMap<SubnetId, SubnetRecord>;
  realStats: Readonly<NetworkStats>;
  allStats: Readonly<NetworkStats>;
  fingerprint: Uint8Array;
}

/**
 * Every mutation builds a complete new state, registers its fingerprint with the
 * host and only then swaps it in; readers see stats and fingerprint from one commit.
 */
export class CertifiedAggregateStore {
  private readonly host: CertificationHost;
  private readonly realSubnetFilter: SubnetFilter;
  private readonly nowFn: () => Nanos;
  private readonly logger: Logger;
  private state: CommittedState;

  constructor(options: CertifiedAggregateStoreOptions) {
    this.host = options.host;
    this.realSubnetFilter = options.realSubnetFilter ?? defaultRealSubnetFilter;
    this.nowFn = options.now ?? nowNanos;
    this.logger = options.logger ?? createLogger('aggregate-store');
    this.state = this.buildState(new Map(), CLEARED_AT);
  }

  ingest(records: Iterable<SubnetRecord>, updatedAt: Nanos = this.nowFn()): CertifiedSnapshot {
    this.commit(this.buildState(indexRecords(records), updatedAt), 'ingest');
    return this.read();
  }

  clear(): CertifiedSnapshot {
    this.commit(this.buildState(new Map(), CLEARED_AT), 'clear');
    return this.read();
  }

  restore(records: Iterable<SubnetRecord>, lastUpdated: Nanos): CertifiedSnapshot {
    this.commit(this.buildState(indexRecords(records), lastUpdated), 'restore');
    return this.read();
  }

  recertify(): Uint8Array {
    const fingerprint = statsFingerprint(this.state.realStats);
    this.host.register(fingerprint);
    this.logger.info({ fingerprint: toHex(fingerprint) }, 'fingerprint re-registered');
    return fingerprint.slice();
  }

  read(): CertifiedSnapshot {
    const { realStats, fingerprint } = this.state;
    const hostCertificate = this.host.currentCertificate();
    return hostCertificate
      ? { stats: realStats, fingerprint: fingerprint.slice(), hostCertificate }
      : { stats: realStats, fingerprint: fingerprint.slice() };
  }

  realStats(): NetworkStats {
    return this.state.realStats;
  }

  allNodesStats(): NetworkStats {
    return this.state.allStats;
  }

  fingerprint(): Uint8Array {
    return this.state.fingerprint.slice();
  }

  lastUpdated(): Nanos {
    return this.state.realStats.lastUpdated;
  }

  subnetCount(): number {
    return this.state.subnets.size;
  }

  subnets(): SubnetRecord[] {
    return [...this.state.subnets.values()].map((record) => structuredClone(record));
  }

  subnet(id: SubnetId): SubnetRecord | undefined {
    const record = this.state.subnets.get(id);
    return record ? structuredClone(record) : undefined;
  }

  exportSubnets(): Map<SubnetId, SubnetRecord> {
    return structuredClone(new Map(this.state.subnets));
  }

  private buildState(subnets: Map<SubnetId, SubnetRecord>, lastUpdated: Nanos): CommittedState {
    const realStats = Object.freeze(computeNetworkStats(subnets.values(), lastUpdated, this.realSubnetFilter));
    const allStats = Object.freeze(computeNetworkStats(subnets.values(), lastUpdated));
    return { subnets, realStats, allStats, fingerprint: statsFingerprint(realStats) };
  }

  private commit(next: CommittedState, reason: string): void {
    // Registration is the only step that can fail; the previous state stays in place if it does.
    this.host.register(next.fingerprint);
    this.state = next;
    this.logger.info(
      {
        reason,
        subnets: next.realStats.totalSubnets,
        nodes: next.allStats.totalNodes,
        fingerprint: toHex(next.fingerprint)
      },
      'snapshot committed'
    );
  }
}
