import type { Nanos } from './ids.js';
import type { RefreshPhase } from './refresh.js';

export interface NetworkStats {
  totalSubnets: number;
  totalNodes: number;
  gen1Nodes: number;
  gen2Nodes: number;
  unknownNodes: number;
  lastUpdated: Nanos;
}

export interface CertifiedSnapshot {
  stats: NetworkStats;
  fingerprint: Uint8Array;
  hostCertificate?: Uint8Array;
}

export enum HealthState {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded'
}

export interface HealthStatus {
  status: HealthState;
  subnetsCount: number;
  nodesCount: number;
  availableBudget: bigint;
  hasCertificate: boolean;
  lastUpdated: Nanos;
  refreshPhase: RefreshPhase;
}

export interface DataFreshness {
  lastUpdated: Nanos;
  ageInMinutes?: number;
  staleAfterMinutes: number;
  isStale: boolean;
  canRefresh: boolean;
  cooldownRemainingNs: Nanos;
  nextRefreshTime: Nanos;
}
