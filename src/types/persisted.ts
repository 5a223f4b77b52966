import type { Nanos, SubnetId } from './ids.js';
import type { SubnetRecord } from './topology.js';
import type { NetworkStats } from './stats.js';
import type { RefreshState } from './refresh.js';

export interface PersistedState {
  subnets: Map<SubnetId, SubnetRecord>;
  lastUpdated: Nanos;
  stats: NetworkStats;
  refresh: RefreshState;
}
