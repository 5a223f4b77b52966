import type { Nanos } from '../types/ids.js';
import type { NetworkStats } from '../types/stats.js';
import type { SubnetRecord } from '../types/topology.js';
import type { SubnetFilter } from '../topology/filters.js';
import { includeAllSubnets } from '../topology/filters.js';

export function zeroStats(lastUpdated: Nanos = 0n): NetworkStats {
  return { totalSubnets: 0, totalNodes: 0, gen1Nodes: 0, gen2Nodes: 0, unknownNodes: 0, lastUpdated };
}

export function computeNetworkStats(
  subnets: Iterable<SubnetRecord>,
  lastUpdated: Nanos,
  filter: SubnetFilter = includeAllSubnets
): NetworkStats {
  const stats = zeroStats(lastUpdated);
  for (const subnet of subnets) {
    if (!filter(subnet)) continue;
    stats.totalSubnets += 1;
    stats.totalNodes += subnet.nodeCount;
    stats.gen1Nodes += subnet.gen1Count;
    stats.gen2Nodes += subnet.gen2Count;
    stats.unknownNodes += subnet.unknownCount;
  }
  return stats;
}
