import { Generation } from '../types/enums.js';
import type { NodeRecord, SubnetRecord } from '../types/topology.js';

export interface GenerationCounts {
  nodeCount: number;
  gen1Count: number;
  gen2Count: number;
  unknownCount: number;
}

export function countGenerations(nodes: readonly NodeRecord[]): GenerationCounts {
  const counts: GenerationCounts = { nodeCount: 0, gen1Count: 0, gen2Count: 0, unknownCount: 0 };
  for (const node of nodes) {
    counts.nodeCount += 1;
    if (node.generation === Generation.GEN1) counts.gen1Count += 1;
    else if (node.generation === Generation.GEN2) counts.gen2Count += 1;
    else counts.unknownCount += 1;
  }
  return counts;
}

export function recountSubnet(subnet: Pick<SubnetRecord, 'id' | 'type' | 'nodes'>): SubnetRecord {
  return {
    id: subnet.id,
    type: subnet.type,
    ...countGenerations(subnet.nodes),
    nodes: subnet.nodes
  };
}
