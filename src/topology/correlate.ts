import { ErrorCode, Generation } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { SubnetId } from '../types/ids.js';
import type { Result } from '../types/result.js';
import { err, ok } from '../types/result.js';
import type { GenerationMap, NodeRecord, SubnetRecord, TopologyDataset } from '../types/topology.js';

export enum MissingGenerationPolicy {
  GEN1 = 'Gen1',
  UNKNOWN = 'Unknown'
}

export interface CorrelateOptions {
  fallbackGeneration?: MissingGenerationPolicy;
}

export interface Correlation {
  subnets: SubnetRecord[];
  totals: { nodeCount: number; gen1Count: number; gen2Count: number; unknownCount: number };
  fallbackCount: number;
}

export function correlateTopology(
  topology: TopologyDataset,
  generations: GenerationMap,
  options: CorrelateOptions = {}
): Result<Correlation> {
  const fallback: Generation =
    (options.fallbackGeneration ?? MissingGenerationPolicy.GEN1) === MissingGenerationPolicy.GEN1
      ? Generation.GEN1
      : Generation.UNKNOWN;
  const seen = new Set<SubnetId>();
  const subnets: SubnetRecord[] = [];
  const totals = { nodeCount: 0, gen1Count: 0, gen2Count: 0, unknownCount: 0 };
  let fallbackCount = 0;

  for (const source of topology.subnets) {
    if (source.id.length === 0) {
      return err(serviceError(ErrorCode.CORRELATION, 'Topology contains a subnet with an empty id'));
    }
    if (seen.has(source.id)) {
      return err(serviceError(ErrorCode.CORRELATION, `Topology lists subnet ${source.id} more than once`));
    }
    seen.add(source.id);

    const nodes: NodeRecord[] = [];
    let gen1Count = 0;
    let gen2Count = 0;
    let unknownCount = 0;
    for (const node of source.nodes) {
      let generation = generations.get(node.id);
      if (generation === undefined) {
        generation = fallback;
        fallbackCount += 1;
      }
      if (generation === Generation.GEN1) gen1Count += 1;
      else if (generation === Generation.GEN2) gen2Count += 1;
      else unknownCount += 1;
      nodes.push({
        id: node.id,
        generation,
        operatorId: node.operatorId,
        providerId: node.providerId,
        datacenterId: node.datacenterId,
        region: node.region,
        status: node.status
      });
    }

    subnets.push({ id: source.id, type: source.type, nodeCount: nodes.length, gen1Count, gen2Count, unknownCount, nodes });
    totals.nodeCount += nodes.length;
    totals.gen1Count += gen1Count;
    totals.gen2Count += gen2Count;
    totals.unknownCount += unknownCount;
  }

  return ok({ subnets, totals, fallbackCount });
}
