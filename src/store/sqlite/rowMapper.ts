import { z } from 'zod';
import { Generation } from '../../types/enums.js';
import type { NetworkStats } from '../../types/stats.js';
import type { SubnetRecord } from '../../types/topology.js';
import type { CallerId, Nanos } from '../../types/ids.js';

const nanosText = z
  .string()
  .regex(/^\d+$/, 'expected a decimal timestamp')
  .transform((value) => BigInt(value));

const count = z.number().int().min(0);

const nodeSchema = z.object({
  id: z.string(),
  generation: z.nativeEnum(Generation),
  operatorId: z.string(),
  providerId: z.string(),
  datacenterId: z.string(),
  region: z.string(),
  status: z.string()
});

const subnetRowSchema = z.object({
  subnetId: z.string(),
  type: z.string(),
  nodeCount: count,
  gen1Count: count,
  gen2Count: count,
  unknownCount: count,
  nodesJson: z.string()
});

const statsSchema = z.object({
  totalSubnets: count,
  totalNodes: count,
  gen1Nodes: count,
  gen2Nodes: count,
  unknownNodes: count,
  lastUpdated: nanosText
});

const metaRowSchema = z.object({ key: z.string(), value: z.string() });

const historyRowSchema = z.object({ callerId: z.string(), lastRefreshAt: nanosText });

export function mapSubnetRow(row: unknown): SubnetRecord {
  const parsed = subnetRowSchema.parse(row);
  return {
    id: parsed.subnetId,
    type: parsed.type,
    nodeCount: parsed.nodeCount,
    gen1Count: parsed.gen1Count,
    gen2Count: parsed.gen2Count,
    unknownCount: parsed.unknownCount,
    nodes: z.array(nodeSchema).parse(JSON.parse(parsed.nodesJson))
  };
}

export function mapMetaRows(rows: unknown[]): Map<string, string> {
  const meta = new Map<string, string>();
  for (const row of rows) {
    const parsed = metaRowSchema.parse(row);
    meta.set(parsed.key, parsed.value);
  }
  return meta;
}

export function mapHistoryRow(row: unknown): [CallerId, Nanos] {
  const parsed = historyRowSchema.parse(row);
  return [parsed.callerId, parsed.lastRefreshAt];
}

export function parseNanos(value: string): Nanos {
  return nanosText.parse(value);
}

export function parseStatsJson(value: string): NetworkStats {
  return statsSchema.parse(JSON.parse(value));
}

export function statsToJson(stats: NetworkStats): string {
  return JSON.stringify({ ...stats, lastUpdated: stats.lastUpdated.toString() });
}
