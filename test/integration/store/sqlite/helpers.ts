import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SqliteStateStore } from '../../../../src/store/sqlite/SqliteStateStore.js';
import { Generation } from '../../../../src/types/enums.js';
import type { PersistedState } from '../../../../src/types/persisted.js';
import type { NodeRecord, SubnetRecord } from '../../../../src/types/topology.js';
import { recountSubnet } from '../../../../src/topology/recount.js';
import { computeNetworkStats } from '../../../../src/aggregate/stats.js';

export const UPDATED_AT = 1_700_000_000_000_000_000n;

export function makeStore(): SqliteStateStore {
  return new SqliteStateStore({ path: ':memory:' });
}

export function createTempDir(prefix = 'subnet-census-sqlite-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

function makeNode(id: string, generation: Generation): NodeRecord {
  return {
    id,
    generation,
    operatorId: `op-${id}`,
    providerId: 'np-1',
    datacenterId: 'dc-1',
    region: 'europe,ch',
    status: 'UP'
  };
}

export function makeSubnets(): Map<string, SubnetRecord> {
  const subnets: SubnetRecord[] = [
    recountSubnet({
      id: 'sn-b',
      type: 'application',
      nodes: [makeNode('n1', Generation.GEN1), makeNode('n2', Generation.GEN2)]
    }),
    recountSubnet({ id: 'sn-a', type: 'system', nodes: [makeNode('n3', Generation.UNKNOWN)] })
  ];
  return new Map(subnets.map((subnet) => [subnet.id, subnet]));
}

export function makeState(overrides: Partial<PersistedState> = {}): PersistedState {
  const subnets = overrides.subnets ?? makeSubnets();
  return {
    subnets,
    lastUpdated: UPDATED_AT,
    stats: computeNetworkStats(subnets.values(), UPDATED_AT),
    refresh: {
      lastSuccessTime: UPDATED_AT,
      lastTriggeredBy: 'caller-a',
      history: new Map([
        ['caller-a', UPDATED_AT],
        ['caller-b', UPDATED_AT - 5n]
      ])
    },
    ...overrides
  };
}
