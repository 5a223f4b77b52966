import Database from 'better-sqlite3';
import type { StateStore } from '../StateStore.js';
import type { PersistedState } from '../../types/persisted.js';
import type { RefreshState } from '../../types/refresh.js';
import { ensureSchema, SCHEMA_VERSION } from './schema.js';
import { mapHistoryRow, mapMetaRows, mapSubnetRow, parseNanos, parseStatsJson, statsToJson } from './rowMapper.js';

export interface SqliteStateStoreOptions {
  path?: string;
}

const META_SCHEMA_VERSION = 'schemaVersion';
const META_LAST_UPDATED = 'lastUpdated';
const META_STATS = 'statsJson';
const META_LAST_SUCCESS = 'lastSuccessTime';
const META_LAST_TRIGGERED_BY = 'lastTriggeredBy';

export class SqliteStateStore implements StateStore {
  private readonly db: Database.Database;

  constructor(options: SqliteStateStoreOptions = {}) {
    const path = options.path ?? ':memory:';
    this.db = new Database(path);
    ensureSchema(this.db);
  }

  close(): void {
    this.db.close();
  }

  save(state: PersistedState): void {
    const insertMeta = this.db.prepare('INSERT INTO meta (key, value) VALUES (?, ?)');
    const insertSubnet = this.db.prepare(
      `INSERT INTO subnets (subnetId, position, type, nodeCount, gen1Count, gen2Count, unknownCount, nodesJson)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertHistory = this.db.prepare('INSERT INTO refresh_history (callerId, lastRefreshAt) VALUES (?, ?)');

    const write = this.db.transaction((next: PersistedState) => {
      this.db.exec('DELETE FROM meta; DELETE FROM subnets; DELETE FROM refresh_history;');
      insertMeta.run(META_SCHEMA_VERSION, SCHEMA_VERSION);
      insertMeta.run(META_LAST_UPDATED, next.lastUpdated.toString());
      insertMeta.run(META_STATS, statsToJson(next.stats));
      insertMeta.run(META_LAST_SUCCESS, next.refresh.lastSuccessTime.toString());
      if (next.refresh.lastTriggeredBy !== undefined) {
        insertMeta.run(META_LAST_TRIGGERED_BY, next.refresh.lastTriggeredBy);
      }
      let position = 0;
      for (const subnet of next.subnets.values()) {
        insertSubnet.run(
          subnet.id,
          position,
          subnet.type,
          subnet.nodeCount,
          subnet.gen1Count,
          subnet.gen2Count,
          subnet.unknownCount,
          JSON.stringify(subnet.nodes)
        );
        position += 1;
      }
      for (const [callerId, at] of next.refresh.history) {
        insertHistory.run(callerId, at.toString());
      }
    });
    write(state);
  }

  load(): PersistedState | undefined {
    const meta = mapMetaRows(this.db.prepare('SELECT key, value FROM meta').all());
    const version = meta.get(META_SCHEMA_VERSION);
    if (version === undefined) return undefined;
    if (version !== SCHEMA_VERSION) {
      throw new Error(`Unsupported schemaVersion: ${version}`);
    }

    const subnets = new Map(
      this.db
        .prepare('SELECT * FROM subnets ORDER BY position')
        .all()
        .map((row) => {
          const subnet = mapSubnetRow(row);
          return [subnet.id, subnet] as const;
        })
    );
    const history = new Map(this.db.prepare('SELECT * FROM refresh_history').all().map(mapHistoryRow));
    const refresh: RefreshState = {
      lastSuccessTime: parseNanos(meta.get(META_LAST_SUCCESS) ?? '0'),
      history
    };
    const lastTriggeredBy = meta.get(META_LAST_TRIGGERED_BY);
    if (lastTriggeredBy !== undefined) refresh.lastTriggeredBy = lastTriggeredBy;

    const lastUpdated = parseNanos(meta.get(META_LAST_UPDATED) ?? '0');
    const statsJson = meta.get(META_STATS);
    if (statsJson === undefined) {
      throw new Error('Persisted state is missing its stats');
    }
    return { subnets, lastUpdated, stats: parseStatsJson(statsJson), refresh };
  }
}
