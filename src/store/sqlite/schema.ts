import Database from 'better-sqlite3';

export const SCHEMA_VERSION = '1';

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    PRAGMA journal_mode = WAL;

    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS subnets (
      subnetId TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      type TEXT NOT NULL,
      nodeCount INTEGER NOT NULL,
      gen1Count INTEGER NOT NULL,
      gen2Count INTEGER NOT NULL,
      unknownCount INTEGER NOT NULL,
      nodesJson TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS refresh_history (
      callerId TEXT PRIMARY KEY,
      lastRefreshAt TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_subnets_position ON subnets (position);
  `);
}
