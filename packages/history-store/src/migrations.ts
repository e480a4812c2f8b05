import type BetterSqlite3 from 'better-sqlite3';

type Migration = Readonly<{
  version: number;
  description: string;
  up: string;
}>;

export const HISTORY_MIGRATIONS: ReadonlyArray<Migration> = [
  {
    version: 1,
    description: 'history table',
    up: `
      CREATE TABLE IF NOT EXISTS history (
        id         TEXT PRIMARY KEY,
        timestamp  INTEGER NOT NULL,
        hostname   TEXT NOT NULL,
        command    TEXT NOT NULL,
        cwd        TEXT NOT NULL,
        exit_code  INTEGER NOT NULL,
        duration   INTEGER NOT NULL,
        session    TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_history_timestamp_id
        ON history (timestamp, id);
      CREATE INDEX IF NOT EXISTS idx_history_hostname_timestamp_id
        ON history (hostname, timestamp, id);
    `,
  },
  {
    version: 2,
    description: 'per-host sync checkpoints',
    up: `
      CREATE TABLE IF NOT EXISTS sync_meta (
        host                   TEXT PRIMARY KEY,
        last_sync_timestamp    INTEGER NOT NULL DEFAULT 0,
        last_sync_id           TEXT,
        last_upload_timestamp  INTEGER NOT NULL DEFAULT 0,
        last_upload_id         TEXT,
        last_success_at        INTEGER,
        updated_at             INTEGER NOT NULL
      );
    `,
  },
  {
    version: 3,
    description: 'cross-process sync lock',
    up: `
      CREATE TABLE IF NOT EXISTS sync_lock (
        host         TEXT PRIMARY KEY,
        holder       TEXT NOT NULL,
        acquired_at  INTEGER NOT NULL
      );
    `,
  },
];

export const LATEST_SCHEMA_VERSION =
  HISTORY_MIGRATIONS[HISTORY_MIGRATIONS.length - 1]?.version ?? 0;

export const readSchemaVersion = (db: BetterSqlite3.Database): number => {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
};

/**
 * Applies pending migrations in one transaction; the schema version lives in
 * SQLite's `user_version`. Returns the number of migrations applied.
 */
export const migrateHistoryDatabase = (db: BetterSqlite3.Database): number => {
  const current = readSchemaVersion(db);
  if (current > LATEST_SCHEMA_VERSION) {
    throw new Error(
      `History database schema version ${current} is newer than this build supports (${LATEST_SCHEMA_VERSION})`
    );
  }
  const pending = HISTORY_MIGRATIONS.filter(
    (migration) => migration.version > current
  );
  if (pending.length === 0) return 0;

  const applyAll = db.transaction(() => {
    for (const migration of pending) {
      db.exec(migration.up);
      db.pragma(`user_version = ${migration.version}`);
    }
  });
  applyAll();
  return pending.length;
};
