import type BetterSqlite3 from 'better-sqlite3';
import type { HistoryRecord } from '@shellsync/history';
import type {
  LocalHistoryStorePort,
  RecordsSinceOptions,
} from '@shellsync/sync-engine';

type HistoryRow = Readonly<{
  id: string;
  timestamp: number;
  hostname: string;
  command: string;
  cwd: string;
  exit_code: number;
  duration: number;
  session: string;
}>;

type RecordsSinceParams = Readonly<{
  timestamp: number;
  afterId: string | null;
  host: string | null;
  excludeHost: string | null;
  limit: number;
}>;

const COLUMNS =
  'id, timestamp, hostname, command, cwd, exit_code, duration, session';

const toRecord = (row: HistoryRow): HistoryRecord => ({
  id: row.id,
  timestamp: row.timestamp,
  hostname: row.hostname,
  command: row.command,
  cwd: row.cwd,
  exitCode: row.exit_code,
  duration: row.duration,
  session: row.session,
});

export class SqliteHistoryStore implements LocalHistoryStorePort {
  private readonly insertStatement: BetterSqlite3.Statement<[HistoryRow]>;
  private readonly sinceStatement: BetterSqlite3.Statement<
    [RecordsSinceParams],
    HistoryRow
  >;

  constructor(private readonly db: BetterSqlite3.Database) {
    this.insertStatement = db.prepare<[HistoryRow]>(
      `INSERT INTO history (${COLUMNS})
       VALUES (@id, @timestamp, @hostname, @command, @cwd, @exit_code, @duration, @session)
       ON CONFLICT(id) DO NOTHING`
    );
    this.sinceStatement = db.prepare<[RecordsSinceParams], HistoryRow>(
      `SELECT ${COLUMNS} FROM history
       WHERE (timestamp > @timestamp
              OR (@afterId IS NOT NULL AND timestamp = @timestamp AND id > @afterId))
         AND (@host IS NULL OR hostname = @host)
         AND (@excludeHost IS NULL OR hostname != @excludeHost)
       ORDER BY timestamp, id
       LIMIT @limit`
    );
  }

  async insertIfAbsent(record: HistoryRecord): Promise<boolean> {
    const result = this.insertStatement.run({
      id: record.id,
      timestamp: record.timestamp,
      hostname: record.hostname,
      command: record.command,
      cwd: record.cwd,
      exit_code: record.exitCode,
      duration: record.duration,
      session: record.session,
    });
    return result.changes === 1;
  }

  async recordsSince(
    timestamp: number,
    options: RecordsSinceOptions = {}
  ): Promise<ReadonlyArray<HistoryRecord>> {
    const rows = this.sinceStatement.all({
      timestamp,
      afterId: options.afterId ?? null,
      host: options.host ?? null,
      excludeHost: options.excludeHost ?? null,
      // SQLite reads a negative LIMIT as "no limit".
      limit: options.limit ?? -1,
    });
    return rows.map(toRecord);
  }

  async count(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM history')
      .get();
    return row?.count ?? 0;
  }

  async maxTimestamp(): Promise<number | null> {
    const row = this.db
      .prepare<[], { value: number | null }>(
        'SELECT MAX(timestamp) AS value FROM history'
      )
      .get();
    return row?.value ?? null;
  }
}
