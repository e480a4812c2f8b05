import type BetterSqlite3 from 'better-sqlite3';

const DEFAULT_LOCK_STALE_MS = 10 * 60 * 1000;

type SyncLockRow = Readonly<{
  host: string;
  holder: string;
  acquired_at: number;
}>;

export type SqliteSyncLockOptions = Readonly<{
  now?: () => number;
  /** A lock older than this is treated as left behind by a dead process. */
  staleAfterMs?: number;
}>;

/**
 * At most one sync per host across processes sharing the database file. The
 * claim runs in a `BEGIN IMMEDIATE` transaction so two claimants cannot both
 * see the row as free.
 */
export class SqliteSyncLock {
  private readonly now: () => number;
  private readonly staleAfterMs: number;
  private readonly claim: BetterSqlite3.Transaction<
    (host: string, holder: string) => boolean
  >;

  constructor(
    private readonly db: BetterSqlite3.Database,
    options: SqliteSyncLockOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_STALE_MS;

    const select = db.prepare<[string], SyncLockRow>(
      'SELECT host, holder, acquired_at FROM sync_lock WHERE host = ?'
    );
    const upsert = db.prepare<[SyncLockRow]>(
      `INSERT INTO sync_lock (host, holder, acquired_at)
       VALUES (@host, @holder, @acquired_at)
       ON CONFLICT(host) DO UPDATE SET
         holder = excluded.holder,
         acquired_at = excluded.acquired_at`
    );
    this.claim = db.transaction((host: string, holder: string): boolean => {
      const now = this.now();
      const current = select.get(host);
      if (
        current &&
        current.holder !== holder &&
        now - current.acquired_at < this.staleAfterMs
      ) {
        return false;
      }
      upsert.run({ host, holder, acquired_at: now });
      return true;
    });
  }

  tryAcquire(host: string, holder: string): boolean {
    return this.claim.immediate(host, holder);
  }

  /** False when `holder` no longer owned the lock. */
  release(host: string, holder: string): boolean {
    const result = this.db
      .prepare<[string, string]>(
        'DELETE FROM sync_lock WHERE host = ? AND holder = ?'
      )
      .run(host, holder);
    return result.changes === 1;
  }
}
