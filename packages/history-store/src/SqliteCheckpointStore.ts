import type BetterSqlite3 from 'better-sqlite3';
import {
  EMPTY_CHECKPOINT,
  type SyncCheckpoint,
  type SyncCheckpointStorePort,
} from '@shellsync/sync-engine';

type SyncMetaRow = Readonly<{
  host: string;
  last_sync_timestamp: number;
  last_sync_id: string | null;
  last_upload_timestamp: number;
  last_upload_id: string | null;
  last_success_at: number | null;
  updated_at: number;
}>;

/** Checkpoints in the `sync_meta` table, one row per host. */
export class SqliteCheckpointStore implements SyncCheckpointStorePort {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly now: () => number = Date.now
  ) {}

  async read(hostname: string): Promise<SyncCheckpoint> {
    const row = this.db
      .prepare<[string], SyncMetaRow>('SELECT * FROM sync_meta WHERE host = ?')
      .get(hostname);
    if (!row) return EMPTY_CHECKPOINT;
    return {
      lastSyncTimestamp: row.last_sync_timestamp,
      lastSyncId: row.last_sync_id,
      lastUploadTimestamp: row.last_upload_timestamp,
      lastUploadId: row.last_upload_id,
      lastSuccessAt: row.last_success_at,
    };
  }

  async write(hostname: string, checkpoint: SyncCheckpoint): Promise<void> {
    this.db
      .prepare<[SyncMetaRow]>(
        `INSERT INTO sync_meta (
           host, last_sync_timestamp, last_sync_id, last_upload_timestamp,
           last_upload_id, last_success_at, updated_at
         ) VALUES (
           @host, @last_sync_timestamp, @last_sync_id, @last_upload_timestamp,
           @last_upload_id, @last_success_at, @updated_at
         )
         ON CONFLICT(host) DO UPDATE SET
           last_sync_timestamp = excluded.last_sync_timestamp,
           last_sync_id = excluded.last_sync_id,
           last_upload_timestamp = excluded.last_upload_timestamp,
           last_upload_id = excluded.last_upload_id,
           last_success_at = excluded.last_success_at,
           updated_at = excluded.updated_at`
      )
      .run({
        host: hostname,
        last_sync_timestamp: checkpoint.lastSyncTimestamp,
        last_sync_id: checkpoint.lastSyncId,
        last_upload_timestamp: checkpoint.lastUploadTimestamp,
        last_upload_id: checkpoint.lastUploadId,
        last_success_at: checkpoint.lastSuccessAt,
        updated_at: this.now(),
      });
  }
}
