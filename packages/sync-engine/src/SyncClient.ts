import { CipherEngine, type EncryptedBlob } from '@shellsync/crypto';
import type { HistoryRecord } from '@shellsync/history';
import {
  fromIsoTimestamp,
  parseSyncHistoryBlob,
  toAddHistoryRequest,
  toIsoTimestamp,
} from './blobCodec';
import {
  ProtocolError,
  StoreError,
  SyncAbortedError,
  SyncFailedError,
} from './errors';
import {
  HISTORY_PAGE_SIZE,
  MAX_BLOB_DATA_LENGTH,
  MAX_UPLOAD_BODY_BYTES,
  type AddHistoryRequestV1,
  type SyncHistoryBlobV1,
} from './protocol';
import {
  EMPTY_CHECKPOINT,
  SyncPhases,
  SyncStates,
  type LocalHistoryStorePort,
  type RejectedRecord,
  type SyncCheckpoint,
  type SyncCheckpointStorePort,
  type SyncContext,
  type SyncFailure,
  type SyncPhase,
  type SyncReport,
  type SyncRunOptions,
  type SyncRunner,
  type SyncStatus,
  type SyncTransportPort,
} from './types';

const DEFAULT_UPLOAD_BATCH_SIZE = 100;
/** `[` and `]`; every element adds its JSON plus one separator. */
const EMPTY_BODY_BYTES = 1;

export type SyncClientOptions = Readonly<{
  store: LocalHistoryStorePort;
  checkpoints: SyncCheckpointStorePort;
  transport: SyncTransportPort;
  context: SyncContext;
  cipher?: CipherEngine;
  /** Must match the server's page size; a shorter page ends the download. */
  pageSize?: number;
  uploadBatchSize?: number;
  /** Bounds one upload request body; defaults to the server's limit. */
  maxUploadBodyBytes?: number;
  now?: () => number;
  onStatusChange?: (status: SyncStatus) => void;
}>;

type RunState = {
  phase: SyncPhase;
  checkpoint: SyncCheckpoint;
};

type Cursor = Readonly<{ timestamp: number; id: string | null }>;

const EPOCH_CURSOR: Cursor = { timestamp: 0, id: null };

type UploadResult = {
  uploaded: number;
  stored: number;
  rejected: RejectedRecord[];
};

type DownloadResult = {
  downloaded: number;
  skipped: number;
  pages: number;
};

type InFlightRun = Readonly<{ run: Promise<SyncReport>; force: boolean }>;

const requestBytes = (request: AddHistoryRequestV1): number =>
  Buffer.byteLength(JSON.stringify(request), 'utf8') + 1;

const isAfter = (
  timestamp: number,
  id: string,
  cursor: Cursor
): boolean =>
  timestamp > cursor.timestamp ||
  (timestamp === cursor.timestamp && cursor.id !== null && id > cursor.id);

const getLastError = (status: SyncStatus): SyncFailure | null => {
  if (status.state === SyncStates.failed) return status.error;
  if ('lastError' in status) return status.lastError;
  return null;
};

/**
 * One sync run: negotiate, upload this host's new records, download other
 * hosts' records page by page. Checkpoints only move after the work they
 * describe is durable, so a failed or cancelled run can simply be repeated.
 */
export class SyncClient implements SyncRunner {
  private readonly store: LocalHistoryStorePort;
  private readonly checkpoints: SyncCheckpointStorePort;
  private readonly transport: SyncTransportPort;
  private readonly context: SyncContext;
  private readonly cipher: CipherEngine;
  private readonly pageSize: number;
  private readonly uploadBatchSize: number;
  private readonly maxUploadBodyBytes: number;
  private readonly now: () => number;
  private readonly onStatusChange?: (status: SyncStatus) => void;
  private inFlight: InFlightRun | null = null;
  private status: SyncStatus = {
    state: SyncStates.idle,
    lastSuccessAt: null,
    lastError: null,
  };

  constructor(options: SyncClientOptions) {
    this.store = options.store;
    this.checkpoints = options.checkpoints;
    this.transport = options.transport;
    this.context = options.context;
    this.cipher = options.cipher ?? new CipherEngine();
    this.pageSize = options.pageSize ?? HISTORY_PAGE_SIZE;
    this.uploadBatchSize = options.uploadBatchSize ?? DEFAULT_UPLOAD_BATCH_SIZE;
    this.maxUploadBodyBytes =
      options.maxUploadBodyBytes ?? MAX_UPLOAD_BODY_BYTES;
    this.now = options.now ?? Date.now;
    this.onStatusChange = options.onStatusChange;
  }

  getStatus(): SyncStatus {
    return this.status;
  }

  /**
   * Runs a sync, or joins the one already in flight. A forced sync requested
   * during a normal run starts once that run settles. Rejects only with
   * `SyncFailedError`.
   */
  sync(options: SyncRunOptions = {}): Promise<SyncReport> {
    const current = this.inFlight;
    if (current) {
      if (options.force && !current.force) {
        const rerun = () => this.sync(options);
        return current.run.then(rerun, rerun);
      }
      return current.run;
    }
    const run = this.run(options).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = { run, force: options.force ?? false };
    return run;
  }

  private async run(options: SyncRunOptions): Promise<SyncReport> {
    const signal = options.signal;
    const state: RunState = {
      phase: SyncPhases.negotiate,
      checkpoint: EMPTY_CHECKPOINT,
    };

    try {
      this.enter(SyncStates.negotiating);
      this.throwIfAborted(signal);
      const stored = await this.readCheckpoint();
      state.checkpoint = options.force
        ? { ...EMPTY_CHECKPOINT, lastSuccessAt: stored.lastSuccessAt }
        : stored;
      const remote = await this.transport.count({ signal });
      const syncTs = remote.server_time
        ? fromIsoTimestamp(remote.server_time)
        : this.now();
      const localCount = await this.countLocal();

      state.phase = SyncPhases.upload;
      this.enter(SyncStates.uploading);
      const upload = await this.upload(state, signal);

      state.phase = SyncPhases.download;
      this.enter(SyncStates.downloading);
      const download = await this.download(
        syncTs,
        {
          timestamp: state.checkpoint.lastSyncTimestamp,
          id: state.checkpoint.lastSyncId,
        },
        signal,
        async (last) => {
          state.checkpoint = {
            ...state.checkpoint,
            lastSyncTimestamp: last.timestamp,
            lastSyncId: last.id,
          };
          await this.writeCheckpoint(state.checkpoint);
        }
      );

      // Records uploaded with timestamps behind the download cursor are only
      // found by walking the whole history again. The cursor stays put.
      const expectedCount = remote.count + upload.stored;
      const recovered =
        !options.force && expectedCount > (await this.countLocal());
      if (recovered) {
        const rescan = await this.download(
          syncTs,
          EPOCH_CURSOR,
          signal,
          async () => undefined
        );
        download.downloaded += rescan.downloaded;
        download.skipped += rescan.skipped;
        download.pages += rescan.pages;
      }

      const lastSuccessAt = this.now();
      state.checkpoint = { ...state.checkpoint, lastSuccessAt };
      await this.writeCheckpoint(state.checkpoint);

      const report: SyncReport = {
        uploaded: upload.uploaded,
        rejected: upload.rejected,
        downloaded: download.downloaded,
        skipped: download.skipped,
        pages: download.pages,
        remoteCount: remote.count,
        localCount,
        drift: remote.count - localCount,
        recovered,
        checkpoint: state.checkpoint,
      };
      this.setStatus({
        state: SyncStates.committed,
        report,
        lastSuccessAt,
      });
      return report;
    } catch (error) {
      const failure = new SyncFailedError(
        state.phase,
        signal?.aborted && !(error instanceof SyncAbortedError)
          ? new SyncAbortedError(error)
          : error
      );
      this.setStatus({
        state: SyncStates.failed,
        error: failure.toFailure(),
        lastSuccessAt: this.status.lastSuccessAt,
      });
      throw failure;
    }
  }

  private async upload(
    state: RunState,
    signal: AbortSignal | undefined
  ): Promise<UploadResult> {
    const result: UploadResult = { uploaded: 0, stored: 0, rejected: [] };
    for (;;) {
      this.throwIfAborted(signal);
      const batch = await this.storeCall('read records to upload', () =>
        this.store.recordsSince(state.checkpoint.lastUploadTimestamp, {
          host: this.context.hostname,
          afterId: state.checkpoint.lastUploadId,
          limit: this.uploadBatchSize,
        })
      );
      const last = batch.at(-1);
      if (!last) return result;

      let pending: AddHistoryRequestV1[] = [];
      let pendingBytes = EMPTY_BODY_BYTES;
      // Sends what is pending, then moves the upload cursor to `through`.
      const flush = async (through: HistoryRecord): Promise<void> => {
        if (pending.length > 0) {
          const ack = await this.transport.addHistory(pending, { signal });
          result.uploaded += pending.length;
          result.stored += ack.stored;
          pending = [];
          pendingBytes = EMPTY_BODY_BYTES;
        }
        state.checkpoint = {
          ...state.checkpoint,
          lastUploadTimestamp: through.timestamp,
          lastUploadId: through.id,
        };
        await this.writeCheckpoint(state.checkpoint);
      };

      let previous: HistoryRecord | null = null;
      for (const record of batch) {
        const request = toAddHistoryRequest(
          await this.cipher.encrypt(this.context.key, record)
        );
        if (request.data.length > MAX_BLOB_DATA_LENGTH) {
          result.rejected.push({
            id: record.id,
            timestamp: record.timestamp,
            hostname: record.hostname,
            dataLength: request.data.length,
          });
        } else {
          const size = requestBytes(request);
          if (previous && pendingBytes + size > this.maxUploadBodyBytes) {
            await flush(previous);
          }
          pending.push(request);
          pendingBytes += size;
        }
        previous = record;
      }
      await flush(last);
      if (batch.length < this.uploadBatchSize) return result;
    }
  }

  /**
   * Pages through `sync_history` from `start`. `onPage` runs after a page's
   * records are stored, with the last blob of that page.
   */
  private async download(
    syncTs: number,
    start: Cursor,
    signal: AbortSignal | undefined,
    onPage: (last: EncryptedBlob) => Promise<void>
  ): Promise<DownloadResult> {
    const result: DownloadResult = { downloaded: 0, skipped: 0, pages: 0 };
    let cursor = start;
    for (;;) {
      this.throwIfAborted(signal);
      const response = await this.transport.syncHistory(
        {
          sync_ts: toIsoTimestamp(syncTs),
          history_ts: toIsoTimestamp(cursor.timestamp),
          history_id: cursor.id ?? undefined,
          host: this.context.hostname,
        },
        { signal }
      );
      result.pages += 1;

      const blobs = this.validatePage(response.history, cursor);
      const last = blobs.at(-1);
      if (!last) return result;

      const records: HistoryRecord[] = [];
      for (const blob of blobs) {
        records.push(await this.cipher.decrypt(this.context.key, blob));
      }
      for (const record of records) {
        const inserted = await this.storeCall(
          `insert history record ${record.id}`,
          () => this.store.insertIfAbsent(record)
        );
        if (inserted) result.downloaded += 1;
        else result.skipped += 1;
      }

      await onPage(last);
      cursor = { timestamp: last.timestamp, id: last.id };
      if (blobs.length < this.pageSize) return result;
    }
  }

  private validatePage(
    page: ReadonlyArray<SyncHistoryBlobV1>,
    cursor: Cursor
  ): EncryptedBlob[] {
    if (page.length > this.pageSize) {
      throw new ProtocolError(
        `Server returned ${page.length} blobs for a page of ${this.pageSize}`,
        { pageSize: this.pageSize, received: page.length }
      );
    }
    const blobs: EncryptedBlob[] = [];
    let previous = cursor;
    for (const wire of page) {
      const timestamp = fromIsoTimestamp(wire.timestamp);
      if (!isAfter(timestamp, wire.id, previous)) {
        throw new ProtocolError(
          `Blob ${wire.id} is out of order or not after the sync cursor`,
          {
            id: wire.id,
            timestamp: wire.timestamp,
            hostname: wire.hostname,
            cursorTimestamp: previous.timestamp,
            cursorId: previous.id,
          }
        );
      }
      const blob = parseSyncHistoryBlob(wire);
      blobs.push(blob);
      previous = { timestamp: blob.timestamp, id: blob.id };
    }
    return blobs;
  }

  private async countLocal(): Promise<number> {
    return this.storeCall('count local history', () => this.store.count());
  }

  private async readCheckpoint(): Promise<SyncCheckpoint> {
    return this.storeCall('read sync checkpoint', () =>
      this.checkpoints.read(this.context.hostname)
    );
  }

  private async writeCheckpoint(checkpoint: SyncCheckpoint): Promise<void> {
    await this.storeCall('write sync checkpoint', () =>
      this.checkpoints.write(this.context.hostname, checkpoint)
    );
  }

  private async storeCall<T>(
    operation: string,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreError(`Failed to ${operation}: ${message}`, error);
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new SyncAbortedError(signal.reason);
    }
  }

  private enter(
    state:
      | typeof SyncStates.negotiating
      | typeof SyncStates.uploading
      | typeof SyncStates.downloading
  ): void {
    this.setStatus({
      state,
      lastSuccessAt: this.status.lastSuccessAt,
      lastError: getLastError(this.status),
    });
  }

  private setStatus(status: SyncStatus): void {
    this.status = status;
    this.onStatusChange?.(status);
  }
}
