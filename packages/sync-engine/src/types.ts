import type { SymmetricKey } from '@shellsync/crypto';
import type { HistoryRecord } from '@shellsync/history';
import type {
  AddHistoryRequestV1,
  AddHistoryResponseV1,
  CountResponseV1,
  SyncHistoryRequestV1,
  SyncHistoryResponseV1,
} from './protocol';

export const SyncPhases = {
  negotiate: 'negotiate',
  upload: 'upload',
  download: 'download',
} as const;

export type SyncPhase = (typeof SyncPhases)[keyof typeof SyncPhases];

export const SyncStates = {
  idle: 'idle',
  negotiating: 'negotiating',
  uploading: 'uploading',
  downloading: 'downloading',
  committed: 'committed',
  failed: 'failed',
} as const;

export type SyncState = (typeof SyncStates)[keyof typeof SyncStates];

export const SyncErrorCodes = {
  crypto: 'crypto',
  transport: 'transport',
  protocol: 'protocol',
  store: 'store',
  aborted: 'aborted',
  unknown: 'unknown',
} as const;

export type SyncErrorCode =
  (typeof SyncErrorCodes)[keyof typeof SyncErrorCodes];

export type SyncFailure = Readonly<{
  phase: SyncPhase;
  code: SyncErrorCode;
  message: string;
  context?: Readonly<Record<string, unknown>>;
}>;

/** A local record too large to upload; the upload cursor moves past it. */
export type RejectedRecord = Readonly<{
  id: string;
  timestamp: number;
  hostname: string;
  dataLength: number;
}>;

export type SyncReport = Readonly<{
  uploaded: number;
  rejected: ReadonlyArray<RejectedRecord>;
  downloaded: number;
  /** Downloaded blobs already present locally. */
  skipped: number;
  /** Download round trips. */
  pages: number;
  remoteCount: number;
  localCount: number;
  /** Remote minus local count at negotiation; a hint, never a cursor. */
  drift: number;
  /**
   * The server still held more records than this host after the incremental
   * download, so the whole history was downloaded again.
   */
  recovered: boolean;
  checkpoint: SyncCheckpoint;
}>;

export type SyncStatus =
  | Readonly<{
      state: typeof SyncStates.idle;
      lastSuccessAt: number | null;
      lastError: SyncFailure | null;
    }>
  | Readonly<{
      state:
        | typeof SyncStates.negotiating
        | typeof SyncStates.uploading
        | typeof SyncStates.downloading;
      lastSuccessAt: number | null;
      lastError: SyncFailure | null;
    }>
  | Readonly<{
      state: typeof SyncStates.committed;
      report: SyncReport;
      lastSuccessAt: number;
    }>
  | Readonly<{
      state: typeof SyncStates.failed;
      error: SyncFailure;
      lastSuccessAt: number | null;
    }>;

/**
 * Per-host sync cursor. `lastSync*` is the download boundary for records from
 * other hosts; `lastUpload*` is the last acknowledged upload of this host's
 * own records. Ids break ties between records sharing a millisecond.
 */
export type SyncCheckpoint = Readonly<{
  lastSyncTimestamp: number;
  lastSyncId: string | null;
  lastUploadTimestamp: number;
  lastUploadId: string | null;
  lastSuccessAt: number | null;
}>;

export const EMPTY_CHECKPOINT: SyncCheckpoint = {
  lastSyncTimestamp: 0,
  lastSyncId: null,
  lastUploadTimestamp: 0,
  lastUploadId: null,
  lastSuccessAt: null,
};

export type RecordsSinceOptions = Readonly<{
  /** Only records from this host. */
  host?: string;
  /** Leave out records from this host. */
  excludeHost?: string;
  /** Also return records at exactly `timestamp` whose id sorts after this. */
  afterId?: string | null;
  limit?: number;
}>;

/** What the engine needs from the embedded history database. */
export interface LocalHistoryStorePort {
  insertIfAbsent(record: HistoryRecord): Promise<boolean>;
  /** Ascending by `(timestamp, id)`. */
  recordsSince(
    timestamp: number,
    options?: RecordsSinceOptions
  ): Promise<ReadonlyArray<HistoryRecord>>;
  count(): Promise<number>;
  maxTimestamp(): Promise<number | null>;
}

export interface SyncCheckpointStorePort {
  read(hostname: string): Promise<SyncCheckpoint>;
  write(hostname: string, checkpoint: SyncCheckpoint): Promise<void>;
}

export type TransportCallOptions = Readonly<{ signal?: AbortSignal }>;

export interface SyncTransportPort {
  count(options?: TransportCallOptions): Promise<CountResponseV1>;
  addHistory(
    requests: ReadonlyArray<AddHistoryRequestV1>,
    options?: TransportCallOptions
  ): Promise<AddHistoryResponseV1>;
  syncHistory(
    request: SyncHistoryRequestV1,
    options?: TransportCallOptions
  ): Promise<SyncHistoryResponseV1>;
}

/**
 * Credentials for one user on one host. The session token stays with the
 * transport; the key is only ever read by the cipher.
 */
export type SyncContext = Readonly<{
  hostname: string;
  key: SymmetricKey;
}>;

export type SyncRunOptions = Readonly<{
  force?: boolean;
  signal?: AbortSignal;
}>;

export interface SyncRunner {
  sync(options?: SyncRunOptions): Promise<SyncReport>;
}
