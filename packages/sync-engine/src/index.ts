export { SyncClient, type SyncClientOptions } from './SyncClient';
export { SyncScheduler, type SyncSchedulerOptions } from './SyncScheduler';
export { HttpSyncTransport, type HttpSyncTransportOptions } from './httpTransport';
export { HttpAuthClient } from './httpAuthClient';
export {
  HttpJsonClient,
  DEFAULT_TIMEOUT_MS,
  type HttpJsonClientOptions,
} from './httpClient';
export {
  BLOB_DATA_VERSION,
  encodeBlobData,
  encodedBlobDataLength,
  fromIsoTimestamp,
  parseSyncHistoryBlob,
  toAddHistoryRequest,
  toIsoTimestamp,
} from './blobCodec';
export {
  ProtocolError,
  StoreError,
  SyncAbortedError,
  SyncFailedError,
  TransportError,
  TransportErrorKinds,
  classifySyncError,
  type TransportErrorKind,
} from './errors';
export * from './protocol';
export * from './types';
