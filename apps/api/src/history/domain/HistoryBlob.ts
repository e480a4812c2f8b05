import { HistoryBlobId } from './value-objects/HistoryBlobId';

/** An opaque encrypted record as the server stores it. */
export interface HistoryBlob {
  id: HistoryBlobId;
  timestamp: Date;
  hostname: string;
  data: string;
}

export type IncomingHistoryBlob = Readonly<HistoryBlob>;

export type HistoryPageQuery = Readonly<{
  /** Only blobs ingested at or before this instant. */
  syncedBefore: Date;
  after: Date;
  afterId: HistoryBlobId | null;
  excludeHost: string | null;
  limit: number;
}>;
