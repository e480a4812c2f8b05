import type {
  HistoryBlob,
  HistoryPageQuery,
  IncomingHistoryBlob,
} from '../../domain/HistoryBlob';
import { HistoryOwnerId } from '../../domain/value-objects/HistoryOwnerId';

export abstract class HistoryBlobRepository {
  /** Inserts blobs whose id is new for the owner; returns how many were new. */
  abstract appendIfAbsent(
    ownerId: HistoryOwnerId,
    blobs: ReadonlyArray<IncomingHistoryBlob>
  ): Promise<number>;

  abstract count(ownerId: HistoryOwnerId): Promise<number>;

  /** Ascending by `(timestamp, id)`, strictly after the query's cursor. */
  abstract loadPage(
    ownerId: HistoryOwnerId,
    query: HistoryPageQuery
  ): Promise<HistoryBlob[]>;
}
