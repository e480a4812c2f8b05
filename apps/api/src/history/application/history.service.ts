import { Inject, Injectable, Logger } from '@nestjs/common';
import { HISTORY_PAGE_SIZE, MAX_UPLOAD_BATCH } from '@shellsync/sync-engine';
import type { HistoryBlob, IncomingHistoryBlob } from '../domain/HistoryBlob';
import { HistoryBlobId } from '../domain/value-objects/HistoryBlobId';
import { HistoryOwnerId } from '../domain/value-objects/HistoryOwnerId';
import { HistoryBlobRepository } from './ports/history-blob-repository';

export class UploadTooLargeError extends Error {
  constructor(readonly received: number) {
    super(
      `A single upload may carry at most ${MAX_UPLOAD_BATCH} blobs, got ${received}`
    );
    this.name = 'UploadTooLargeError';
  }
}

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);

  constructor(
    @Inject(HistoryBlobRepository)
    private readonly repository: HistoryBlobRepository
  ) {}

  async addHistory(
    ownerId: HistoryOwnerId,
    blobs: ReadonlyArray<IncomingHistoryBlob>
  ): Promise<{ stored: number }> {
    if (blobs.length > MAX_UPLOAD_BATCH) {
      throw new UploadTooLargeError(blobs.length);
    }
    if (blobs.length === 0) return { stored: 0 };

    const unique = new Map<string, IncomingHistoryBlob>();
    for (const blob of blobs) {
      const key = blob.id.unwrap();
      if (!unique.has(key)) unique.set(key, blob);
    }

    const stored = await this.repository.appendIfAbsent(ownerId, [
      ...unique.values(),
    ]);
    this.logger.debug(
      `Stored ${stored} of ${blobs.length} blobs for ${ownerId.unwrap()}`
    );
    return { stored };
  }

  async count(ownerId: HistoryOwnerId): Promise<number> {
    return this.repository.count(ownerId);
  }

  async syncHistory(
    ownerId: HistoryOwnerId,
    params: Readonly<{
      syncTs: Date;
      historyTs: Date;
      historyId?: HistoryBlobId;
      host?: string;
    }>
  ): Promise<HistoryBlob[]> {
    const page = await this.repository.loadPage(ownerId, {
      syncedBefore: params.syncTs,
      after: params.historyTs,
      afterId: params.historyId ?? null,
      excludeHost: params.host ? params.host : null,
      limit: HISTORY_PAGE_SIZE,
    });
    this.logger.debug(
      `Served ${page.length} blobs after ${params.historyTs.toISOString()} for ${ownerId.unwrap()}`
    );
    return page;
  }
}
