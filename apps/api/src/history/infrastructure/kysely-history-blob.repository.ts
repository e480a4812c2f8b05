import { Inject, Injectable } from '@nestjs/common';
import { HistoryBlobRepository } from '../application/ports/history-blob-repository';
import type {
  HistoryBlob,
  HistoryPageQuery,
  IncomingHistoryBlob,
} from '../domain/HistoryBlob';
import { HistoryBlobId } from '../domain/value-objects/HistoryBlobId';
import { HistoryOwnerId } from '../domain/value-objects/HistoryOwnerId';
import { HistoryDatabaseService } from './database.service';

@Injectable()
export class KyselyHistoryBlobRepository extends HistoryBlobRepository {
  constructor(
    @Inject(HistoryDatabaseService)
    private readonly dbService: HistoryDatabaseService
  ) {
    super();
  }

  async appendIfAbsent(
    ownerId: HistoryOwnerId,
    blobs: ReadonlyArray<IncomingHistoryBlob>
  ): Promise<number> {
    if (blobs.length === 0) return 0;
    const inserted = await this.dbService
      .getDb()
      .insertInto('history.blobs')
      .values(
        blobs.map((blob) => ({
          user_id: ownerId.unwrap(),
          client_id: blob.id.unwrap(),
          timestamp: blob.timestamp,
          hostname: blob.hostname,
          data: blob.data,
        }))
      )
      .onConflict((oc) => oc.columns(['user_id', 'client_id']).doNothing())
      .returning('client_id')
      .execute();
    return inserted.length;
  }

  async count(ownerId: HistoryOwnerId): Promise<number> {
    const row = await this.dbService
      .getDb()
      .selectFrom('history.blobs')
      .select(({ fn }) => fn.countAll<string>().as('count'))
      .where('user_id', '=', ownerId.unwrap())
      .executeTakeFirst();
    return Number(row?.count ?? 0);
  }

  async loadPage(
    ownerId: HistoryOwnerId,
    query: HistoryPageQuery
  ): Promise<HistoryBlob[]> {
    const afterId = query.afterId?.unwrap() ?? null;
    let select = this.dbService
      .getDb()
      .selectFrom('history.blobs')
      .select(['client_id', 'timestamp', 'hostname', 'data'])
      .where('user_id', '=', ownerId.unwrap())
      .where('created_at', '<=', query.syncedBefore)
      .where((eb) =>
        afterId === null
          ? eb('timestamp', '>', query.after)
          : eb.or([
              eb('timestamp', '>', query.after),
              eb.and([
                eb('timestamp', '=', query.after),
                eb('client_id', '>', afterId),
              ]),
            ])
      );
    if (query.excludeHost !== null) {
      select = select.where('hostname', '<>', query.excludeHost);
    }

    const rows = await select
      .orderBy('timestamp', 'asc')
      .orderBy('client_id', 'asc')
      .limit(query.limit)
      .execute();

    return rows.map<HistoryBlob>((row) => ({
      id: HistoryBlobId.from(row.client_id),
      timestamp: row.timestamp,
      hostname: row.hostname,
      data: row.data,
    }));
  }
}
