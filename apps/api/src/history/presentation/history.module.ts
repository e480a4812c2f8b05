import { Module } from '@nestjs/common';
import { AccessModule } from '../../access/presentation/access.module';
import { HistoryService } from '../application/history.service';
import { HistoryBlobRepository } from '../application/ports/history-blob-repository';
import { HistoryDatabaseModule } from '../infrastructure/database.module';
import { KyselyHistoryBlobRepository } from '../infrastructure/kysely-history-blob.repository';
import { HistoryController } from './history.controller';

@Module({
  imports: [HistoryDatabaseModule, AccessModule],
  controllers: [HistoryController],
  providers: [
    HistoryService,
    {
      provide: HistoryBlobRepository,
      useClass: KyselyHistoryBlobRepository,
    },
  ],
  exports: [HistoryService],
})
export class HistoryModule {}
