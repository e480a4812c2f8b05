import { Module } from '@nestjs/common';
import { HistoryDatabaseService } from './database.service';

@Module({
  providers: [HistoryDatabaseService],
  exports: [HistoryDatabaseService],
})
export class HistoryDatabaseModule {}
