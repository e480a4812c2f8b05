import { Module } from '@nestjs/common';
import { AccessDatabaseService } from './database.service';

@Module({
  providers: [AccessDatabaseService],
  exports: [AccessDatabaseService],
})
export class AccessDatabaseModule {}
