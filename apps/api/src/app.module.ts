import { Module } from '@nestjs/common';
import { AccessModule } from './access/presentation/access.module';
import { HistoryModule } from './history/presentation/history.module';
import { ServerConfigModule } from './platform/config/server-config.module';
import { DatabaseModule } from './platform/infrastructure/database/database.module';
import { HealthController } from './platform/presentation/health.controller';

@Module({
  imports: [ServerConfigModule, DatabaseModule, AccessModule, HistoryModule],
  controllers: [HealthController],
})
export class AppModule {}
