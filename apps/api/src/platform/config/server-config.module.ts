import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  ServerConfig,
  validateServerEnv,
  type ServerEnv,
} from './server-config';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateServerEnv,
    }),
  ],
  providers: [
    {
      provide: ServerConfig,
      useFactory: (config: ConfigService<ServerEnv, true>) =>
        new ServerConfig({
          DATABASE_URL: config.get('DATABASE_URL', { infer: true }),
          PORT: config.get('PORT', { infer: true }),
          OPEN_REGISTRATION: config.get('OPEN_REGISTRATION', { infer: true }),
          SESSION_TTL_DAYS: config.get('SESSION_TTL_DAYS', { infer: true }),
          SESSION_CACHE_TTL_MS: config.get('SESSION_CACHE_TTL_MS', {
            infer: true,
          }),
        }),
      inject: [ConfigService],
    },
  ],
  exports: [ServerConfig],
})
export class ServerConfigModule {}
