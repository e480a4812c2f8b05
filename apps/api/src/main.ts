import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { ServerConfig } from './platform/config/server-config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });
  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get(ServerConfig);
  await app.listen(config.port);
  new Logger('Bootstrap').log(`Listening on port ${config.port}`);
}

void bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Server failed to start',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
