import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { MAX_UPLOAD_BODY_BYTES } from '@shellsync/sync-engine';
import { ErrorResponseFilter } from './platform/presentation/error-response.filter';

/** Shared by the entry point and the tests so both serve the same HTTP surface. */
export const configureApp = (app: NestExpressApplication): void => {
  app.useBodyParser('json', { limit: MAX_UPLOAD_BODY_BYTES });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    })
  );
  app.useGlobalFilters(new ErrorResponseFilter());
};
