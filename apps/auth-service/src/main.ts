/**
 * Tollgate Auth Service
 * Port 8001
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ERRORS, TollgateErrorFilter } from '@tollgate/common/errors';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Auth Service');
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  // Global exception filter for TollgateError
  app.useGlobalFilters(new TollgateErrorFilter());

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors) =>
        ERRORS.ValidationError(
          errors.flatMap((error) => Object.values(error.constraints ?? {})).join('; ') ||
            'Invalid request body',
        ),
    }),
  );

  const corsOrigin = config.get<string>('corsOrigin');
  if (!corsOrigin) {
    throw new Error('CORS_ORIGIN environment variable must be set for auth service');
  }

  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  const port = config.get<number>('authServicePort') ?? 8001;
  await app.listen(port);

  logger.log(`Auth Service listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Auth Service', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
