import 'reflect-metadata';
import { Logger, type LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import type { AppConfig } from './config/index.js';

const CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

// base64 inflates payloads by a third; the rest is room for the JSON envelope
const BODY_OVERHEAD_BYTES = 64 * 1024;

type AppSettings = AppConfig['app'];

function logLevelsFor(app: AppSettings): LogLevel[] {
  if (app.nodeEnv === 'test') {
    return ['error'];
  }
  switch (app.logLevel) {
    case 'debug':
      return ['log', 'error', 'warn', 'debug'];
    case 'warn':
      return ['error', 'warn'];
    case 'error':
      return ['error'];
    default:
      return app.nodeEnv === 'production'
        ? ['error', 'warn']
        : ['log', 'error', 'warn'];
  }
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const configService = app.get<ConfigService<AppConfig>>(ConfigService);
  const appSettings = configService.get<AppSettings>('app');
  const maxDocumentBytes =
    configService.get<AppConfig['ingestion']>('ingestion')?.maxDocumentBytes ??
    20 * 1024 * 1024;

  if (appSettings) {
    app.useLogger(logLevelsFor(appSettings));
  }
  app.enableCors({ origin: CORS_ORIGINS, credentials: true });
  app.useBodyParser('json', {
    limit: Math.ceil((maxDocumentBytes * 4) / 3) + BODY_OVERHEAD_BYTES,
  });
  app.enableShutdownHooks();

  const port = appSettings?.port ?? 3000;
  await app.listen(port);
  Logger.log(
    `HTTP server listening on port ${port} (env: ${appSettings?.nodeEnv ?? 'development'})`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  const code =
    typeof error === 'object' && error !== null && 'code' in error
      ? error.code
      : undefined;
  if (code === 'EADDRINUSE') {
    Logger.error(
      'Port is already in use. Please stop other instances or change PORT.',
      'Bootstrap',
    );
  } else {
    Logger.error(
      `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
      'Bootstrap',
    );
  }
  process.exit(1);
});
