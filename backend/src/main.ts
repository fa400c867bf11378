import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { AppErrorFilter } from './common/index.js';

async function bootstrap() {
  const nodeEnv = process.env.NODE_ENV ?? 'development';

  // production: warn and error only; test: error only
  const logLevels: LogLevel[] =
    nodeEnv === 'production'
      ? ['error', 'warn']
      : nodeEnv === 'test'
        ? ['error']
        : ['log', 'error', 'warn'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
    bodyParser: false,
  });

  // uploads arrive as base64 inside JSON
  app.useBodyParser('json', { limit: '50mb' });
  app.useBodyParser('urlencoded', { extended: true, limit: '50mb' });
  app.useGlobalFilters(new AppErrorFilter());
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port', 3000);

  try {
    await app.listen(port);
    Logger.log(
      `HTTP server listening on port ${port} (env: ${nodeEnv})`,
      'Bootstrap',
    );
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Please stop other instances or change the port.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to start server: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
