import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule, IndexingRunModule } from './app.module';
import { Config } from './config';
import { parseAppConfig } from './config/app.config';
import { hasFailures } from './indexing/indexing.types';
import { SharepointIndexingService } from './indexing/sharepoint-indexing.service';

export async function serve(): Promise<NestExpressApplication> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });

  const configService = app.get<ConfigService<Config, true>>(ConfigService);

  app.enableShutdownHooks();

  const logger = app.get(Logger);
  app.useLogger(logger);

  const port = configService.get('app.port', { infer: true });
  await app.listen(port);
  logger.log(`Server is running on http://localhost:${port}`);

  return app;
}

/** Runs a single synchronization and sets a non-zero exit code when anything failed. */
export async function runOnce(): Promise<void> {
  const app = await NestFactory.createApplicationContext(IndexingRunModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);

  try {
    const result = await app.get(SharepointIndexingService).synchronize();
    if (hasFailures(result)) {
      logger.error('Indexing run finished with failures');
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

export async function bootstrap(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const { runMode } = parseAppConfig(env);
  if (runMode === 'once') {
    await runOnce();
  } else {
    await serve();
  }
}
