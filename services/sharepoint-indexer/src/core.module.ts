import { createLoggerOptions } from '@sp-indexer/logger';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { OpenTelemetryModule } from 'nestjs-otel';
import { LoggerModule } from 'nestjs-pino';
import { AppConfig, appConfig } from './config/app.config';
import { embeddingConfig } from './config/embedding.config';
import { processingConfig } from './config/processing.config';
import { searchConfig } from './config/search.config';
import { sharepointConfig } from './config/sharepoint.config';

export const SERVICE_NAME = 'sharepoint-indexer';

/** Configuration, logging and metrics shared by the scheduled service and the one-off run. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [appConfig, sharepointConfig, processingConfig, embeddingConfig, searchConfig],
    }),
    LoggerModule.forRootAsync({
      useFactory(appConfig: AppConfig) {
        return createLoggerOptions({
          level: appConfig.logLevel,
          serviceName: SERVICE_NAME,
          production: !appConfig.isDev,
        });
      },
      inject: [appConfig.KEY],
    }),
    OpenTelemetryModule.forRoot({
      metrics: {
        hostMetrics: true,
        apiMetrics: {
          enable: true,
        },
      },
    }),
  ],
})
export class CoreModule {}
