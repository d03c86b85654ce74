import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MetricsModule } from '../metrics/metrics.module';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { MicrosoftAuthenticationService } from './auth/microsoft-authentication.service';
import { FileFilterService } from './graph/file-filter.service';
import { GraphApiService } from './graph/graph-api.service';
import { GraphClientFactory } from './graph/graph-client.factory';
import { GraphAuthenticationService } from './graph/middlewares/graph-authentication.service';

@Module({
  imports: [ConfigModule, MetricsModule],
  providers: [
    MicrosoftAuthenticationService,
    GraphAuthenticationService,
    GraphClientFactory,
    FileFilterService,
    GraphApiService,
    BottleneckFactory,
  ],
  exports: [GraphApiService, FileFilterService],
})
export class MicrosoftApisModule {}
