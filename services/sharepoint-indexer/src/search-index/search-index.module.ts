import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EmbeddingModule } from '../embedding/embedding.module';
import { MetricsModule } from '../metrics/metrics.module';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { SearchIndexHttpClient } from './search-index-http.client';
import { SearchIndexService } from './search-index.service';
import { SearchQueryService } from './search-query.service';

@Module({
  imports: [ConfigModule, MetricsModule, EmbeddingModule],
  providers: [BottleneckFactory, SearchIndexHttpClient, SearchIndexService, SearchQueryService],
  exports: [SearchIndexService, SearchQueryService],
})
export class SearchIndexModule {}
