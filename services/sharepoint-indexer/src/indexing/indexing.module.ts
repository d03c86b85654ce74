import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ExtractionModule } from '../extraction/extraction.module';
import { MetricsModule } from '../metrics/metrics.module';
import { MicrosoftApisModule } from '../microsoft-apis/microsoft-apis.module';
import { ProcessingPipelineModule } from '../processing-pipeline/processing-pipeline.module';
import { SearchIndexModule } from '../search-index/search-index.module';
import { SharepointIndexingService } from './sharepoint-indexing.service';

@Module({
  imports: [
    ConfigModule,
    MetricsModule,
    MicrosoftApisModule,
    ExtractionModule,
    ProcessingPipelineModule,
    SearchIndexModule,
  ],
  providers: [SharepointIndexingService],
  exports: [SharepointIndexingService],
})
export class IndexingModule {}
