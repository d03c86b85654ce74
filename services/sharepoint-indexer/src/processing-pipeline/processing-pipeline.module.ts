import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessControlModule } from '../access-control/access-control.module';
import { ChunkingModule } from '../chunking/chunking.module';
import { EmbeddingModule } from '../embedding/embedding.module';
import { MetricsModule } from '../metrics/metrics.module';
import { SearchIndexModule } from '../search-index/search-index.module';
import { ItemProcessingOrchestratorService } from './item-processing-orchestrator.service';
import { ProcessingPipelineService } from './processing-pipeline.service';
import { ChunkingStep } from './steps/chunking.step';
import { DocumentAssemblyStep } from './steps/document-assembly.step';
import { EmbeddingStep } from './steps/embedding.step';
import { IndexUploadStep } from './steps/index-upload.step';

@Module({
  imports: [
    ConfigModule,
    MetricsModule,
    ChunkingModule,
    EmbeddingModule,
    AccessControlModule,
    SearchIndexModule,
  ],
  providers: [
    ProcessingPipelineService,
    ItemProcessingOrchestratorService,
    ChunkingStep,
    EmbeddingStep,
    DocumentAssemblyStep,
    IndexUploadStep,
  ],
  exports: [ProcessingPipelineService, ItemProcessingOrchestratorService],
})
export class ProcessingPipelineModule {}
