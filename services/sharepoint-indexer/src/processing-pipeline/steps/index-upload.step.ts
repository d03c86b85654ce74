import assert from 'node:assert';
import { Injectable, Logger } from '@nestjs/common';
import { sanitizeError } from '@sp-indexer/utils';
import { SearchIndexService } from '../../search-index/search-index.service';
import type { ProcessingContext } from '../types/processing-context';
import { PipelineStep } from '../types/processing-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class IndexUploadStep implements IPipelineStep {
  private readonly logger = new Logger(this.constructor.name);
  public readonly stepName = PipelineStep.IndexUpload;

  public constructor(private readonly searchIndexService: SearchIndexService) {}

  public async execute(context: ProcessingContext): Promise<ProcessingContext> {
    assert.ok(
      context.searchDocuments,
      `[${context.correlationId}] Index upload failed. Search documents not found in context - document assembly may have failed`,
    );

    try {
      context.indexedCount = await this.searchIndexService.uploadDocuments(
        context.searchDocuments,
        { signal: context.signal },
      );
      return context;
    } catch (error) {
      this.logger.error({
        msg: 'Index upload failed',
        correlationId: context.correlationId,
        documentId: context.document.id,
        chunkCount: context.searchDocuments.length,
        error: sanitizeError(error),
      });
      throw error;
    }
  }
}
