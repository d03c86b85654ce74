import assert from 'node:assert';
import { Injectable, Logger } from '@nestjs/common';
import { TextChunkerService } from '../../chunking/text-chunker.service';
import type { ProcessingContext } from '../types/processing-context';
import { PipelineStep } from '../types/processing-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class ChunkingStep implements IPipelineStep {
  private readonly logger = new Logger(this.constructor.name);
  public readonly stepName = PipelineStep.Chunking;

  public constructor(private readonly textChunkerService: TextChunkerService) {}

  public async execute(context: ProcessingContext): Promise<ProcessingContext> {
    const { content } = context.document;
    assert.ok(content, `[${context.correlationId}] Chunking failed. Document has no content`);

    context.chunks = await this.textChunkerService.split(content);
    assert.ok(
      context.chunks.length > 0,
      `[${context.correlationId}] Chunking failed. Content produced no chunks`,
    );

    this.logger.debug({
      msg: 'Split document into chunks',
      correlationId: context.correlationId,
      documentId: context.document.id,
      chunkCount: context.chunks.length,
    });
    return context;
  }
}
