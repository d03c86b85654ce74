import assert from 'node:assert';
import { Injectable } from '@nestjs/common';
import { EmbeddingService } from '../../embedding/embedding.service';
import type { ProcessingContext } from '../types/processing-context';
import { PipelineStep } from '../types/processing-context';
import type { IPipelineStep } from './pipeline-step.interface';

@Injectable()
export class EmbeddingStep implements IPipelineStep {
  public readonly stepName = PipelineStep.Embedding;

  public constructor(private readonly embeddingService: EmbeddingService) {}

  public async execute(context: ProcessingContext): Promise<ProcessingContext> {
    assert.ok(
      context.chunks,
      `[${context.correlationId}] Embedding failed. Chunks not found in context - chunking may have failed`,
    );

    const embeddings: number[][] = [];
    for (const chunk of context.chunks) {
      context.signal?.throwIfAborted();
      embeddings.push(await this.embeddingService.embed(chunk));
    }

    context.embeddings = embeddings;
    return context;
  }
}
