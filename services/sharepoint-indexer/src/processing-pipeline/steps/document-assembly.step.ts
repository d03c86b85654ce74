import assert from 'node:assert';
import { Injectable } from '@nestjs/common';
import { zip } from 'remeda';
import { SecurityGroupService } from '../../access-control/security-group.service';
import type { SearchDocument } from '../../search-index/search-index.types';
import type { ProcessingContext } from '../types/processing-context';
import { PipelineStep } from '../types/processing-context';
import type { IPipelineStep } from './pipeline-step.interface';

export function buildChunkId(fileId: string, chunkIndex: number): string {
  return `${fileId}-${chunkIndex}`;
}

@Injectable()
export class DocumentAssemblyStep implements IPipelineStep {
  public readonly stepName = PipelineStep.DocumentAssembly;

  public constructor(private readonly securityGroupService: SecurityGroupService) {}

  public async execute(context: ProcessingContext): Promise<ProcessingContext> {
    const { chunks, embeddings, document } = context;
    assert.ok(chunks && embeddings, `[${context.correlationId}] Chunks or embeddings missing`);
    assert.equal(
      chunks.length,
      embeddings.length,
      `[${context.correlationId}] Got ${embeddings.length} embeddings for ${chunks.length} chunks`,
    );

    const securityGroup = this.securityGroupService.resolveAccessLabel(
      document.readAccessEntities,
    );
    const indexedAt = new Date().toISOString();

    context.searchDocuments = zip(chunks, embeddings).map(
      ([content, vector], chunkIndex): SearchDocument => ({
        id: buildChunkId(document.id, chunkIndex),
        file_id: document.id,
        chunk_index: chunkIndex,
        content,
        content_vector: vector,
        title: document.name,
        source: document.source ?? '',
        security_group: securityGroup,
        read_access_entities: document.readAccessEntities,
        created_by: document.createdBy,
        last_modified_by: document.lastModifiedBy,
        created_at: document.createdAt,
        last_modified_at: document.lastModifiedAt,
        indexed_at: indexedAt,
      }),
    );

    return context;
  }
}
