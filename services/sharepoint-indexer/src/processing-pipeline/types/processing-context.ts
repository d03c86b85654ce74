import type { ExtractedDocument } from '../../extraction/extraction.types';
import type { SearchDocument } from '../../search-index/search-index.types';

export interface ProcessingContext {
  correlationId: string;
  siteId: string;
  document: ExtractedDocument;
  startTime: Date;
  /** Aborted when the running step times out. */
  signal?: AbortSignal;
  chunks?: string[];
  embeddings?: number[][];
  searchDocuments?: SearchDocument[];
  indexedCount?: number;
}

export interface PipelineResult {
  success: boolean;
}

export const PipelineStep = {
  Chunking: 'Chunking',
  Embedding: 'Embedding',
  DocumentAssembly: 'DocumentAssembly',
  IndexUpload: 'IndexUpload',
} as const;
export type PipelineStep = (typeof PipelineStep)[keyof typeof PipelineStep];
