import { z } from 'zod';
import type { SecurityGroup } from '../constants/security-group.constants';

// Field names follow the index schema, hence snake_case
export interface SearchDocument {
  id: string;
  file_id: string;
  chunk_index: number;
  content: string;
  content_vector: number[];
  title: string;
  source: string;
  security_group: SecurityGroup;
  read_access_entities: string[];
  created_by: string | null;
  last_modified_by: string | null;
  created_at: string | null;
  last_modified_at: string | null;
  indexed_at: string;
}

export const IndexingResultSchema = z.object({
  value: z.array(
    z.object({
      key: z.string(),
      status: z.boolean(),
      errorMessage: z.string().nullish(),
      statusCode: z.number(),
    }),
  ),
});

export const SearchResponseSchema = z.object({
  value: z.array(
    z.looseObject({
      '@search.score': z.number(),
      '@search.rerankerScore': z.number().nullish(),
      content: z.string().nullish(),
    }),
  ),
});

export interface HybridSearchResult {
  score: number;
  rerankerScore: number | null;
  content: string;
}

export interface HybridSearchOptions {
  topK?: number;
}
