import { registerAs } from '@nestjs/config';
import { Redacted } from '@sp-indexer/utils';
import { z } from 'zod';
import {
  DEFAULT_SEARCH_API_RATE_LIMIT_PER_MINUTE,
  DEFAULT_SEARCH_API_VERSION,
  DEFAULT_SEARCH_UPLOAD_BATCH_SIZE,
  DEFAULT_SEMANTIC_CONFIGURATION_NAME,
  DEFAULT_VECTOR_PROFILE_NAME,
  MAX_SEARCH_UPLOAD_BATCH_SIZE,
} from '../constants/defaults.constants';
import { getTenantConfig } from './tenant-config-loader';

export const SearchConfigSchema = z.object({
  endpoint: z
    .url()
    .refine((url) => !url.endsWith('/'), {
      message: 'Search endpoint must not end with a trailing slash',
    })
    .describe('Azure AI Search service URL, e.g. https://<service>.search.windows.net'),
  indexName: z.string().nonempty().describe('Name of the index the chunks are written to'),
  apiVersion: z.string().prefault(DEFAULT_SEARCH_API_VERSION).describe('REST API version'),
  uploadBatchSize: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_SEARCH_UPLOAD_BATCH_SIZE)
    .prefault(DEFAULT_SEARCH_UPLOAD_BATCH_SIZE)
    .describe('Number of documents sent per index request'),
  semanticConfigurationName: z
    .string()
    .prefault(DEFAULT_SEMANTIC_CONFIGURATION_NAME)
    .describe('Name of the semantic ranking configuration'),
  vectorProfileName: z
    .string()
    .prefault(DEFAULT_VECTOR_PROFILE_NAME)
    .describe('Name of the vector search profile used by content_vector'),
  apiRateLimitPerMinute: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_SEARCH_API_RATE_LIMIT_PER_MINUTE)
    .describe('Number of Azure AI Search requests allowed per minute'),
  // Not part of the YAML, injected from SEARCH_API_KEY
  apiKey: z
    .string({ error: 'SEARCH_API_KEY must be set' })
    .nonempty()
    .transform((val) => new Redacted(val)),
});

export function parseSearchConfig(
  yamlConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): SearchConfig {
  return SearchConfigSchema.parse({ ...yamlConfig, apiKey: env.SEARCH_API_KEY });
}

export const searchConfig = registerAs('search', (): SearchConfig =>
  parseSearchConfig(getTenantConfig().search),
);

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SearchConfigNamespaced = { search: SearchConfig };
