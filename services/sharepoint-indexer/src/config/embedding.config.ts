import { registerAs } from '@nestjs/config';
import { Redacted } from '@sp-indexer/utils';
import { z } from 'zod';
import {
  DEFAULT_AZURE_OPENAI_API_VERSION,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
} from '../constants/defaults.constants';
import { getTenantConfig } from './tenant-config-loader';

export const EmbeddingConfigSchema = z
  .object({
    provider: z
      .enum(['openai', 'azure-openai'])
      .prefault('openai')
      .describe('Which embedding endpoint flavour is called'),
    model: z
      .string()
      .nonempty()
      .prefault(DEFAULT_EMBEDDING_MODEL)
      .describe('Model name, or the deployment name for azure-openai'),
    endpoint: z
      .url()
      .optional()
      .describe('Base URL of the endpoint, required for azure-openai'),
    apiVersion: z
      .string()
      .prefault(DEFAULT_AZURE_OPENAI_API_VERSION)
      .describe('API version sent to azure-openai'),
    dimensions: z.coerce
      .number()
      .int()
      .positive()
      .prefault(DEFAULT_EMBEDDING_DIMENSIONS)
      .describe('Length of the embedding vectors, must match the index definition'),
    // Not part of the YAML, injected from EMBEDDING_API_KEY
    apiKey: z
      .string({ error: 'EMBEDDING_API_KEY must be set' })
      .nonempty()
      .transform((val) => new Redacted(val)),
    retry: z
      .object({
        maxAttempts: z.coerce.number().int().positive().prefault(5),
        baseDelayMs: z.coerce.number().int().positive().prefault(1000),
        maxDelayMs: z.coerce.number().int().positive().prefault(30_000),
      })
      .prefault({})
      .describe('Exponential backoff applied to failed embedding requests'),
  })
  .refine((config) => config.provider !== 'azure-openai' || Boolean(config.endpoint), {
    message: 'endpoint is required when provider is azure-openai',
    path: ['endpoint'],
  });

export function parseEmbeddingConfig(
  yamlConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): EmbeddingConfig {
  return EmbeddingConfigSchema.parse({ ...yamlConfig, apiKey: env.EMBEDDING_API_KEY });
}

export const embeddingConfig = registerAs('embedding', (): EmbeddingConfig =>
  parseEmbeddingConfig(getTenantConfig().embedding),
);

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type EmbeddingConfigNamespaced = { embedding: EmbeddingConfig };
