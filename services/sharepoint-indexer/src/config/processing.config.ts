import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  CRON_EVERY_15_MINUTES,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_PROCESSING_CONCURRENCY,
  DEFAULT_STEP_TIMEOUT_SECONDS,
} from '../constants/defaults.constants';
import { SecurityGroup } from '../constants/security-group.constants';
import { getTenantConfig } from './tenant-config-loader';

export const ChunkingConfigSchema = z
  .object({
    strategy: z
      .enum(['fixed', 'recursive'])
      .prefault('fixed')
      .describe(
        'fixed: character windows of chunkSize, recursive: split on paragraphs, lines and words first',
      ),
    chunkSize: z.coerce
      .number()
      .int()
      .positive()
      .prefault(DEFAULT_CHUNK_SIZE)
      .describe('Maximum number of characters per chunk'),
    chunkOverlap: z.coerce
      .number()
      .int()
      .min(0)
      .prefault(DEFAULT_CHUNK_OVERLAP)
      .describe('Number of characters shared by two consecutive chunks'),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export const ProcessingConfigSchema = z.object({
  stepTimeoutSeconds: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_STEP_TIMEOUT_SECONDS)
    .describe(
      'Sets a time limit for a document processing step before it will stop and skip the document',
    ),
  concurrency: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_PROCESSING_CONCURRENCY)
    .describe('Sets how many documents are chunked, embedded and uploaded at once'),
  maxFileSizeBytes: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_MAX_FILE_SIZE_BYTES)
    .describe('Files larger than this are not downloaded'),
  scanIntervalCron: z
    .string()
    .prefault(CRON_EVERY_15_MINUTES)
    .describe('Cron expression for the scheduled indexing run'),
  chunking: ChunkingConfigSchema.prefault({}),
  securityGroups: z
    .record(z.string(), z.enum(SecurityGroup))
    .prefault({})
    .describe('SharePoint site group name to access-control label, merged over the defaults'),
});

export const processingConfig = registerAs('processing', (): ProcessingConfig =>
  ProcessingConfigSchema.parse(getTenantConfig().processing),
);

export type ProcessingConfig = z.infer<typeof ProcessingConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type ProcessingConfigNamespaced = { processing: ProcessingConfig };
