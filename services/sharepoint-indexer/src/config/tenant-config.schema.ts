import { z } from 'zod';

const NamespaceSchema = z.record(z.string(), z.unknown());

// Every namespace is validated by its own schema when it is registered, this only checks the shape
export const TenantConfigSchema = z.object({
  sharepoint: NamespaceSchema.describe('SharePoint authentication and the sources to index'),
  processing: NamespaceSchema.prefault({}).describe('Pipeline, chunking and scheduling settings'),
  embedding: NamespaceSchema.prefault({}).describe('Embedding endpoint settings'),
  search: NamespaceSchema.describe('Azure AI Search index settings'),
});

export type TenantConfig = z.infer<typeof TenantConfigSchema>;
