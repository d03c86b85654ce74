import type { SearchConfig } from '../config/search.config';

interface IndexDefinitionOptions {
  search: Pick<SearchConfig, 'indexName' | 'semanticConfigurationName' | 'vectorProfileName'>;
  dimensions: number;
}

const HNSW_ALGORITHM_NAME = 'hnsw-config';

/** Builds the Azure AI Search index body for chunk documents. */
export function buildIndexDefinition({ search, dimensions }: IndexDefinitionOptions) {
  return {
    name: search.indexName,
    fields: [
      { name: 'id', type: 'Edm.String', key: true, filterable: true },
      { name: 'file_id', type: 'Edm.String', filterable: true },
      { name: 'chunk_index', type: 'Edm.Int32', filterable: true, sortable: true },
      { name: 'content', type: 'Edm.String', searchable: true },
      {
        name: 'content_vector',
        type: 'Collection(Edm.Single)',
        searchable: true,
        retrievable: false,
        dimensions,
        vectorSearchProfile: search.vectorProfileName,
      },
      { name: 'title', type: 'Edm.String', searchable: true },
      { name: 'source', type: 'Edm.String', filterable: true },
      { name: 'security_group', type: 'Edm.String', filterable: true, facetable: true },
      { name: 'read_access_entities', type: 'Collection(Edm.String)', filterable: true },
      { name: 'created_by', type: 'Edm.String', filterable: true },
      { name: 'last_modified_by', type: 'Edm.String', filterable: true },
      { name: 'created_at', type: 'Edm.DateTimeOffset', filterable: true, sortable: true },
      { name: 'last_modified_at', type: 'Edm.DateTimeOffset', filterable: true, sortable: true },
      { name: 'indexed_at', type: 'Edm.DateTimeOffset', filterable: true, sortable: true },
    ],
    vectorSearch: {
      algorithms: [
        {
          name: HNSW_ALGORITHM_NAME,
          kind: 'hnsw',
          hnswParameters: { m: 4, efConstruction: 400, efSearch: 500, metric: 'cosine' },
        },
      ],
      profiles: [{ name: search.vectorProfileName, algorithm: HNSW_ALGORITHM_NAME }],
    },
    semantic: {
      configurations: [
        {
          name: search.semanticConfigurationName,
          prioritizedFields: {
            titleField: { fieldName: 'title' },
            prioritizedContentFields: [{ fieldName: 'content' }],
          },
        },
      ],
    },
  };
}

export type IndexDefinition = ReturnType<typeof buildIndexDefinition>;
