export const DEFAULT_PROCESSING_CONCURRENCY = 4 as const;
export const DEFAULT_STEP_TIMEOUT_SECONDS = 120 as const;
export const DEFAULT_MAX_FILE_SIZE_BYTES = 104857600 as const; // 100MB

export const DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE = 780000 as const; // this is the maximum number of requests allowed per minute for the Microsoft Graph API
export const DEFAULT_SEARCH_API_RATE_LIMIT_PER_MINUTE = 600 as const;

export const DEFAULT_CHUNK_SIZE = 1000 as const;
export const DEFAULT_CHUNK_OVERLAP = 200 as const;

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small' as const;
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536 as const;
export const DEFAULT_AZURE_OPENAI_API_VERSION = '2024-10-21' as const;

export const DEFAULT_SEARCH_API_VERSION = '2024-07-01' as const;
export const DEFAULT_SEARCH_UPLOAD_BATCH_SIZE = 100 as const;
// Azure AI Search rejects index batches above 1000 documents
export const MAX_SEARCH_UPLOAD_BATCH_SIZE = 1000 as const;
export const DEFAULT_SEMANTIC_CONFIGURATION_NAME = 'config' as const;
export const DEFAULT_VECTOR_PROFILE_NAME = 'vector-profile' as const;

export const HYBRID_SEARCH_VECTOR_K = 50 as const;
export const HYBRID_SEARCH_DEFAULT_TOP = 5 as const;
export const SEARCH_RESULT_CONTENT_MAX_LENGTH = 1000 as const;

export const CRON_EVERY_15_MINUTES = '*/15 * * * *' as const;

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default' as const;
