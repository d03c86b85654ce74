export const SPI_SYNC_DURATION_SECONDS = 'SPI_SYNC_DURATION_SECONDS';
export const SPI_INGESTION_FILE_PROCESSED_TOTAL = 'SPI_INGESTION_FILE_PROCESSED_TOTAL';
export const SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS = 'SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS';
export const SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL = 'SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL';
export const SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL = 'SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL';
export const SPI_SEARCH_API_REQUEST_DURATION_SECONDS = 'SPI_SEARCH_API_REQUEST_DURATION_SECONDS';
export const SPI_SEARCH_API_SLOW_REQUESTS_TOTAL = 'SPI_SEARCH_API_SLOW_REQUESTS_TOTAL';
export const SPI_EMBEDDING_REQUESTS_TOTAL = 'SPI_EMBEDDING_REQUESTS_TOTAL';

export const REQUEST_DURATION_BUCKET_BOUNDARIES = [0.1, 0.25, 0.5, 1, 2, 5, 10, 30];
