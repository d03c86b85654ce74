import { Module } from '@nestjs/common';
import { ValueType } from '@opentelemetry/api';
import { MetricService } from 'nestjs-otel';
import {
  REQUEST_DURATION_BUCKET_BOUNDARIES,
  SPI_EMBEDDING_REQUESTS_TOTAL,
  SPI_INGESTION_FILE_PROCESSED_TOTAL,
  SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS,
  SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL,
  SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL,
  SPI_SEARCH_API_REQUEST_DURATION_SECONDS,
  SPI_SEARCH_API_SLOW_REQUESTS_TOTAL,
  SPI_SYNC_DURATION_SECONDS,
} from './metrics.tokens';

@Module({
  providers: [
    {
      provide: SPI_SYNC_DURATION_SECONDS,
      useFactory: (metricService: MetricService) => {
        return metricService.getHistogram('spi_sync_duration_seconds', {
          description: 'Duration of indexing runs (per source and full run)',
          valueType: ValueType.DOUBLE,
          advice: {
            explicitBucketBoundaries: [10, 30, 60, 300, 600, 1800, 3600],
          },
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_INGESTION_FILE_PROCESSED_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('spi_ingestion_file_processed_total', {
          description: 'Number of documents processed by indexing pipeline steps',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS,
      useFactory: (metricService: MetricService) => {
        return metricService.getHistogram('spi_ms_graph_api_request_duration_seconds', {
          description: 'Request latency for Microsoft Graph API calls',
          valueType: ValueType.DOUBLE,
          advice: {
            explicitBucketBoundaries: REQUEST_DURATION_BUCKET_BOUNDARIES,
          },
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('spi_ms_graph_api_throttle_events_total', {
          description: 'Number of Microsoft Graph API throttling events',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('spi_ms_graph_api_slow_requests_total', {
          description: 'Number of slow Microsoft Graph API requests',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_SEARCH_API_REQUEST_DURATION_SECONDS,
      useFactory: (metricService: MetricService) => {
        return metricService.getHistogram('spi_search_api_request_duration_seconds', {
          description: 'Request latency for Azure AI Search REST calls',
          valueType: ValueType.DOUBLE,
          advice: {
            explicitBucketBoundaries: REQUEST_DURATION_BUCKET_BOUNDARIES,
          },
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_SEARCH_API_SLOW_REQUESTS_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('spi_search_api_slow_requests_total', {
          description: 'Number of slow Azure AI Search REST calls',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
    {
      provide: SPI_EMBEDDING_REQUESTS_TOTAL,
      useFactory: (metricService: MetricService) => {
        return metricService.getCounter('spi_embedding_requests_total', {
          description: 'Number of embedding requests by result',
          valueType: ValueType.INT,
        });
      },
      inject: [MetricService],
    },
  ],
  exports: [
    SPI_SYNC_DURATION_SECONDS,
    SPI_INGESTION_FILE_PROCESSED_TOTAL,
    SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS,
    SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL,
    SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL,
    SPI_SEARCH_API_REQUEST_DURATION_SECONDS,
    SPI_SEARCH_API_SLOW_REQUESTS_TOTAL,
    SPI_EMBEDDING_REQUESTS_TOTAL,
  ],
})
export class MetricsModule {}
