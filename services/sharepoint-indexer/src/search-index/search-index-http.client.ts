import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { type Counter, type Histogram } from '@opentelemetry/api';
import {
  createApiMethodExtractor,
  elapsedMilliseconds,
  elapsedSeconds,
  getHttpStatusCodeClass,
  getSlowRequestDurationBucket,
  normalizeError,
  sanitizeError,
} from '@sp-indexer/utils';
import Bottleneck from 'bottleneck';
import { Client, Dispatcher, interceptors } from 'undici';
import { Config } from '../config';
import {
  SPI_SEARCH_API_REQUEST_DURATION_SECONDS,
  SPI_SEARCH_API_SLOW_REQUESTS_TOTAL,
} from '../metrics';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { SearchIndexError } from './search-index.errors';

export interface SearchRequestOptions {
  method: 'GET' | 'PUT' | 'POST';
  path: string;
  body?: unknown;
}

export interface SearchResponse {
  statusCode: number;
  body: unknown;
}

/**
 * Rate-limited JSON client for the Azure AI Search REST API. Adds the api-key header and
 * api-version query parameter and turns status codes of 400 and above into SearchIndexError.
 */
@Injectable()
export class SearchIndexHttpClient implements OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly limiter: Bottleneck;
  private readonly httpClient: Dispatcher;
  private readonly extractApiMethod = createApiMethodExtractor(['indexes', 'docs', 'index', 'search']);

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    private readonly bottleneckFactory: BottleneckFactory,
    @Inject(SPI_SEARCH_API_REQUEST_DURATION_SECONDS)
    private readonly spiSearchApiRequestDurationSeconds: Histogram,
    @Inject(SPI_SEARCH_API_SLOW_REQUESTS_TOTAL)
    private readonly spiSearchApiSlowRequestsTotal: Counter,
  ) {
    const searchUrl = new URL(this.configService.get('search.endpoint', { infer: true }));
    const interceptorsInCallingOrder = [
      interceptors.redirect({
        maxRedirections: 10,
      }),
      // Index PUT and mergeOrUpload can be repeated without side effects
      interceptors.retry({
        maxRetries: 3,
        minTimeout: 3_000,
        methods: ['GET', 'PUT', 'POST'],
        throwOnError: false,
      }),
    ];

    const httpClient = new Client(`${searchUrl.protocol}//${searchUrl.host}`, {
      bodyTimeout: 60_000,
      headersTimeout: 30_000,
      connectTimeout: 15_000,
    });
    this.httpClient = httpClient.compose(interceptorsInCallingOrder.reverse());

    this.limiter = this.bottleneckFactory.createPerMinuteLimiter(
      this.configService.get('search.apiRateLimitPerMinute', { infer: true }),
      'Search API',
    );
  }

  public async onModuleDestroy(): Promise<void> {
    await this.httpClient.close();
  }

  public async request(options: SearchRequestOptions): Promise<SearchResponse> {
    return await this.limiter.schedule(async () => {
      const startTime = Date.now();
      const apiMethod = this.extractApiMethod(options.path, options.method);
      let statusCode = 0;

      try {
        const result = await this.httpClient.request({
          method: options.method,
          path: this.withApiVersion(options.path),
          headers: {
            'api-key': this.configService.get('search.apiKey', { infer: true }).value,
            'Content-Type': 'application/json',
          },
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
        });
        statusCode = result.statusCode;

        if (result.statusCode >= 400) {
          const responseBody = await result.body.text();
          throw new SearchIndexError(
            `Search API responded with status ${result.statusCode}`,
            result.statusCode,
            responseBody,
          );
        }

        const text = await result.body.text();
        return { statusCode: result.statusCode, body: text ? JSON.parse(text) : null };
      } catch (error) {
        this.logger.error({
          msg: `Failed search API request: ${normalizeError(error).message}`,
          method: options.method,
          apiMethod,
          error: sanitizeError(error),
        });
        throw error;
      } finally {
        this.recordMetrics(apiMethod, statusCode, startTime);
      }
    });
  }

  private withApiVersion(path: string): string {
    const apiVersion = this.configService.get('search.apiVersion', { infer: true });
    const separator = path.includes('?') ? '&' : '?';
    return `${path}${separator}api-version=${encodeURIComponent(apiVersion)}`;
  }

  private recordMetrics(apiMethod: string, statusCode: number, startTime: number): void {
    const isSuccess = statusCode >= 200 && statusCode < 400;
    this.spiSearchApiRequestDurationSeconds.record(elapsedSeconds(startTime), {
      api_method: apiMethod,
      result: isSuccess ? 'success' : 'error',
      http_status_class: getHttpStatusCodeClass(statusCode),
    });

    const duration = elapsedMilliseconds(startTime);
    const slowRequestDurationBucket = getSlowRequestDurationBucket(duration);
    if (slowRequestDurationBucket) {
      this.spiSearchApiSlowRequestsTotal.add(1, {
        api_method: apiMethod,
        duration_bucket: slowRequestDurationBucket,
      });
      this.logger.warn({
        msg: 'Slow search API request detected',
        apiMethod,
        duration,
        durationBucket: slowRequestDurationBucket,
      });
    }
  }
}
