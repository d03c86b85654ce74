import {
  Context,
  GraphClientError,
  GraphError,
  Middleware,
} from '@microsoft/microsoft-graph-client';
import { Logger } from '@nestjs/common';
import type { Counter, Histogram } from '@opentelemetry/api';
import {
  createApiMethodExtractor,
  elapsedMilliseconds,
  elapsedSeconds,
  getHttpStatusCodeClass,
  getSlowRequestDurationBucket,
  smearPath,
} from '@sp-indexer/utils';
import { GraphApiErrorResponse, isGraphApiError } from '../types/sharepoint.types';

export interface GraphMetricsInstruments {
  requestDurationHistogram: Histogram;
  throttleEventsCounter: Counter;
  slowRequestsCounter: Counter;
}

const extractApiMethod = createApiMethodExtractor([
  'sites',
  'drive',
  'drives',
  'root',
  'items',
  'children',
  'content',
  'permissions',
  'pages',
  'microsoft.graph.sitePage',
]);

export class MetricsMiddleware implements Middleware {
  private readonly logger = new Logger(this.constructor.name);
  private nextMiddleware: Middleware | undefined;

  public constructor(
    private readonly instruments: GraphMetricsInstruments,
    private readonly msTenantId: string,
    private readonly shouldConcealLogs: boolean,
  ) {}

  public async execute(context: Context): Promise<void> {
    if (!this.nextMiddleware) throw new Error('Next middleware not set');

    const endpoint = this.extractEndpoint(context.request);
    const method = context.options?.method?.toUpperCase() || 'GET';
    const apiMethod = extractApiMethod(endpoint, method);
    const loggedEndpoint = smearPath(endpoint, this.shouldConcealLogs);
    const startTime = Date.now();

    try {
      await this.nextMiddleware.execute(context);
    } catch (error) {
      const duration = elapsedMilliseconds(startTime);
      this.record(apiMethod, 0, startTime);

      this.logger.error({
        msg: 'Graph API request failed',
        endpoint: loggedEndpoint,
        method,
        duration,
        error: this.extractGraphErrorDetails(error),
      });

      throw error;
    }

    const duration = elapsedMilliseconds(startTime);
    const statusCode = context.response?.status ?? 0;
    this.record(apiMethod, statusCode, startTime);

    this.logger.debug({
      msg: 'Graph API request completed',
      endpoint: loggedEndpoint,
      method,
      statusCode,
      duration,
    });

    if (this.isThrottled(context.response)) {
      const policy = this.getThrottlePolicy(context.response);
      this.instruments.throttleEventsCounter.add(1, {
        ms_tenant_id: this.msTenantId,
        api_method: apiMethod,
        policy,
      });

      this.logger.warn({
        msg: 'Graph API request throttled',
        endpoint: loggedEndpoint,
        method,
        statusCode,
        policy,
        duration,
      });
    }
  }

  public setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }

  private record(apiMethod: string, statusCode: number, startTime: number): void {
    const isSuccess = statusCode >= 200 && statusCode < 400;

    this.instruments.requestDurationHistogram.record(elapsedSeconds(startTime), {
      ms_tenant_id: this.msTenantId,
      api_method: apiMethod,
      result: isSuccess ? 'success' : 'error',
      http_status_class: getHttpStatusCodeClass(statusCode),
    });

    const durationBucket = getSlowRequestDurationBucket(elapsedMilliseconds(startTime));
    if (durationBucket) {
      this.instruments.slowRequestsCounter.add(1, {
        ms_tenant_id: this.msTenantId,
        api_method: apiMethod,
        duration_bucket: durationBucket,
      });
    }
  }

  private extractEndpoint(request: RequestInfo): string {
    const url = typeof request === 'string' ? request : request.url;
    if (!URL.canParse(url)) return 'unknown';
    const endpoint = new URL(url).pathname.replace(/^\/(v\d+(\.\d+)?|beta)/, '');
    return decodeURIComponent(endpoint) || '/';
  }

  private isThrottled(response: Response | undefined): boolean {
    if (!response) return false;
    if (response.status === 429) return true;
    return response.status === 503 && response.headers.has('Retry-After');
  }

  private getThrottlePolicy(response: Response | undefined): string {
    if (response?.headers.has('RateLimit-Limit')) return 'rate_limit';
    if (response?.headers.has('Retry-After')) return 'retry_after';
    return 'unknown';
  }

  private extractGraphErrorDetails(error: unknown): Record<string, unknown> {
    const details: Record<string, unknown> = {};

    if (error instanceof Error) {
      details.message = error.message;
      details.name = error.name;
    }

    if (error instanceof GraphError) {
      return {
        ...details,
        statusCode: error.statusCode,
        code: error.code,
        requestId: error.requestId,
        date: error.date,
      };
    }

    if (error instanceof GraphClientError && error.customError) {
      return { ...details, customError: error.customError };
    }

    if (isGraphApiError(error)) {
      const fields: (keyof GraphApiErrorResponse)[] = ['statusCode', 'code', 'requestId'];
      for (const field of fields) {
        if (error[field] !== undefined) details[field] = error[field];
      }
      if (error.response?.status !== undefined) details.httpStatus = error.response.status;
    }

    return details;
  }
}
