import { ConfigService } from '@nestjs/config';
import type { Counter, Histogram } from '@opentelemetry/api';
import { Redacted } from '@sp-indexer/utils';
import { TestBed } from '@suites/unit';
import { Client, MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  SPI_SEARCH_API_REQUEST_DURATION_SECONDS,
  SPI_SEARCH_API_SLOW_REQUESTS_TOTAL,
} from '../metrics';
import { BottleneckFactory } from '../utils/bottleneck.factory';
import { SearchIndexHttpClient } from './search-index-http.client';
import { SearchIndexError } from './search-index.errors';

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return { ...actual, Client: vi.fn() };
});

const SEARCH_ORIGIN = 'https://contoso-search.search.windows.net';

describe('SearchIndexHttpClient', () => {
  let client: SearchIndexHttpClient;
  let mockAgent: MockAgent;
  let histogram: { record: ReturnType<typeof vi.fn> };
  let slowRequests: { add: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    vi.mocked(Client).mockImplementation(function (origin) {
      return mockAgent.get(String(origin)) as never;
    });

    histogram = { record: vi.fn() };
    slowRequests = { add: vi.fn() };
    const { unit } = await TestBed.solitary(SearchIndexHttpClient)
      .mock(ConfigService)
      .impl((stub) => ({
        ...stub(),
        get: vi.fn((key: string) => {
          if (key === 'search.endpoint') return SEARCH_ORIGIN;
          if (key === 'search.apiRateLimitPerMinute') return 600;
          if (key === 'search.apiKey') return new Redacted('test-search-key');
          if (key === 'search.apiVersion') return '2024-07-01';
          return undefined;
        }),
      }))
      .mock(BottleneckFactory)
      .impl(() => ({
        createPerMinuteLimiter: () =>
          ({ schedule: (fn: () => Promise<unknown>) => fn() }) as never,
      }))
      .mock<Histogram>(SPI_SEARCH_API_REQUEST_DURATION_SECONDS)
      .impl(() => histogram)
      .mock<Counter>(SPI_SEARCH_API_SLOW_REQUESTS_TOTAL)
      .impl(() => slowRequests)
      .compile();

    client = unit;
  });

  afterEach(async () => {
    vi.useRealTimers();
    await mockAgent.close();
  });

  it('connects to the origin of the configured endpoint', () => {
    expect(Client).toHaveBeenCalledWith(SEARCH_ORIGIN, {
      bodyTimeout: 60_000,
      headersTimeout: 30_000,
      connectTimeout: 15_000,
    });
  });

  it('sends the api key and api version and parses the JSON body', async () => {
    let receivedHeaders: unknown;
    let receivedBody: unknown;
    mockAgent
      .get(SEARCH_ORIGIN)
      .intercept({ path: '/indexes/chunks/docs/index?api-version=2024-07-01', method: 'POST' })
      .reply(
        200,
        (opts) => {
          receivedHeaders = opts.headers;
          receivedBody = opts.body;
          return JSON.stringify({ value: [] });
        },
        { headers: { 'content-type': 'application/json' } },
      );

    const response = await client.request({
      method: 'POST',
      path: '/indexes/chunks/docs/index',
      body: { value: [] },
    });

    expect(response).toEqual({ statusCode: 200, body: { value: [] } });
    expect(receivedHeaders).toMatchObject({
      'api-key': 'test-search-key',
      'Content-Type': 'application/json',
    });
    expect(receivedBody).toBe('{"value":[]}');
    expect(histogram.record).toHaveBeenCalledWith(expect.any(Number), {
      api_method: 'POST:/indexes/{indexeId}/docs/index',
      result: 'success',
      http_status_class: '2xx',
    });
  });

  it('returns a null body for empty responses', async () => {
    mockAgent
      .get(SEARCH_ORIGIN)
      .intercept({ path: '/indexes/chunks?api-version=2024-07-01', method: 'PUT' })
      .reply(204, '');

    const response = await client.request({ method: 'PUT', path: '/indexes/chunks', body: {} });

    expect(response).toEqual({ statusCode: 204, body: null });
  });

  it('throws a SearchIndexError carrying the status and body for client errors', async () => {
    mockAgent
      .get(SEARCH_ORIGIN)
      .intercept({ path: '/indexes/chunks/docs/search?api-version=2024-07-01', method: 'POST' })
      .reply(400, '{"error":{"message":"Invalid filter"}}');

    const error = await client
      .request({ method: 'POST', path: '/indexes/chunks/docs/search', body: {} })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SearchIndexError);
    expect(error).toMatchObject({
      statusCode: 400,
      responseBody: '{"error":{"message":"Invalid filter"}}',
    });
    expect(histogram.record).toHaveBeenCalledWith(expect.any(Number), {
      api_method: 'POST:/indexes/{indexeId}/docs/search',
      result: 'error',
      http_status_class: '400',
    });
  });

  it('counts requests slower than the first bucket as slow', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    mockAgent
      .get(SEARCH_ORIGIN)
      .intercept({ path: '/indexes/chunks?api-version=2024-07-01', method: 'PUT' })
      .reply(200, () => {
        vi.setSystemTime(Date.now() + 2_500);
        return '{}';
      });

    await client.request({ method: 'PUT', path: '/indexes/chunks', body: {} });

    expect(slowRequests.add).toHaveBeenCalledWith(1, {
      api_method: 'PUT:/indexes/{indexeId}',
      duration_bucket: '>2s',
    });
  });

  it('leaves fast requests out of the slow request counter', async () => {
    mockAgent
      .get(SEARCH_ORIGIN)
      .intercept({ path: '/indexes/chunks?api-version=2024-07-01', method: 'PUT' })
      .reply(200, '{}');

    await client.request({ method: 'PUT', path: '/indexes/chunks', body: {} });

    expect(slowRequests.add).not.toHaveBeenCalled();
  });
});
