import { ConfigService } from '@nestjs/config';
import type { Counter } from '@opentelemetry/api';
import { Redacted } from '@sp-indexer/utils';
import { TestBed } from '@suites/unit';
import { APIError } from 'openai';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { EmbeddingConfig } from '../config/embedding.config';
import { SPI_EMBEDDING_REQUESTS_TOTAL } from '../metrics';
import { EmbeddingError, EmbeddingService, isRetryableEmbeddingError } from './embedding.service';

const { createEmbedding, openAiConstructor, azureConstructor } = vi.hoisted(() => ({
  createEmbedding: vi.fn(),
  openAiConstructor: vi.fn(),
  azureConstructor: vi.fn(),
}));

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  class FakeOpenAI {
    public readonly embeddings = { create: createEmbedding };
    public constructor(options: unknown) {
      openAiConstructor(options);
    }
  }
  class FakeAzureOpenAI {
    public readonly embeddings = { create: createEmbedding };
    public constructor(options: unknown) {
      azureConstructor(options);
    }
  }
  return { ...actual, default: FakeOpenAI, AzureOpenAI: FakeAzureOpenAI };
});

const baseConfig: EmbeddingConfig = {
  provider: 'openai',
  model: 'text-embedding-3-small',
  apiVersion: '2024-10-21',
  dimensions: 3,
  apiKey: new Redacted('test-secret'),
  retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
};

describe('EmbeddingService', () => {
  let service: EmbeddingService;
  let counter: { add: ReturnType<typeof vi.fn> };

  const compile = async (config: EmbeddingConfig) => {
    counter = { add: vi.fn() };
    const { unit } = await TestBed.solitary(EmbeddingService)
      .mock(ConfigService)
      .impl((stub) => ({
        ...stub(),
        get: vi.fn(() => config),
      }))
      .mock<Counter>(SPI_EMBEDDING_REQUESTS_TOTAL)
      .impl(() => counter)
      .compile();
    return unit;
  };

  beforeEach(async () => {
    createEmbedding.mockReset();
    openAiConstructor.mockReset();
    azureConstructor.mockReset();
    service = await compile(baseConfig);
  });

  it('returns the embedding of the text', async () => {
    createEmbedding.mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3] }] });

    await expect(service.embed('travel policy')).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(createEmbedding).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: 'travel policy',
      dimensions: 3,
    });
    expect(counter.add).toHaveBeenCalledWith(1, {
      model: 'text-embedding-3-small',
      result: 'success',
    });
  });

  it('creates an Azure OpenAI client for the azure provider', async () => {
    await compile({
      ...baseConfig,
      provider: 'azure-openai',
      model: 'embeddings-deployment',
      endpoint: 'https://example.openai.azure.com',
    });

    expect(azureConstructor).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      endpoint: 'https://example.openai.azure.com',
      apiVersion: '2024-10-21',
      deployment: 'embeddings-deployment',
      maxRetries: 0,
    });
  });

  it('retries transient failures', async () => {
    createEmbedding
      .mockRejectedValueOnce(new APIError(429, undefined, 'rate limited', undefined))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ data: [{ embedding: [1, 2, 3] }] });

    await expect(service.embed('text')).resolves.toEqual([1, 2, 3]);
    expect(createEmbedding).toHaveBeenCalledTimes(3);
    expect(counter.add).toHaveBeenCalledWith(1, { model: 'text-embedding-3-small', result: 'retry' });
  });

  it('does not retry client errors', async () => {
    const unauthorized = new APIError(401, undefined, 'invalid api key', undefined);
    createEmbedding.mockRejectedValue(unauthorized);

    await expect(service.embed('text')).rejects.toBe(unauthorized);
    expect(createEmbedding).toHaveBeenCalledTimes(1);
    expect(counter.add).toHaveBeenCalledWith(1, { model: 'text-embedding-3-small', result: 'error' });
  });

  it('rethrows the last error after the final attempt', async () => {
    createEmbedding
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));

    await expect(service.embed('text')).rejects.toThrow('third');
    expect(createEmbedding).toHaveBeenCalledTimes(3);
  });

  it('treats an empty response as an error', async () => {
    createEmbedding.mockResolvedValue({ data: [] });

    await expect(service.embed('text')).rejects.toBeInstanceOf(EmbeddingError);
    expect(createEmbedding).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryableEmbeddingError', () => {
  it('retries server errors and unknown failures', () => {
    expect(isRetryableEmbeddingError(new APIError(500, undefined, 'boom', undefined))).toBe(true);
    expect(isRetryableEmbeddingError(new Error('ECONNRESET'))).toBe(true);
  });

  it('gives up on 400, 401, 403 and 404', () => {
    for (const status of [400, 401, 403, 404]) {
      expect(isRetryableEmbeddingError(new APIError(status, undefined, 'no', undefined))).toBe(false);
    }
  });
});
