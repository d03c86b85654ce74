import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Counter } from '@opentelemetry/api';
import { normalizeError, retryWithBackoff, sanitizeError } from '@sp-indexer/utils';
import OpenAI, { APIError, AzureOpenAI } from 'openai';
import { Config } from '../config';
import type { EmbeddingConfig } from '../config/embedding.config';
import { SPI_EMBEDDING_REQUESTS_TOTAL } from '../metrics';

// Client errors that another attempt cannot fix
const NON_RETRYABLE_STATUS_CODES = new Set([400, 401, 403, 404]);

export class EmbeddingError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export function isRetryableEmbeddingError(error: unknown): boolean {
  if (error instanceof EmbeddingError) return false;
  if (error instanceof APIError && error.status !== undefined) {
    return !NON_RETRYABLE_STATUS_CODES.has(error.status);
  }
  return true;
}

export function createEmbeddingClient(config: EmbeddingConfig): OpenAI {
  switch (config.provider) {
    case 'openai':
      return new OpenAI({ apiKey: config.apiKey.value, baseURL: config.endpoint, maxRetries: 0 });
    case 'azure-openai':
      return new AzureOpenAI({
        apiKey: config.apiKey.value,
        endpoint: config.endpoint,
        apiVersion: config.apiVersion,
        deployment: config.model,
        maxRetries: 0,
      });
  }
}

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly config: EmbeddingConfig;
  private readonly client: OpenAI;

  public constructor(
    configService: ConfigService<Config, true>,
    @Inject(SPI_EMBEDDING_REQUESTS_TOTAL)
    private readonly spiEmbeddingRequestsTotal: Counter,
  ) {
    this.config = configService.get('embedding', { infer: true });
    this.client = createEmbeddingClient(this.config);
  }

  public async embed(text: string): Promise<number[]> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;

    try {
      const embedding = await retryWithBackoff(() => this.requestEmbedding(text), {
        maxAttempts,
        baseDelayMs,
        maxDelayMs,
        minDelayMs: baseDelayMs,
        shouldRetry: isRetryableEmbeddingError,
        onRetry: ({ attempt, delayMs, error }) => {
          this.spiEmbeddingRequestsTotal.add(1, { model: this.config.model, result: 'retry' });
          this.logger.warn({
            msg: `Embedding request failed, retrying in ${delayMs}ms`,
            attempt,
            maxAttempts,
            error: sanitizeError(error),
          });
        },
      });
      this.spiEmbeddingRequestsTotal.add(1, { model: this.config.model, result: 'success' });
      return embedding;
    } catch (error) {
      this.spiEmbeddingRequestsTotal.add(1, { model: this.config.model, result: 'error' });
      this.logger.error({
        msg: `Embedding request failed: ${normalizeError(error).message}`,
        model: this.config.model,
        error: sanitizeError(error),
      });
      throw error;
    }
  }

  private async requestEmbedding(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.config.model,
      input: text,
      dimensions: this.config.dimensions,
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new EmbeddingError('Embedding endpoint returned no embedding');
    }
    return embedding;
  }
}
