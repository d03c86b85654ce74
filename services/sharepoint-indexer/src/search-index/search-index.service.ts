import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { processInBatches } from '@sp-indexer/utils';
import { Config } from '../config';
import { buildIndexDefinition } from './index-definition';
import { SearchIndexHttpClient } from './search-index-http.client';
import { DocumentIndexingError, type FailedDocument } from './search-index.errors';
import { IndexingResultSchema, type SearchDocument } from './search-index.types';

const MULTI_STATUS = 207;

@Injectable()
export class SearchIndexService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly httpClient: SearchIndexHttpClient,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  /** Creates the index, or updates it in place when it already exists. */
  public async ensureIndex(): Promise<void> {
    const search = this.configService.get('search', { infer: true });
    const dimensions = this.configService.get('embedding.dimensions', { infer: true });

    await this.httpClient.request({
      method: 'PUT',
      path: `/indexes/${encodeURIComponent(search.indexName)}`,
      body: buildIndexDefinition({ search, dimensions }),
    });

    this.logger.log({ msg: 'Search index is ready', indexName: search.indexName, dimensions });
  }

  /**
   * Upserts documents in sequential batches. Stops at the first batch the index rejects,
   * fully or partially, or once `signal` is aborted.
   */
  public async uploadDocuments(
    documents: SearchDocument[],
    { signal }: { signal?: AbortSignal } = {},
  ): Promise<number> {
    if (documents.length === 0) return 0;

    const { indexName, uploadBatchSize } = this.configService.get('search', { infer: true });

    const indexed = await processInBatches({
      items: documents,
      batchSize: uploadBatchSize,
      processor: async (batch) => await this.uploadBatch(indexName, batch),
      logger: this.logger,
      logPrefix: '[SearchIndex]',
      signal,
    });

    this.logger.debug({ msg: 'Uploaded documents to search index', count: indexed.length });
    return indexed.length;
  }

  private async uploadBatch(indexName: string, batch: SearchDocument[]): Promise<string[]> {
    const response = await this.httpClient.request({
      method: 'POST',
      path: `/indexes/${encodeURIComponent(indexName)}/docs/index`,
      body: {
        value: batch.map((document) => ({ '@search.action': 'mergeOrUpload', ...document })),
      },
    });

    const { value: results } = IndexingResultSchema.parse(response.body);
    const failedDocuments: FailedDocument[] = results
      .filter((result) => !result.status)
      .map((result) => ({
        key: result.key,
        statusCode: result.statusCode,
        errorMessage: result.errorMessage ?? null,
      }));

    if (response.statusCode === MULTI_STATUS || failedDocuments.length > 0) {
      throw new DocumentIndexingError(failedDocuments, response.statusCode);
    }

    return results.map((result) => result.key);
  }
}
