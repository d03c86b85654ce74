import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HYBRID_SEARCH_DEFAULT_TOP,
  HYBRID_SEARCH_VECTOR_K,
  SEARCH_RESULT_CONTENT_MAX_LENGTH,
} from '../constants/defaults.constants';
import type { SecurityGroup } from '../constants/security-group.constants';
import { Config } from '../config';
import { EmbeddingService } from '../embedding/embedding.service';
import { SearchIndexHttpClient } from './search-index-http.client';
import {
  type HybridSearchOptions,
  type HybridSearchResult,
  SearchResponseSchema,
} from './search-index.types';

// OData string literals escape a single quote by doubling it
export function buildSecurityGroupFilter(securityGroup: string): string {
  return `security_group eq '${securityGroup.replaceAll("'", "''")}'`;
}

export function formatResultContent(content: string): string {
  return content.replaceAll('\n', ' ').slice(0, SEARCH_RESULT_CONTENT_MAX_LENGTH);
}

@Injectable()
export class SearchQueryService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly httpClient: SearchIndexHttpClient,
    private readonly embeddingService: EmbeddingService,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  /**
   * Keyword plus vector search with semantic reranking, restricted to chunks labelled with
   * `securityGroup`.
   */
  public async hybridSearch(
    query: string,
    securityGroup: SecurityGroup,
    { topK = HYBRID_SEARCH_DEFAULT_TOP }: HybridSearchOptions = {},
  ): Promise<HybridSearchResult[]> {
    const { indexName, semanticConfigurationName } = this.configService.get('search', {
      infer: true,
    });
    const vector = await this.embeddingService.embed(query);

    const response = await this.httpClient.request({
      method: 'POST',
      path: `/indexes/${encodeURIComponent(indexName)}/docs/search`,
      body: {
        search: query,
        top: topK,
        vectorQueries: [
          { kind: 'vector', vector, k: HYBRID_SEARCH_VECTOR_K, fields: 'content_vector' },
        ],
        queryType: 'semantic',
        semanticConfiguration: semanticConfigurationName,
        filter: buildSecurityGroupFilter(securityGroup),
      },
    });

    const { value } = SearchResponseSchema.parse(response.body);
    const results = value.map((document) => ({
      score: document['@search.score'],
      rerankerScore: document['@search.rerankerScore'] ?? null,
      content: formatResultContent(document.content ?? ''),
    }));

    this.logger.debug({ msg: 'Hybrid search completed', securityGroup, topK, resultCount: results.length });
    return results;
  }
}
