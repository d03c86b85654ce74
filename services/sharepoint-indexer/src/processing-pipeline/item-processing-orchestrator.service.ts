import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import { Config } from '../config';
import type { ExtractedDocument } from '../extraction/extraction.types';
import { createDiagnosticsFormatter, shouldConcealLogs } from '../utils/logging.util';
import { ProcessingPipelineService } from './processing-pipeline.service';

export interface ProcessingSummary {
  succeeded: number;
  failed: number;
  skipped: number;
}

export function hasIndexableContent(document: ExtractedDocument): boolean {
  return Boolean(document.content?.trim());
}

@Injectable()
export class ItemProcessingOrchestratorService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly concealLogs: boolean;

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    private readonly processingPipelineService: ProcessingPipelineService,
  ) {
    this.concealLogs = shouldConcealLogs(this.configService);
  }

  /** Runs every document with content through the pipeline, `processing.concurrency` at a time. */
  public async processItems(
    siteId: string,
    documents: ExtractedDocument[],
  ): Promise<ProcessingSummary> {
    const concurrency = this.configService.get('processing.concurrency', { infer: true });
    const limit = pLimit(concurrency);
    const logPrefix = `[Site: ${createDiagnosticsFormatter(this.concealLogs).value(siteId)}]`;

    const indexable = documents.filter(hasIndexableContent);
    const skipped = documents.length - indexable.length;

    if (indexable.length === 0) {
      this.logger.log(`${logPrefix} No documents to process (${skipped} skipped without content)`);
      return { succeeded: 0, failed: 0, skipped };
    }

    this.logger.log(
      `${logPrefix} Processing ${indexable.length} documents (${skipped} skipped without content)`,
    );

    const results = await Promise.allSettled(
      indexable.map((document) =>
        limit(async () => await this.processingPipelineService.processItem(document, siteId)),
      ),
    );

    const succeeded = results.filter(
      (result) => result.status === 'fulfilled' && result.value.success,
    ).length;
    const failed = results.length - succeeded;

    if (failed > 0) {
      this.logger.warn(`${logPrefix} Completed processing with ${failed} failures`);
    }

    return { succeeded, failed, skipped };
  }
}
