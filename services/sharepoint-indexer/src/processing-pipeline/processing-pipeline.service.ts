import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Counter } from '@opentelemetry/api';
import { normalizeError } from '@sp-indexer/utils';
import { toSnakeCase } from 'remeda';
import { Config } from '../config';
import type { ExtractedDocument } from '../extraction/extraction.types';
import { SPI_INGESTION_FILE_PROCESSED_TOTAL } from '../metrics';
import {
  createDiagnosticsFormatter,
  type DiagnosticsFormatter,
  shouldConcealLogs,
} from '../utils/logging.util';
import { StepTimeoutError } from './step-timeout.error';
import { ChunkingStep } from './steps/chunking.step';
import { DocumentAssemblyStep } from './steps/document-assembly.step';
import { EmbeddingStep } from './steps/embedding.step';
import { IndexUploadStep } from './steps/index-upload.step';
import type { IPipelineStep } from './steps/pipeline-step.interface';
import type { PipelineResult, ProcessingContext } from './types/processing-context';

@Injectable()
export class ProcessingPipelineService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly pipelineSteps: IPipelineStep[];
  private readonly stepTimeoutMs: number;
  private readonly diagnostics: DiagnosticsFormatter;

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    private readonly chunkingStep: ChunkingStep,
    private readonly embeddingStep: EmbeddingStep,
    private readonly documentAssemblyStep: DocumentAssemblyStep,
    private readonly indexUploadStep: IndexUploadStep,
    @Inject(SPI_INGESTION_FILE_PROCESSED_TOTAL)
    private readonly spiIngestionFileProcessedTotal: Counter,
  ) {
    this.diagnostics = createDiagnosticsFormatter(shouldConcealLogs(this.configService));
    this.pipelineSteps = [
      this.chunkingStep,
      this.embeddingStep,
      this.documentAssemblyStep,
      this.indexUploadStep,
    ];
    this.stepTimeoutMs =
      this.configService.get('processing.stepTimeoutSeconds', { infer: true }) * 1000;
  }

  public async processItem(document: ExtractedDocument, siteId: string): Promise<PipelineResult> {
    const startTime = new Date();
    const correlationId = randomUUID();
    const context: ProcessingContext = { correlationId, siteId, document, startTime };

    const logSiteId = this.diagnostics.value(siteId).toString();
    const logPrefix = `[SiteId: ${logSiteId}][CorrelationId: ${correlationId}]`;
    this.logger.log(`${logPrefix} Starting processing pipeline for ${document.kind}: ${document.id}`);

    for (const step of this.pipelineSteps) {
      try {
        await this.executeWithTimeout(step, context);

        this.spiIngestionFileProcessedTotal.add(1, {
          sp_site_id: logSiteId,
          step_name: toSnakeCase(step.stepName),
          document_kind: document.kind,
          result: 'success',
        });

        this.logger.debug(`${logPrefix} Completed step: ${step.stepName}`);
      } catch (error) {
        const totalDuration = Date.now() - startTime.getTime();
        const isTimeout = error instanceof StepTimeoutError;

        this.spiIngestionFileProcessedTotal.add(1, {
          sp_site_id: logSiteId,
          step_name: toSnakeCase(step.stepName),
          document_kind: document.kind,
          result: isTimeout ? 'timeout' : 'failure',
        });

        this.logger.error(
          `${logPrefix} Pipeline ${isTimeout ? 'timed out' : 'failed'} at step: ` +
            `${step.stepName} after ${totalDuration}ms: ${normalizeError(error).message}`,
        );

        this.finalCleanup(context);
        return { success: false };
      }
    }

    const totalDuration = Date.now() - startTime.getTime();
    this.logger.log(
      `${logPrefix} Pipeline indexed ${context.indexedCount ?? 0} chunks in ${totalDuration}ms for ${document.kind}: ${document.id}`,
    );
    this.finalCleanup(context);

    return { success: true };
  }

  // Unlike Promise.race(), the timer is cleared as soon as the step settles. On timeout the
  // step's signal is aborted so it stops between units of work.
  private executeWithTimeout(
    step: IPipelineStep,
    context: ProcessingContext,
  ): Promise<ProcessingContext> {
    const controller = new AbortController();
    context.signal = controller.signal;

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        const timeoutError = new StepTimeoutError(step.stepName, this.stepTimeoutMs);
        controller.abort(timeoutError);
        reject(timeoutError);
      }, this.stepTimeoutMs);

      step
        .execute(context)
        .then(resolve)
        .catch(reject)
        .finally(() => clearTimeout(timeoutId));
    });
  }

  // Drops the vectors once the document is done
  private finalCleanup(context: ProcessingContext): void {
    delete context.embeddings;
    delete context.searchDocuments;
    delete context.signal;
  }
}
