import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { type Histogram } from '@opentelemetry/api';
import { elapsedSeconds, sanitizeError } from '@sp-indexer/utils';
import { Config } from '../config';
import type { SourceConfig } from '../config/sharepoint.schema';
import type { ExtractedDocument } from '../extraction/extraction.types';
import { SharepointDataExtractorService } from '../extraction/sharepoint-data-extractor.service';
import { SPI_SYNC_DURATION_SECONDS } from '../metrics';
import { normalizeFolderPath } from '../microsoft-apis/graph/folder-path.util';
import { GraphApiService } from '../microsoft-apis/graph/graph-api.service';
import { ItemProcessingOrchestratorService } from '../processing-pipeline/item-processing-orchestrator.service';
import { SearchIndexService } from '../search-index/search-index.service';
import {
  createDiagnosticsFormatter,
  type DiagnosticsFormatter,
  shouldConcealLogs,
} from '../utils/logging.util';
import type { SyncResult, SyncSummary } from './indexing.types';

interface ResolvedSource {
  siteId: string;
  driveId: string;
}

@Injectable()
export class SharepointIndexingService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly diagnostics: DiagnosticsFormatter;
  private isSyncing = false;
  private isIndexReady = false;

  public constructor(
    private readonly configService: ConfigService<Config, true>,
    private readonly graphApiService: GraphApiService,
    private readonly dataExtractorService: SharepointDataExtractorService,
    private readonly orchestrator: ItemProcessingOrchestratorService,
    private readonly searchIndexService: SearchIndexService,
    @Inject(SPI_SYNC_DURATION_SECONDS)
    private readonly spiSyncDurationSeconds: Histogram,
  ) {
    this.diagnostics = createDiagnosticsFormatter(shouldConcealLogs(this.configService));
  }

  public async synchronize(): Promise<SyncResult> {
    const syncStartTime = Date.now();
    if (this.isSyncing) {
      this.logger.warn('Skipping sync - previous sync is still in progress.');
      this.spiSyncDurationSeconds.record(elapsedSeconds(syncStartTime), {
        sync_type: 'full',
        result: 'skipped',
        skip_reason: 'sync_in_progress',
      });
      return { status: 'skipped', sources: [] };
    }

    this.isSyncing = true;

    try {
      await this.ensureIndexOnce();

      const sources = this.configService
        .get('sharepoint.sources', { infer: true })
        .filter((source) => source.syncStatus === 'active');
      this.logger.log(`Starting sync of ${sources.length} active source(s)...`);

      const summaries: SyncSummary[] = [];
      for (const source of sources) {
        summaries.push(await this.syncSource(source));
      }

      this.logger.log({
        msg: `SharePoint indexing completed in ${elapsedSeconds(syncStartTime).toFixed(2)}s`,
        sources: summaries.map((summary) => ({
          ...summary,
          siteName: this.diagnostics.value(summary.siteName),
        })),
      });
      this.spiSyncDurationSeconds.record(elapsedSeconds(syncStartTime), {
        sync_type: 'full',
        result: 'success',
      });
      return { status: 'completed', sources: summaries };
    } catch (error) {
      this.logger.error({ msg: 'Failed full synchronization', error: sanitizeError(error) });
      this.spiSyncDurationSeconds.record(elapsedSeconds(syncStartTime), {
        sync_type: 'full',
        result: 'failure',
      });
      throw error;
    } finally {
      this.isSyncing = false;
    }
  }

  private async ensureIndexOnce(): Promise<void> {
    if (this.isIndexReady) return;
    await this.searchIndexService.ensureIndex();
    this.isIndexReady = true;
  }

  private async syncSource(source: SourceConfig): Promise<SyncSummary> {
    const sourceStartTime = Date.now();
    const logSiteName = this.diagnostics.value(source.siteName).toString();
    const logPrefix = `[Site: ${logSiteName}]`;
    const summary: SyncSummary = {
      siteDomain: source.siteDomain,
      siteName: source.siteName,
      status: 'completed',
      foldersScanned: 0,
      failedFolders: 0,
      documentsFound: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
    };

    let resolved: ResolvedSource;
    try {
      resolved = await this.resolveSource(source);
    } catch (error) {
      this.logger.error({
        msg: `${logPrefix} Failed to resolve site or drive. Skipping source.`,
        error: sanitizeError(error),
      });
      this.spiSyncDurationSeconds.record(elapsedSeconds(sourceStartTime), {
        sync_type: 'source',
        sp_site_name: logSiteName,
        result: 'failure',
        failure_step: 'site_resolution',
      });
      return { ...summary, status: 'failed' };
    }

    const folders = source.recursive
      ? await this.graphApiService.crawlFolders(resolved.siteId, resolved.driveId, source.folderPath)
      : [normalizeFolderPath(source.folderPath)];

    const documents: ExtractedDocument[] = [];
    for (const folderPath of folders) {
      try {
        documents.push(
          ...(await this.dataExtractorService.retrieveFilesContent({
            siteId: resolved.siteId,
            driveId: resolved.driveId,
            folderPath,
            fileNames: source.fileNames,
            minutesAgo: source.minutesAgo,
            fileFormats: source.fileFormats,
          })),
        );
      } catch (error) {
        summary.failedFolders += 1;
        this.logger.error({
          msg: `${logPrefix} Failed to extract folder`,
          folderPath: this.diagnostics.path(folderPath),
          error: sanitizeError(error),
        });
      }
    }
    summary.foldersScanned = folders.length;

    if (source.includeSitePages) {
      documents.push(...(await this.dataExtractorService.retrieveSitePages(resolved.siteId)));
    }
    summary.documentsFound = documents.length;

    const processing = await this.orchestrator.processItems(resolved.siteId, documents);

    this.logger.log(
      `${logPrefix} Finished in ${elapsedSeconds(sourceStartTime).toFixed(2)}s: ` +
        `${processing.succeeded} indexed, ${processing.failed} failed, ${processing.skipped} skipped`,
    );
    this.spiSyncDurationSeconds.record(elapsedSeconds(sourceStartTime), {
      sync_type: 'source',
      sp_site_name: logSiteName,
      result: processing.failed > 0 || summary.failedFolders > 0 ? 'partial' : 'success',
    });

    return { ...summary, ...processing };
  }

  private async resolveSource(source: SourceConfig): Promise<ResolvedSource> {
    const siteId = await this.graphApiService.getSiteId(source.siteDomain, source.siteName);
    const driveId = await this.graphApiService.getDriveId(siteId);
    return { siteId, driveId };
  }
}
