import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sanitizeError } from '@sp-indexer/utils';
import { Config } from '../config';
import { FileFilterService } from '../microsoft-apis/graph/file-filter.service';
import { GraphApiService } from '../microsoft-apis/graph/graph-api.service';
import type { DriveItem, SitePage } from '../microsoft-apis/graph/types/sharepoint.types';
import {
  createDiagnosticsFormatter,
  type DiagnosticsFormatter,
  shouldConcealLogs,
} from '../utils/logging.util';
import type { ExtractedDocument, RetrieveFilesParams } from './extraction.types';
import { displayNameOf, extractFileMetadata, toUtcTimestamp } from './file-metadata.util';
import { getReadAccessEntities } from './permissions.util';
import { extractCanvasText } from './site-page-text.util';
import { detectSupportedFormat, TextExtractionService } from './text-extraction.service';

@Injectable()
export class SharepointDataExtractorService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly diagnostics: DiagnosticsFormatter;

  public constructor(
    private readonly graphApiService: GraphApiService,
    private readonly fileFilterService: FileFilterService,
    private readonly textExtractionService: TextExtractionService,
    configService: ConfigService<Config, true>,
  ) {
    this.diagnostics = createDiagnosticsFormatter(shouldConcealLogs(configService));
  }

  /** Lists one folder and returns the text, metadata and read access of every matching file. */
  public async retrieveFilesContent(params: RetrieveFilesParams): Promise<ExtractedDocument[]> {
    const { siteId, driveId, folderPath } = params;
    const loggedFolder = this.diagnostics.path(folderPath);

    const children = await this.graphApiService.listFolderChildren(siteId, driveId, folderPath);
    const candidates = this.fileFilterService.filterFiles(children, {
      minutesAgo: params.minutesAgo,
      fileFormats: params.fileFormats,
    });
    if (candidates.length === 0) {
      this.logger.debug({ msg: 'No files to extract in folder', folderPath: loggedFolder });
      return [];
    }

    const files = this.fileFilterService.filterByFileNames(candidates, params.fileNames);
    if (files.length === 0) {
      this.logger.error({
        msg: 'No files match the configured file names',
        folderPath: loggedFolder,
        candidateCount: candidates.length,
      });
      return [];
    }

    const documents: ExtractedDocument[] = [];
    for (const file of files) {
      documents.push(await this.extractFile(params, file));
    }

    this.logger.log({
      msg: 'Extracted folder',
      folderPath: loggedFolder,
      fileCount: documents.length,
      withContent: documents.filter((document) => document.content !== null).length,
    });
    return documents;
  }

  public async retrieveSitePages(siteId: string): Promise<ExtractedDocument[]> {
    let pages: SitePage[];
    try {
      pages = await this.graphApiService.getSitePages(siteId);
    } catch (error) {
      this.logger.error({
        msg: 'Failed to list site pages',
        siteId: this.diagnostics.value(siteId),
        error: sanitizeError(error),
      });
      return [];
    }

    const documents: ExtractedDocument[] = [];
    for (const page of pages) {
      if (!page.id) continue;
      const document = await this.extractSitePage(siteId, page.id, page);
      if (document) documents.push(document);
    }
    return documents;
  }

  private async extractFile(params: RetrieveFilesParams, file: DriveItem): Promise<ExtractedDocument> {
    const metadata = extractFileMetadata(file);
    const [content, readAccessEntities] = await Promise.all([
      this.extractFileText(params, file),
      this.readAccessEntitiesOf(params.siteId, file),
    ]);

    return { kind: 'file', ...metadata, content, readAccessEntities };
  }

  private async extractFileText(params: RetrieveFilesParams, file: DriveItem): Promise<string | null> {
    const format = detectSupportedFormat(file.name);
    const loggedFile = this.diagnostics.value(file.name);
    if (!format) {
      this.logger.warn({ msg: 'Unsupported file type, indexing metadata only', fileName: loggedFile });
      return null;
    }

    try {
      const buffer = await this.graphApiService.downloadFileContent(
        params.siteId,
        params.driveId,
        params.folderPath,
        file.name,
      );
      return await this.textExtractionService.extractText(format, buffer);
    } catch (error) {
      this.logger.error({
        msg: 'Failed to extract file text',
        fileName: loggedFile,
        format,
        error: sanitizeError(error),
      });
      return null;
    }
  }

  private async readAccessEntitiesOf(siteId: string, file: DriveItem): Promise<string[]> {
    const permissions = await this.graphApiService.getFilePermissions(siteId, file.id);
    return getReadAccessEntities(permissions);
  }

  private async extractSitePage(
    siteId: string,
    pageId: string,
    page: SitePage,
  ): Promise<ExtractedDocument | null> {
    try {
      const pageWithCanvas = await this.graphApiService.getSitePageContent(siteId, pageId);
      const title = pageWithCanvas.title ?? page.title ?? page.name ?? pageId;

      return {
        kind: 'sitePage',
        id: pageId,
        name: title,
        source: pageWithCanvas.webUrl ?? page.webUrl ?? null,
        size: null,
        content: extractCanvasText(pageWithCanvas.canvasLayout),
        createdBy: displayNameOf(page.createdBy),
        lastModifiedBy: displayNameOf(page.lastModifiedBy),
        createdAt: toUtcTimestamp(page.createdDateTime),
        lastModifiedAt: toUtcTimestamp(page.lastModifiedDateTime),
        readAccessEntities: [],
      };
    } catch (error) {
      this.logger.warn({
        msg: 'Skipping site page whose content could not be fetched',
        pageId: this.diagnostics.value(pageId),
        error: sanitizeError(error),
      });
      return null;
    }
  }
}
