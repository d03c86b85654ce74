import { Client } from '@microsoft/microsoft-graph-client';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { normalizeError, sanitizeError } from '@sp-indexer/utils';
import Bottleneck from 'bottleneck';
import { Config } from '../../config';
import { BottleneckFactory } from '../../utils/bottleneck.factory';
import {
  createDiagnosticsFormatter,
  type DiagnosticsFormatter,
  shouldConcealLogs,
} from '../../utils/logging.util';
import { encodeDrivePath, joinFolderPath, normalizeFolderPath } from './folder-path.util';
import { GraphClientFactory } from './graph-client.factory';
import type {
  Drive,
  DriveItem,
  GraphApiResponse,
  SimplePermission,
  Site,
  SitePage,
  SitePageWithCanvas,
} from './types/sharepoint.types';

export class FileTooLargeError extends Error {
  public constructor(public readonly maxFileSizeBytes: number) {
    super(`File size exceeds maximum limit of ${maxFileSizeBytes} bytes`);
    this.name = 'FileTooLargeError';
  }
}

@Injectable()
export class GraphApiService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly graphClient: Client;
  private readonly limiter: Bottleneck;
  private readonly diagnostics: DiagnosticsFormatter;

  public constructor(
    private readonly graphClientFactory: GraphClientFactory,
    private readonly configService: ConfigService<Config, true>,
    private readonly bottleneckFactory: BottleneckFactory,
  ) {
    this.graphClient = this.graphClientFactory.createClient();

    const msGraphRateLimitPerMinute = this.configService.get(
      'sharepoint.graphApiRateLimitPerMinute',
      { infer: true },
    );
    this.limiter = this.bottleneckFactory.createPerMinuteLimiter(
      msGraphRateLimitPerMinute,
      'Graph API',
    );

    this.diagnostics = createDiagnosticsFormatter(shouldConcealLogs(this.configService));
  }

  public async getSiteId(siteDomain: string, siteName: string): Promise<string> {
    const site: Site = await this.makeRateLimitedRequest(() =>
      this.graphClient.api(`/sites/${siteDomain}:/sites/${siteName}:/`).get(),
    );

    if (!site.id) {
      throw new Error(`Site ${this.diagnostics.value(siteName)} returned no id`);
    }
    return site.id;
  }

  public async getDriveId(siteId: string): Promise<string> {
    const drive: Drive = await this.makeRateLimitedRequest(() =>
      this.graphClient.api(`/sites/${siteId}/drive`).get(),
    );

    if (!drive.id) {
      throw new Error(`Default drive of site ${this.diagnostics.value(siteId)} returned no id`);
    }
    return drive.id;
  }

  public async listFolderChildren(
    siteId: string,
    driveId: string,
    folderPath?: string,
  ): Promise<DriveItem[]> {
    const normalizedPath = normalizeFolderPath(folderPath);
    const url = normalizedPath
      ? `/sites/${siteId}/drives/${driveId}/root:${encodeDrivePath(normalizedPath)}:/children`
      : `/sites/${siteId}/drives/${driveId}/root/children`;

    return await this.paginateGraphApiRequest<DriveItem>(url, (pageUrl) =>
      this.graphClient.api(pageUrl).get(),
    );
  }

  /**
   * Lists the starting folder and all folders below it, parents before their children.
   * A folder whose children cannot be listed is still returned, only its subtree is skipped.
   */
  public async crawlFolders(siteId: string, driveId: string, folderPath?: string): Promise<string[]> {
    const folders: string[] = [];
    const pending = [normalizeFolderPath(folderPath)];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined) break;
      folders.push(current);

      let children: DriveItem[];
      try {
        children = await this.listFolderChildren(siteId, driveId, current);
      } catch (error) {
        this.logger.error({
          msg: 'Failed to list folder, skipping its subfolders',
          folderPath: this.diagnostics.path(current),
          error: sanitizeError(error),
        });
        continue;
      }

      const subfolders = children
        .filter((child) => child.folder)
        .map((child) => joinFolderPath(current, child.name));
      // reversed so that the first child is visited next
      pending.push(...subfolders.reverse());
    }

    this.logger.log({
      msg: 'Folder crawl completed',
      startFolder: this.diagnostics.path(folderPath),
      folderCount: folders.length,
    });
    return folders;
  }

  public async downloadFileContent(
    siteId: string,
    driveId: string,
    folderPath: string | undefined,
    fileName: string,
  ): Promise<Buffer> {
    const filePath = `${normalizeFolderPath(folderPath)}/${fileName}`;
    const maxFileSizeBytes = this.configService.get('processing.maxFileSizeBytes', { infer: true });

    try {
      const stream: ReadableStream<Uint8Array> = await this.makeRateLimitedRequest(() =>
        this.graphClient
          .api(`/sites/${siteId}/drives/${driveId}/root:${encodeDrivePath(filePath)}:/content`)
          .getStream(),
      );

      return await this.readWithLimit(stream, maxFileSizeBytes);
    } catch (error) {
      this.logger.error({
        msg: `Failed to download file content: ${normalizeError(error).message}`,
        filePath: this.diagnostics.path(filePath),
        error: sanitizeError(error),
      });
      throw error;
    }
  }

  public async getFilePermissions(siteId: string, itemId: string): Promise<SimplePermission[]> {
    return await this.paginateGraphApiRequest<SimplePermission>(
      `/sites/${siteId}/drive/items/${itemId}/permissions`,
      (url) => this.graphClient.api(url).get(),
    );
  }

  public async getSitePages(siteId: string): Promise<SitePage[]> {
    return await this.paginateGraphApiRequest<SitePage>(`/sites/${siteId}/pages`, (url) =>
      this.graphClient.api(url).get(),
    );
  }

  public async getSitePageContent(siteId: string, pageId: string): Promise<SitePageWithCanvas> {
    return await this.makeRateLimitedRequest(() =>
      this.graphClient
        .api(`/sites/${siteId}/pages/${pageId}/microsoft.graph.sitePage`)
        .expand('canvasLayout')
        .get(),
    );
  }

  private async readWithLimit(
    stream: ReadableStream<Uint8Array>,
    maxFileSizeBytes: number,
  ): Promise<Buffer> {
    const reader = stream.getReader();
    const chunks: Buffer[] = [];
    let totalSize = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        totalSize += value.byteLength;
        if (totalSize > maxFileSizeBytes) {
          await reader.cancel();
          throw new FileTooLargeError(maxFileSizeBytes);
        }
        chunks.push(Buffer.from(value));
      }
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks);
  }

  private async makeRateLimitedRequest<T>(requestFn: () => Promise<T>): Promise<T> {
    return await this.limiter.schedule(async () => await requestFn());
  }

  private async paginateGraphApiRequest<T>(
    initialUrl: string,
    requestBuilder: (url: string) => Promise<GraphApiResponse<T>>,
  ): Promise<T[]> {
    const allItems: T[] = [];
    let nextUrl: string | undefined = initialUrl;

    while (nextUrl) {
      const url: string = nextUrl;
      const response: GraphApiResponse<T> = await this.makeRateLimitedRequest(() =>
        requestBuilder(url),
      );
      allItems.push(...response.value);
      nextUrl = response['@odata.nextLink'];
    }

    return allItems;
  }
}
