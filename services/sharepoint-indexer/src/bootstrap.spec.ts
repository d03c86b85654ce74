import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AppModule, IndexingRunModule } from './app.module';
import { bootstrap, runOnce, serve } from './bootstrap';
import type { SyncResult, SyncSummary } from './indexing/indexing.types';
import { SharepointIndexingService } from './indexing/sharepoint-indexing.service';

vi.mock('@nestjs/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@nestjs/core')>();
  return {
    ...actual,
    NestFactory: { create: vi.fn(), createApplicationContext: vi.fn() },
  };
});

vi.mock('./app.module', () => ({
  AppModule: class AppModule {},
  IndexingRunModule: class IndexingRunModule {},
}));

const summary = (overrides: Partial<SyncSummary> = {}): SyncSummary => ({
  siteDomain: 'contoso.sharepoint.com',
  siteName: 'Policies',
  status: 'completed',
  foldersScanned: 2,
  failedFolders: 0,
  documentsFound: 3,
  succeeded: 3,
  failed: 0,
  skipped: 0,
  ...overrides,
});

describe('run modes', () => {
  let logger: { log: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };
  let synchronize: ReturnType<typeof vi.fn>;
  let app: {
    get: ReturnType<typeof vi.fn>;
    useLogger: ReturnType<typeof vi.fn>;
    enableShutdownHooks: ReturnType<typeof vi.fn>;
    listen: ReturnType<typeof vi.fn>;
    close: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    logger = { log: vi.fn(), error: vi.fn() };
    synchronize = vi.fn();
    const configService = { get: vi.fn((key: string) => (key === 'app.port' ? 9542 : undefined)) };

    app = {
      get: vi.fn((token: unknown) => {
        if (token === Logger) return logger;
        if (token === ConfigService) return configService;
        if (token === SharepointIndexingService) return { synchronize };
        throw new Error('Unexpected provider');
      }),
      useLogger: vi.fn(),
      enableShutdownHooks: vi.fn(),
      listen: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockResolvedValue(undefined),
    };

    vi.mocked(NestFactory.create).mockResolvedValue(app as never);
    vi.mocked(NestFactory.createApplicationContext).mockResolvedValue(app as never);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.clearAllMocks();
  });

  describe('serve', () => {
    it('starts the HTTP app on the configured port with shutdown hooks', async () => {
      await serve();

      expect(NestFactory.create).toHaveBeenCalledWith(AppModule, { bufferLogs: true });
      expect(app.enableShutdownHooks).toHaveBeenCalled();
      expect(app.useLogger).toHaveBeenCalledWith(logger);
      expect(app.listen).toHaveBeenCalledWith(9542);
    });
  });

  describe('runOnce', () => {
    it('synchronizes once and closes the context', async () => {
      const result: SyncResult = { status: 'completed', sources: [summary()] };
      synchronize.mockResolvedValue(result);

      await runOnce();

      expect(NestFactory.createApplicationContext).toHaveBeenCalledWith(IndexingRunModule, {
        bufferLogs: true,
      });
      expect(synchronize).toHaveBeenCalledTimes(1);
      expect(app.close).toHaveBeenCalledTimes(1);
      expect(process.exitCode).toBeUndefined();
    });

    it('sets exit code 1 when a document failed', async () => {
      synchronize.mockResolvedValue({ status: 'completed', sources: [summary({ failed: 1 })] });

      await runOnce();

      expect(process.exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledWith('Indexing run finished with failures');
      expect(app.close).toHaveBeenCalledTimes(1);
    });

    it('closes the context when synchronization throws', async () => {
      synchronize.mockRejectedValue(new Error('search index unavailable'));

      await expect(runOnce()).rejects.toThrow('search index unavailable');
      expect(app.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('bootstrap', () => {
    it('serves by default', async () => {
      await bootstrap({ TENANT_CONFIG_DIRECTORY: '/etc/indexer' });

      expect(NestFactory.create).toHaveBeenCalledTimes(1);
      expect(NestFactory.createApplicationContext).not.toHaveBeenCalled();
    });

    it('runs a single synchronization in once mode', async () => {
      synchronize.mockResolvedValue({ status: 'skipped', sources: [] });

      await bootstrap({ TENANT_CONFIG_DIRECTORY: '/etc/indexer', RUN_MODE: 'once' });

      expect(NestFactory.createApplicationContext).toHaveBeenCalledTimes(1);
      expect(NestFactory.create).not.toHaveBeenCalled();
      expect(process.exitCode).toBeUndefined();
    });
  });
});
