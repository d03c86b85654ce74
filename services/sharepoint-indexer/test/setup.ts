import 'reflect-metadata';
import { env } from 'node:process';
import { vi } from 'vitest';

env.NODE_ENV = 'test';
env.LOGS_DIAGNOSTICS_DATA_POLICY = 'disclose';
env.SHAREPOINT_AUTH_CLIENT_SECRET = 'test-secret';
env.EMBEDDING_API_KEY = 'test-embedding-key';
env.SEARCH_API_KEY = 'test-search-key';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual('@nestjs/common');
  return {
    ...actual,
    Logger: vi.fn().mockImplementation(() => ({
      log: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      verbose: vi.fn(),
    })),
  };
});

// Silence pino logs during tests
vi.mock('nestjs-pino', async () => {
  const actual = await vi.importActual('nestjs-pino');
  return {
    ...actual,
    LoggerModule: { forRootAsync: () => ({}) },
    Logger: vi.fn().mockImplementation(() => ({
      log: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      verbose: vi.fn(),
    })),
  };
});
