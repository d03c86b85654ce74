import { Redacted } from '@sp-indexer/utils';
import { describe, expect, it } from 'vitest';
import { parseAppConfig } from './app.config';
import { parseEmbeddingConfig } from './embedding.config';
import { ProcessingConfigSchema } from './processing.config';
import { parseSearchConfig } from './search.config';
import { parseSharepointConfig } from './sharepoint.config';

const baseSharepointYaml = {
  authMode: 'client-secret',
  authTenantId: 'tenant-123',
  authClientId: 'client-456',
  sources: [{ siteDomain: 'contoso.sharepoint.com', siteName: 'Policies' }],
};

describe('parseAppConfig', () => {
  it('applies defaults', () => {
    const config = parseAppConfig({ TENANT_CONFIG_DIRECTORY: '/etc/indexer' });

    expect(config).toEqual({
      nodeEnv: 'production',
      port: 9542,
      logLevel: 'info',
      logsDiagnosticsDataPolicy: 'conceal',
      tenantConfigDirectory: '/etc/indexer',
      runMode: 'scheduled',
      isDev: false,
    });
  });

  it('reads the run mode and coerces the port', () => {
    const config = parseAppConfig({
      TENANT_CONFIG_DIRECTORY: '/etc/indexer',
      NODE_ENV: 'development',
      PORT: '8080',
      RUN_MODE: 'once',
    });

    expect(config.port).toBe(8080);
    expect(config.runMode).toBe('once');
    expect(config.isDev).toBe(true);
  });

  it('requires the tenant config directory', () => {
    expect(() => parseAppConfig({})).toThrow();
  });
});

describe('parseSharepointConfig', () => {
  it('wraps the client secret from the environment', () => {
    const config = parseSharepointConfig(baseSharepointYaml, {
      SHAREPOINT_AUTH_CLIENT_SECRET: 'test-secret',
    });

    expect(config.authMode).toBe('client-secret');
    if (config.authMode !== 'client-secret') return;
    expect(config.authClientSecret).toBeInstanceOf(Redacted);
    expect(config.authClientSecret.value).toBe('test-secret');
  });

  it('fills source defaults', () => {
    const config = parseSharepointConfig(baseSharepointYaml, {
      SHAREPOINT_AUTH_CLIENT_SECRET: 'test-secret',
    });

    expect(config.graphApiRateLimitPerMinute).toBe(780000);
    expect(config.sources[0]).toEqual({
      siteDomain: 'contoso.sharepoint.com',
      siteName: 'Policies',
      recursive: true,
      includeSitePages: false,
      syncStatus: 'active',
    });
  });

  it('accepts file formats as a comma separated string', () => {
    const config = parseSharepointConfig(
      {
        ...baseSharepointYaml,
        sources: [{ siteDomain: 'contoso.sharepoint.com', siteName: 'Policies', fileFormats: 'docx, pdf' }],
      },
      { SHAREPOINT_AUTH_CLIENT_SECRET: 'test-secret' },
    );

    expect(config.sources[0]?.fileFormats).toEqual(['docx', 'pdf']);
  });

  it('fails without the client secret', () => {
    expect(() => parseSharepointConfig(baseSharepointYaml, {})).toThrow(
      'SHAREPOINT_AUTH_CLIENT_SECRET must be set for client-secret authentication',
    );
  });

  it('requires a thumbprint for certificate authentication', () => {
    expect(() =>
      parseSharepointConfig(
        { ...baseSharepointYaml, authMode: 'certificate', authPrivateKeyPath: '/keys/app.pem' },
        {},
      ),
    ).toThrow('Either authThumbprintSha1 or authThumbprintSha256');
  });

  it('redacts the private key password for certificate authentication', () => {
    const config = parseSharepointConfig(
      {
        ...baseSharepointYaml,
        authMode: 'certificate',
        authPrivateKeyPath: '/keys/app.pem',
        authThumbprintSha1: 'ABCDEF0123',
      },
      { SHAREPOINT_AUTH_PRIVATE_KEY_PASSWORD: 'test-password' },
    );

    if (config.authMode !== 'certificate') throw new Error('expected certificate mode');
    expect(config.authPrivateKeyPassword?.value).toBe('test-password');
  });

  it('rejects an empty source list', () => {
    expect(() =>
      parseSharepointConfig(
        { ...baseSharepointYaml, sources: [] },
        { SHAREPOINT_AUTH_CLIENT_SECRET: 'test-secret' },
      ),
    ).toThrow('At least one source must be configured');
  });
});

describe('ProcessingConfigSchema', () => {
  it('applies chunking defaults', () => {
    const config = ProcessingConfigSchema.parse({});

    expect(config.chunking).toEqual({ strategy: 'fixed', chunkSize: 1000, chunkOverlap: 200 });
    expect(config.securityGroups).toEqual({});
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() =>
      ProcessingConfigSchema.parse({ chunking: { chunkSize: 200, chunkOverlap: 200 } }),
    ).toThrow('chunkOverlap must be smaller than chunkSize');
  });

  it('only accepts known security groups', () => {
    expect(() =>
      ProcessingConfigSchema.parse({ securityGroups: { 'HR Owners': 'Group_top' } }),
    ).toThrow();
  });
});

describe('parseEmbeddingConfig', () => {
  it('requires an endpoint for azure-openai', () => {
    expect(() =>
      parseEmbeddingConfig({ provider: 'azure-openai' }, { EMBEDDING_API_KEY: 'test-key' }),
    ).toThrow('endpoint is required when provider is azure-openai');
  });

  it('applies retry defaults', () => {
    const config = parseEmbeddingConfig({}, { EMBEDDING_API_KEY: 'test-key' });

    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000 });
    expect(config.apiKey.value).toBe('test-key');
  });
});

describe('parseSearchConfig', () => {
  it('rejects a trailing slash on the endpoint', () => {
    expect(() =>
      parseSearchConfig(
        { endpoint: 'https://contoso-search.search.windows.net/', indexName: 'chunks' },
        { SEARCH_API_KEY: 'test-key' },
      ),
    ).toThrow('Search endpoint must not end with a trailing slash');
  });

  it('applies index defaults', () => {
    const config = parseSearchConfig(
      { endpoint: 'https://contoso-search.search.windows.net', indexName: 'chunks' },
      { SEARCH_API_KEY: 'test-key' },
    );

    expect(config.uploadBatchSize).toBe(100);
    expect(config.apiVersion).toBe('2024-07-01');
    expect(config.semanticConfigurationName).toBe('config');
  });
});
