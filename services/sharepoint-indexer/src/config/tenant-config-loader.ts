import { readdirSync, readFileSync } from 'node:fs';
import { extname, join } from 'node:path';
import { normalizeError } from '@sp-indexer/utils';
import { load } from 'js-yaml';
import { z } from 'zod';
import { type TenantConfig, TenantConfigSchema } from './tenant-config.schema';

const TENANT_CONFIG_EXTENSIONS = new Set(['.yaml', '.yml']);

let cachedConfig: TenantConfig | null = null;

/** Path of the alphabetically first YAML file in `directory`. */
export function findTenantConfigFile(directory: string): string {
  const [configFile] = readdirSync(directory)
    .filter((file) => TENANT_CONFIG_EXTENSIONS.has(extname(file).toLowerCase()))
    .sort();

  if (!configFile) {
    throw new Error(`No YAML configuration files found in ${directory}`);
  }
  return join(directory, configFile);
}

function describeFailure(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return normalizeError(error).message;
}

export function readTenantConfig(configPath: string): TenantConfig {
  try {
    const document = load(readFileSync(configPath, 'utf-8'), { filename: configPath });
    return TenantConfigSchema.parse(document);
  } catch (error) {
    throw new Error(
      `Failed to load or validate tenant config from ${configPath}: ${describeFailure(error)}`,
      { cause: error },
    );
  }
}

/** Reads the tenant file once per process from `TENANT_CONFIG_DIRECTORY`. */
export function getTenantConfig(): TenantConfig {
  if (cachedConfig) return cachedConfig;

  const directory = process.env.TENANT_CONFIG_DIRECTORY;
  if (!directory) {
    throw new Error('TENANT_CONFIG_DIRECTORY environment variable is not set');
  }
  cachedConfig = readTenantConfig(findTenantConfigFile(directory));
  return cachedConfig;
}

export function clearTenantConfigCache(): void {
  cachedConfig = null;
}
