import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const AppConfigSchema = z
  .object({
    nodeEnv: z
      .enum(['development', 'production', 'test'])
      .prefault('production')
      .describe('Specifies the environment in which the application is running'),
    port: z.coerce
      .number()
      .int()
      .min(0)
      .max(65535)
      .prefault(9542)
      .describe('The local HTTP port to bind the server to'),
    logLevel: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .prefault('info')
      .describe('The log level at which the services outputs (pino)'),
    logsDiagnosticsDataPolicy: z
      .enum(['conceal', 'disclose'])
      .prefault('conceal')
      .describe(
        'Controls whether sensitive data e.g. site names, file names, etc. are logged in full or smeared',
      ),
    tenantConfigDirectory: z
      .string()
      .nonempty()
      .describe('Directory containing tenant configuration YAML files'),
    runMode: z
      .enum(['scheduled', 'once'])
      .prefault('scheduled')
      .describe(
        'scheduled: serve the probe endpoint and index on a cron, once: index a single time and exit',
      ),
  })
  .transform((c) => ({
    ...c,
    isDev: c.nodeEnv === 'development',
  }));

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function parseAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return AppConfigSchema.parse({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    logsDiagnosticsDataPolicy: env.LOGS_DIAGNOSTICS_DATA_POLICY,
    tenantConfigDirectory: env.TENANT_CONFIG_DIRECTORY,
    runMode: env.RUN_MODE,
  });
}

export const appConfig = registerAs('app', (): AppConfig => parseAppConfig());

export type AppConfigNamespaced = { app: AppConfig };
