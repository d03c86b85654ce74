import path from 'node:path';
import { RequestMethod } from '@nestjs/common';
import type { Params } from 'nestjs-pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptionsInput {
  level: LogLevel;
  /** Name of the running service, attached to every request log line. */
  serviceName?: string;
  production?: boolean;
}

export const productionTarget = {
  target: 'pino/file',
};

export const developmentTarget = {
  // pino-pretty options that are functions cannot cross the worker thread boundary
  target: path.resolve(__dirname, './development'),
};

export const redactedPaths = [
  'req.headers.authorization',
  'req.headers["api-key"]',
  'req.headers["x-api-key"]',
  'req.query["api-key"]',
  'config.headers.Authorization',
];

export function createLoggerOptions({
  level,
  serviceName,
  production = process.env.NODE_ENV === 'production',
}: LoggerOptionsInput): Params {
  return {
    renameContext: production ? undefined : 'caller',
    pinoHttp: {
      enabled: true,
      level,
      redact: {
        paths: redactedPaths,
        censor: () => '[Redacted]',
      },
      customProps: () => (serviceName ? { service: serviceName } : {}),
      transport: production ? productionTarget : developmentTarget,
    },
    exclude: [
      { method: RequestMethod.GET, path: 'probe' },
      { method: RequestMethod.GET, path: 'health' },
    ],
  };
}

export const defaultLoggerOptions: Params = createLoggerOptions({ level: 'info' });
