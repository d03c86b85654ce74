import { ConfigService } from '@nestjs/config';
import { createSmeared, type Smeared, smearPath } from '@sp-indexer/utils';
import type { Config } from '../config';

export function shouldConcealLogs(configService: ConfigService<Config, true>): boolean {
  return configService.get('app.logsDiagnosticsDataPolicy', { infer: true }) === 'conceal';
}

/** Binds the smearing policy once so call sites only pass the value. */
export function createDiagnosticsFormatter(conceal: boolean) {
  return {
    value: (value: string): Smeared => createSmeared(value, conceal),
    path: (path: string | undefined): string => smearPath(path, conceal),
  };
}

export type DiagnosticsFormatter = ReturnType<typeof createDiagnosticsFormatter>;
