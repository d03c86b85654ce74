import { registerAs } from '@nestjs/config';
import { type SharepointConfig, SharepointConfigSchema } from './sharepoint.schema';
import { getTenantConfig } from './tenant-config-loader';

export function parseSharepointConfig(
  yamlConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): SharepointConfig {
  return SharepointConfigSchema.parse({
    ...yamlConfig,
    authClientSecret: env.SHAREPOINT_AUTH_CLIENT_SECRET,
    authPrivateKeyPassword: env.SHAREPOINT_AUTH_PRIVATE_KEY_PASSWORD,
  });
}

export const sharepointConfig = registerAs(
  'sharepoint',
  (): SharepointConfig => parseSharepointConfig(getTenantConfig().sharepoint),
);

export type { SharepointConfig };
export type SharepointConfigNamespaced = { sharepoint: SharepointConfig };
