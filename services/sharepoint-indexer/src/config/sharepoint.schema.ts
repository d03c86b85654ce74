import { Redacted, redactedOrUndefined } from '@sp-indexer/utils';
import { z } from 'zod';
import { DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE } from '../constants/defaults.constants';

const clientSecretAuthModeConfig = z.object({
  authMode: z.literal('client-secret').describe('Authentication mode to use for Microsoft APIs'),
  // Not part of the YAML, injected from SHAREPOINT_AUTH_CLIENT_SECRET
  authClientSecret: z
    .string({ error: 'SHAREPOINT_AUTH_CLIENT_SECRET must be set for client-secret authentication' })
    .nonempty()
    .transform((val) => new Redacted(val))
    .describe('Azure AD application client secret for Microsoft APIs'),
});

const certificateAuthModeConfig = z
  .object({
    authMode: z.literal('certificate').describe('Authentication mode to use for Microsoft APIs'),
    authThumbprintSha1: z
      .hex()
      .nonempty()
      .optional()
      .describe('SHA1 thumbprint of the Azure AD application certificate'),
    authThumbprintSha256: z
      .hex()
      .nonempty()
      .optional()
      .describe('SHA256 thumbprint of the Azure AD application certificate'),
    authPrivateKeyPath: z
      .string()
      .nonempty()
      .describe(
        'Path to the private key file of the Azure AD application certificate in PEM format',
      ),
    // Not part of the YAML, injected from SHAREPOINT_AUTH_PRIVATE_KEY_PASSWORD when the key is encrypted
    authPrivateKeyPassword: z
      .string()
      .optional()
      .transform((val) => redactedOrUndefined(val))
      .describe('Password of the encrypted private key'),
  })
  .refine((config) => config.authThumbprintSha1 || config.authThumbprintSha256, {
    message:
      'Either authThumbprintSha1 or authThumbprintSha256 has to be provided for certificate authentication mode',
  });

const fileListSchema = z.union([
  z.string().transform((val) =>
    val
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  ),
  z.array(z.string()),
]);

export const SourceConfigSchema = z.object({
  siteDomain: z
    .string()
    .nonempty()
    .describe('Host name of the SharePoint tenant, e.g. contoso.sharepoint.com'),
  siteName: z.string().nonempty().describe('Name of the site as it appears in /sites/<name>'),
  folderPath: z
    .string()
    .optional()
    .describe('Folder inside the default document library to start from, e.g. /Policies/2024'),
  recursive: z
    .boolean()
    .prefault(true)
    .describe('Whether the subfolders of folderPath are indexed as well'),
  fileFormats: fileListSchema
    .optional()
    .describe('File extensions to index without the dot, e.g. [docx, pdf]. All when empty'),
  fileNames: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe('Exact file name or names to index, all files when not set'),
  minutesAgo: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe('Only index files created or modified within this many minutes'),
  includeSitePages: z
    .boolean()
    .prefault(false)
    .describe('Whether the modern site pages of the site are indexed as well'),
  syncStatus: z
    .enum(['active', 'inactive'])
    .prefault('active')
    .describe('Sync status: active = index this source, inactive = skip this source'),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

const baseConfig = z.object({
  authTenantId: z.string().min(1).describe('Azure AD tenant ID'),
  authClientId: z.string().min(1).describe('Azure AD application client ID'),
  graphApiRateLimitPerMinute: z.coerce
    .number()
    .int()
    .positive()
    .prefault(DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE)
    .describe('Number of MS Graph API requests allowed per minute'),
  sources: z
    .array(SourceConfigSchema)
    .min(1, 'At least one source must be configured')
    .describe('SharePoint sites and folders to index'),
});

export const SharepointConfigSchema = z
  .discriminatedUnion('authMode', [clientSecretAuthModeConfig, certificateAuthModeConfig])
  .and(baseConfig);

export type SharepointConfig = z.infer<typeof SharepointConfigSchema>;
