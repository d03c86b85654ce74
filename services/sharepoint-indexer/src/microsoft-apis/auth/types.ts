import type { SharepointConfig } from '../../config/sharepoint.schema';

export interface TokenAcquisitionResult {
  token: string;
  expiresAt: number;
}

export type ClientSecretAuthConfig = Extract<SharepointConfig, { authMode: 'client-secret' }>;
export type CertificateAuthConfig = Extract<SharepointConfig, { authMode: 'certificate' }>;
