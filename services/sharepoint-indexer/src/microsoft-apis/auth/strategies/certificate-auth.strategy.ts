import assert from 'node:assert';
import crypto from 'node:crypto';
import { readFileSync } from 'node:fs';
import { ConfidentialClientApplication, type Configuration } from '@azure/msal-node';
import { Logger } from '@nestjs/common';
import { sanitizeError } from '@sp-indexer/utils';
import type { CertificateAuthConfig, TokenAcquisitionResult } from '../types';
import type { AuthStrategy } from './auth-strategy.interface';

/**
 * Decrypts an encrypted PEM key into unencrypted PKCS#8, which is the only form MSAL accepts.
 * Unencrypted keys are passed through.
 */
export function loadPrivateKey(privateKeyRaw: string, password?: string): string {
  if (!password) return privateKeyRaw;

  const privateKeyObject = crypto.createPrivateKey({
    key: privateKeyRaw,
    passphrase: password,
    format: 'pem',
  });
  return privateKeyObject.export({ format: 'pem', type: 'pkcs8' }).toString();
}

export class CertificateAuthStrategy implements AuthStrategy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly msalClient: ConfidentialClientApplication;

  public constructor(config: CertificateAuthConfig) {
    const { authClientId, authPrivateKeyPath, authThumbprintSha1, authThumbprintSha256 } = config;

    assert.ok(authPrivateKeyPath, 'Private key path must be provided for certificate authentication');
    assert.ok(authClientId, 'Client ID must be provided for certificate authentication');

    const privateKey = loadPrivateKey(
      readFileSync(authPrivateKeyPath, 'utf8').trim(),
      config.authPrivateKeyPassword?.value,
    );

    const msalConfig: Configuration = {
      auth: {
        clientId: authClientId,
        authority: `https://login.microsoftonline.com/${config.authTenantId}`,
        clientCertificate: {
          privateKey,
          ...(authThumbprintSha256
            ? { thumbprintSha256: authThumbprintSha256 }
            : { thumbprint: authThumbprintSha1 }),
        },
      },
    };

    this.msalClient = new ConfidentialClientApplication(msalConfig);
  }

  public async acquireNewToken(scopes: string[]): Promise<TokenAcquisitionResult> {
    this.logger.log('Acquiring new Graph API token using client certificate');

    try {
      const response = await this.msalClient.acquireTokenByClientCredential({ scopes });

      assert.ok(
        response?.accessToken,
        'Failed to acquire Graph API token: no access token in response',
      );
      assert.ok(
        response.expiresOn,
        'Failed to acquire Graph API token: no expiration time in response',
      );

      return {
        token: response.accessToken,
        expiresAt: response.expiresOn.getTime(),
      };
    } catch (error) {
      this.logger.error({
        msg: 'Failed to acquire Graph API token using client certificate',
        error: sanitizeError(error),
      });

      throw error;
    }
  }
}
