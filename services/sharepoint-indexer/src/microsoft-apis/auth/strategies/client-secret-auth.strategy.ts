import assert from 'node:assert';
import { ConfidentialClientApplication, type Configuration } from '@azure/msal-node';
import { Logger } from '@nestjs/common';
import { sanitizeError } from '@sp-indexer/utils';
import type { ClientSecretAuthConfig, TokenAcquisitionResult } from '../types';
import type { AuthStrategy } from './auth-strategy.interface';

export class ClientSecretAuthStrategy implements AuthStrategy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly msalClient: ConfidentialClientApplication;

  public constructor(config: ClientSecretAuthConfig) {
    assert.ok(config.authClientId, 'Client ID must be provided for client-secret authentication');
    assert.ok(
      config.authClientSecret.value,
      'Client secret must be provided for client-secret authentication',
    );

    const msalConfig: Configuration = {
      auth: {
        clientId: config.authClientId,
        authority: `https://login.microsoftonline.com/${config.authTenantId}`,
        clientSecret: config.authClientSecret.value,
      },
    };

    this.msalClient = new ConfidentialClientApplication(msalConfig);
  }

  public async acquireNewToken(scopes: string[]): Promise<TokenAcquisitionResult> {
    this.logger.log('Acquiring new Graph API token using client secret');

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
        msg: 'Failed to acquire Graph API token using client secret',
        error: sanitizeError(error),
      });

      throw error;
    }
  }
}
