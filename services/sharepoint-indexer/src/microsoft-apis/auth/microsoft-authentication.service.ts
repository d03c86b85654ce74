import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../../config';
import { GRAPH_SCOPE } from '../../constants/defaults.constants';
import type { AuthStrategy } from './strategies/auth-strategy.interface';
import { CertificateAuthStrategy } from './strategies/certificate-auth.strategy';
import { ClientSecretAuthStrategy } from './strategies/client-secret-auth.strategy';
import { TokenCache } from './token-cache';

/**
 * Acquires app-only Microsoft Graph tokens through MSAL.
 * - Client Secret Strategy (local development, simple deployments)
 * - Client Certificate Strategy (PEM key, optionally encrypted)
 */
@Injectable()
export class MicrosoftAuthenticationService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly strategy: AuthStrategy;
  private readonly tokenCache: TokenCache;

  public constructor(private readonly configService: ConfigService<Config, true>) {
    const sharepointConfig = this.configService.get('sharepoint', { infer: true });
    switch (sharepointConfig.authMode) {
      case 'client-secret':
        this.strategy = new ClientSecretAuthStrategy(sharepointConfig);
        break;
      case 'certificate':
        this.strategy = new CertificateAuthStrategy(sharepointConfig);
        break;
    }
    this.logger.log(`Using ${this.strategy.constructor.name} for Microsoft API authentication`);
    this.tokenCache = new TokenCache(() => this.strategy.acquireNewToken([GRAPH_SCOPE]));
  }

  public async getAccessToken(): Promise<string> {
    return await this.tokenCache.getToken();
  }

  /** Drops the cached token so the next call acquires a fresh one. */
  public invalidateToken(): void {
    this.tokenCache.invalidate();
  }
}
