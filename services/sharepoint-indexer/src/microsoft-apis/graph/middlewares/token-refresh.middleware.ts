import { Context, Middleware } from '@microsoft/microsoft-graph-client';
import { Logger } from '@nestjs/common';
import { sanitizeError } from '@sp-indexer/utils';
import { GraphAuthenticationService } from './graph-authentication.service';

const EXPIRED_TOKEN_MESSAGES = [
  'Lifetime validation failed',
  'token is expired',
  'Access token has expired',
];

interface GraphErrorBody {
  error?: {
    code?: unknown;
    message?: unknown;
  };
}

function isGraphErrorBody(value: unknown): value is GraphErrorBody {
  return typeof value === 'object' && value !== null;
}

/**
 * Retries a request once with a freshly acquired token when Graph answers 401 because the
 * bearer token expired. The original 401 response is kept when the retry cannot be made.
 */
export class TokenRefreshMiddleware implements Middleware {
  private readonly logger = new Logger(this.constructor.name);
  private nextMiddleware: Middleware | undefined;

  public constructor(private readonly graphAuthenticationService: GraphAuthenticationService) {}

  public async execute(context: Context): Promise<void> {
    if (!this.nextMiddleware) throw new Error('Next middleware not set');

    await this.nextMiddleware.execute(context);

    const isExpired = await this.isTokenExpiredError(context.response);
    if (!isExpired) return;

    this.logger.warn({ msg: 'Graph access token rejected as expired, refreshing and retrying' });
    this.graphAuthenticationService.invalidateAccessToken();

    try {
      const newAccessToken = await this.graphAuthenticationService.getAccessToken();

      const retryContext: Context = {
        request: this.cloneRequest(context.request),
        options: this.updateAuthorizationHeader(context.options, newAccessToken),
        middlewareControl: context.middlewareControl,
        customHosts: context.customHosts,
      };

      await this.nextMiddleware.execute(retryContext);

      context.response = retryContext.response;
    } catch (error) {
      // The caller still receives the original 401 response.
      this.logger.error({
        msg: 'Failed to refresh Graph token or retry request',
        error: sanitizeError(error),
      });
    }
  }

  public setNext(next: Middleware): void {
    this.nextMiddleware = next;
  }

  private async isTokenExpiredError(response: Response | undefined): Promise<boolean> {
    if (response?.status !== 401) return false;

    let body: unknown;
    try {
      body = await response.clone().json();
    } catch (error) {
      this.logger.debug({
        msg: 'Unreadable 401 body from Graph, treating token as expired',
        error: sanitizeError(error),
      });
      return true;
    }

    if (!isGraphErrorBody(body)) return true;
    const { code, message } = body.error ?? {};
    if (code === 'InvalidAuthenticationToken') return true;
    return (
      typeof message === 'string' &&
      EXPIRED_TOKEN_MESSAGES.some((fragment) => message.includes(fragment))
    );
  }

  private cloneRequest(request: RequestInfo): RequestInfo {
    if (typeof request === 'string') return request;
    return request.clone();
  }

  private updateAuthorizationHeader(
    options: RequestInit | undefined,
    newAccessToken: string,
  ): RequestInit {
    const headers = new Headers(options?.headers);
    headers.set('Authorization', `Bearer ${newAccessToken}`);
    return { ...options, headers };
  }
}
