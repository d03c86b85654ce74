import {
  AuthenticationHandler,
  Client,
  ClientOptions,
  HTTPMessageHandler,
  type Middleware,
  RedirectHandler,
  RedirectHandlerOptions,
  RetryHandler,
  RetryHandlerOptions,
  TelemetryHandler,
} from '@microsoft/microsoft-graph-client';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { type Counter, type Histogram } from '@opentelemetry/api';
import type { Config } from '../../config';
import {
  SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS,
  SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL,
  SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL,
} from '../../metrics';
import { shouldConcealLogs } from '../../utils/logging.util';
import { GraphAuthenticationService } from './middlewares/graph-authentication.service';
import { MetricsMiddleware } from './middlewares/metrics.middleware';
import { TokenRefreshMiddleware } from './middlewares/token-refresh.middleware';

@Injectable()
export class GraphClientFactory {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly graphAuthenticationService: GraphAuthenticationService,
    private readonly configService: ConfigService<Config, true>,
    @Inject(SPI_MS_GRAPH_API_REQUEST_DURATION_SECONDS)
    private readonly spiGraphApiRequestDurationSeconds: Histogram,
    @Inject(SPI_MS_GRAPH_API_THROTTLE_EVENTS_TOTAL)
    private readonly spiGraphApiThrottleEventsTotal: Counter,
    @Inject(SPI_MS_GRAPH_API_SLOW_REQUESTS_TOTAL)
    private readonly spiGraphApiSlowRequestsTotal: Counter,
  ) {}

  public createClient(): Client {
    const authenticationHandler = new AuthenticationHandler(this.graphAuthenticationService);
    const tokenRefreshMiddleware = new TokenRefreshMiddleware(this.graphAuthenticationService);
    const retryHandler = new RetryHandler(new RetryHandlerOptions());
    const redirectHandler = new RedirectHandler(new RedirectHandlerOptions());
    const telemetryHandler = new TelemetryHandler();
    const metricsMiddleware = new MetricsMiddleware(
      {
        requestDurationHistogram: this.spiGraphApiRequestDurationSeconds,
        throttleEventsCounter: this.spiGraphApiThrottleEventsTotal,
        slowRequestsCounter: this.spiGraphApiSlowRequestsTotal,
      },
      this.configService.get('sharepoint.authTenantId', { infer: true }),
      shouldConcealLogs(this.configService),
    );
    const httpMessageHandler = new HTTPMessageHandler();

    // httpMessageHandler must stay last
    const middlewares: Middleware[] = [
      authenticationHandler,
      tokenRefreshMiddleware,
      retryHandler,
      redirectHandler,
      telemetryHandler,
      metricsMiddleware,
      httpMessageHandler,
    ];

    for (let i = 0; i < middlewares.length - 1; i++) {
      const currentMiddleware = middlewares[i];
      const nextMiddleware = middlewares[i + 1];

      if (currentMiddleware?.setNext && nextMiddleware) {
        currentMiddleware.setNext(nextMiddleware);
      }
    }

    const clientOptions: ClientOptions = {
      middleware: middlewares[0],
      debugLogging: false, // else the client logs requests without a level
    };

    this.logger.debug({
      msg: 'Microsoft Graph client created',
      middlewareCount: middlewares.length,
    });

    return Client.initWithMiddleware(clientOptions);
  }
}
