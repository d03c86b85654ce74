import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sanitizeError } from '@sp-indexer/utils';
import Bottleneck from 'bottleneck';
import { Config } from '../config';

const ONE_MINUTE_MS = 60_000;

export interface PerMinuteLimiterOptions {
  maxConcurrent?: number;
}

/** Creates the rate limiters of the outbound API clients and disconnects them on shutdown. */
@Injectable()
export class BottleneckFactory implements OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly limiters = new Set<Bottleneck>();
  private readonly logQueueGrowth: boolean;

  public constructor(configService: ConfigService<Config, true>) {
    this.logQueueGrowth = configService.get('app.logLevel', { infer: true }) === 'debug';
  }

  /** Lets `requestsPerMinute` jobs start per minute. Later jobs wait for the next refill. */
  public createPerMinuteLimiter(
    requestsPerMinute: number,
    limiterName: string,
    { maxConcurrent }: PerMinuteLimiterOptions = {},
  ): Bottleneck {
    const limiter = new Bottleneck({
      reservoir: requestsPerMinute,
      reservoirRefreshAmount: requestsPerMinute,
      reservoirRefreshInterval: ONE_MINUTE_MS,
      maxConcurrent: maxConcurrent ?? null,
    });
    this.observe(limiter, limiterName, requestsPerMinute);
    this.limiters.add(limiter);
    return limiter;
  }

  public async onModuleDestroy(): Promise<void> {
    const limiters = [...this.limiters];
    this.limiters.clear();
    await Promise.all(limiters.map((limiter) => limiter.disconnect()));
  }

  private observe(limiter: Bottleneck, limiterName: string, requestsPerMinute: number): void {
    limiter.on('depleted', (empty) => {
      if (empty) {
        this.logger.warn({
          msg: 'Rate limit reached, queuing requests until the next refill',
          limiter: limiterName,
          requestsPerMinute,
        });
      }
    });

    if (this.logQueueGrowth) {
      limiter.on('queued', () => {
        const queued = limiter.counts().QUEUED;
        if (queued > 1) {
          this.logger.debug({ msg: 'Rate limit queue grew', limiter: limiterName, queued });
        }
      });
    }

    limiter.on('dropped', () => {
      this.logger.error({ msg: 'Rate limiter dropped a queued request', limiter: limiterName });
    });

    limiter.on('error', (error) => {
      this.logger.error({ msg: 'Rate limiter failed', limiter: limiterName, error: sanitizeError(error) });
    });
  }
}
