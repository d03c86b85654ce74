import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { sanitizeError } from '@sp-indexer/utils';
import { CronJob } from 'cron';
import { Config } from '../config';
import { SharepointIndexingService } from '../indexing/sharepoint-indexing.service';

export const INDEXING_CRON_JOB_NAME = 'sharepoint-indexing';

@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private isShuttingDown = false;

  public constructor(
    private readonly indexingService: SharepointIndexingService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  public onModuleInit(): void {
    this.logger.log('Triggering initial sync on service startup...');
    void this.runScheduledSync();
    this.setupScheduledSync();
  }

  public onModuleDestroy(): void {
    this.logger.log('SchedulerService is shutting down...');
    this.isShuttingDown = true;
    this.destroyCronJobs();
  }

  private setupScheduledSync(): void {
    const cronExpression = this.configService.get('processing.scanIntervalCron', { infer: true });
    this.logger.log(`Scheduled sync configured with cron expression: ${cronExpression}`);

    const job = new CronJob(cronExpression, () => {
      void this.runScheduledSync();
    });

    this.schedulerRegistry.addCronJob(INDEXING_CRON_JOB_NAME, job);
    job.start();
  }

  public async runScheduledSync(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.log('Skipping scheduled sync due to shutdown');
      return;
    }

    try {
      this.logger.log('Scheduler triggered');
      const result = await this.indexingService.synchronize();
      this.logger.log(`SharePoint sync ${result.status}`);
    } catch (error) {
      this.logger.error({
        msg: 'An unexpected error occurred during the scheduled sync',
        error: sanitizeError(error),
      });
    }
  }

  private destroyCronJobs(): void {
    try {
      const jobs = this.schedulerRegistry.getCronJobs();
      jobs.forEach((job, jobName) => {
        this.logger.log(`Stopping cron job: ${jobName}`);
        job.stop();
      });
    } catch (error) {
      this.logger.error({ msg: 'Error stopping cron jobs', error: sanitizeError(error) });
    }
  }
}
