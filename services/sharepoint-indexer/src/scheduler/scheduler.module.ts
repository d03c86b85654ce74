import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { IndexingModule } from '../indexing/indexing.module';
import { SchedulerService } from './scheduler.service';

@Module({
  imports: [ScheduleModule.forRoot(), ConfigModule, IndexingModule],
  providers: [SchedulerService],
})
export class SchedulerModule {}
