import { Module } from '@nestjs/common';
import * as packageJson from '../package.json';
import { CoreModule } from './core.module';
import { IndexingModule } from './indexing/indexing.module';
import { ProbeModule } from './probe/probe.module';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [CoreModule, ProbeModule.forRoot({ version: packageJson.version }), SchedulerModule],
})
export class AppModule {}

@Module({
  imports: [CoreModule, IndexingModule],
})
export class IndexingRunModule {}
