import { DynamicModule, Module } from '@nestjs/common';
import { PROBE_VERSION, ProbeController } from './probe.controller';

@Module({})
export class ProbeModule {
  public static forRoot({ version }: { version: string }): DynamicModule {
    return {
      module: ProbeModule,
      controllers: [ProbeController],
      providers: [{ provide: PROBE_VERSION, useValue: version }],
    };
  }
}
