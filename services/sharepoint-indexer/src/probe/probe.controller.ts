import { Controller, Get, HttpCode, HttpStatus, Inject, VERSION_NEUTRAL } from '@nestjs/common';

export const PROBE_VERSION = 'PROBE_VERSION';

export interface ProbeResponse {
  version: string;
}

@Controller({ path: 'probe', version: VERSION_NEUTRAL })
export class ProbeController {
  public constructor(@Inject(PROBE_VERSION) private readonly version: string) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  public probe(): ProbeResponse {
    return { version: this.version };
  }
}
