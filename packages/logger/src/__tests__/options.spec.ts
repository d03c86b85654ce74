import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { RequestMethod } from '@nestjs/common';
import { describe, expect, it } from 'vitest';
import { createLoggerOptions, developmentTarget, productionTarget } from '../options';

describe('createLoggerOptions', () => {
  it('uses the pretty transport and caller context outside production', () => {
    const options = createLoggerOptions({ level: 'debug', production: false });

    expect(options.renameContext).toBe('caller');
    expect(options.pinoHttp).toMatchObject({ level: 'debug', transport: developmentTarget });
  });

  it('writes plain JSON in production', () => {
    const options = createLoggerOptions({ level: 'info', production: true });

    expect(options.renameContext).toBeUndefined();
    expect(options.pinoHttp).toMatchObject({ transport: productionTarget });
  });

  it('redacts credentials sent to the search and embedding endpoints', () => {
    const options = createLoggerOptions({ level: 'info', production: true });

    expect(options.pinoHttp).toMatchObject({
      redact: { paths: expect.arrayContaining(['req.headers.authorization', 'req.headers["api-key"]']) },
    });
  });

  it('tags request logs with the service name', () => {
    const options = createLoggerOptions({
      level: 'info',
      serviceName: 'sharepoint-indexer',
      production: true,
    });
    const pinoHttp = options.pinoHttp;
    const customProps =
      pinoHttp && !Array.isArray(pinoHttp) && 'customProps' in pinoHttp ? pinoHttp.customProps : undefined;

    const req = new IncomingMessage(new Socket());

    expect(customProps?.(req, new ServerResponse(req))).toEqual({
      service: 'sharepoint-indexer',
    });
  });

  it('keeps probe requests out of the logs', () => {
    const options = createLoggerOptions({ level: 'info' });

    expect(options.exclude).toContainEqual({ method: RequestMethod.GET, path: 'probe' });
  });
});
