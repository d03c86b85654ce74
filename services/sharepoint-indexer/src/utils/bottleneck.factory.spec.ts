import { ConfigService } from '@nestjs/config';
import { TestBed } from '@suites/unit';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BottleneckFactory } from './bottleneck.factory';

describe('BottleneckFactory', () => {
  let factory: BottleneckFactory;

  beforeEach(async () => {
    const { unit } = await TestBed.solitary(BottleneckFactory)
      .mock(ConfigService)
      .impl((stub) => ({
        ...stub(),
        get: vi.fn((key: string) => (key === 'app.logLevel' ? 'info' : undefined)),
      }))
      .compile();
    factory = unit;
  });

  afterEach(async () => {
    await factory.onModuleDestroy();
  });

  it('starts each limiter with a full minute of requests', async () => {
    const limiter = factory.createPerMinuteLimiter(120, 'Search API');

    await expect(limiter.currentReservoir()).resolves.toBe(120);
  });

  it('spends one reservoir unit per scheduled job', async () => {
    const limiter = factory.createPerMinuteLimiter(3, 'Graph API');

    await expect(limiter.schedule(async () => 'done')).resolves.toBe('done');
    await expect(limiter.currentReservoir()).resolves.toBe(2);
  });

  it('disconnects every limiter it created on shutdown', async () => {
    const graph = factory.createPerMinuteLimiter(60, 'Graph API');
    const search = factory.createPerMinuteLimiter(60, 'Search API');
    const graphDisconnect = vi.spyOn(graph, 'disconnect');
    const searchDisconnect = vi.spyOn(search, 'disconnect');

    await factory.onModuleDestroy();

    expect(graphDisconnect).toHaveBeenCalledTimes(1);
    expect(searchDisconnect).toHaveBeenCalledTimes(1);
  });
});
