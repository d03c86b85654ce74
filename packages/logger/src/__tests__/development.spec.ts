import { describe, expect, it } from 'vitest';
import { developmentPrettyOptions } from '../development';

describe('developmentPrettyOptions', () => {
  it('prints one line per entry prefixed with the caller', () => {
    const options = developmentPrettyOptions({ colorize: true });

    expect(options).toEqual({
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,service,trace_id,span_id,trace_flags',
      messageFormat: '{if caller}[{caller}] {end}{msg}',
      singleLine: true,
    });
  });

  it('overrides caller supplied formatting', () => {
    expect(developmentPrettyOptions({ singleLine: false, ignore: 'msg' })).toMatchObject({
      singleLine: true,
      ignore: 'pid,hostname,service,trace_id,span_id,trace_flags',
    });
  });
});
