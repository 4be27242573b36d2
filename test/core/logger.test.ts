import { describe, expect, it } from 'vitest';
import { JsonLogger } from '../../src/core/logger.js';

const capture = () => {
  const lines: string[] = [];
  const entries = () =>
    lines.map((line) => {
      const parsed: Record<string, unknown> = JSON.parse(line);
      const { ts, ...rest } = parsed;
      expect(typeof ts).toBe('string');
      return rest;
    });
  return { lines, entries, sink: (line: string) => { lines.push(line); } };
};

describe('JsonLogger', () => {
  it('writes one JSON object per line', () => {
    const out = capture();
    new JsonLogger('info', {}, out.sink).info('signal emitted', { symbol: 'BTCUSDT' });
    expect(out.lines[0]?.endsWith('\n')).toBe(true);
    expect(out.entries()).toEqual([{ level: 'info', message: 'signal emitted', symbol: 'BTCUSDT' }]);
  });

  it('drops entries below the minimum level', () => {
    const out = capture();
    const logger = new JsonLogger('warn', {}, out.sink);
    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept too');
    expect(out.entries().map((e) => e['level'])).toEqual(['warn', 'error']);
  });

  it('carries child bindings', () => {
    const out = capture();
    const logger = new JsonLogger('debug', { service: 'signal-worker' }, out.sink).child({ component: 'grpc' });
    logger.debug('bound', { port: 50051 });
    expect(out.entries()).toEqual([
      { level: 'debug', message: 'bound', service: 'signal-worker', component: 'grpc', port: 50051 }
    ]);
  });
});
