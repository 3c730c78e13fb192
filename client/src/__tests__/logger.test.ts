import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type LogRecord, createLogger, getLogLevel, isLogLevel, setLogLevel, setLogSink } from '../core/logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  afterEach(() => {
    setLogSink(null);
    setLogLevel('silent');
  });

  it('filters logs below the global level', () => {
    const logger = createLogger('test');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLogLevel('warn');
    logger.debug('nope');
    logger.warn('yeah');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[test]', 'yeah');
  });

  it('attaches category prefix and fields to console output', () => {
    const logger = createLogger('cat');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    logger.info('payload');
    logger.info('with fields', { count: 3 });

    expect(info).toHaveBeenNthCalledWith(1, '[cat]', 'payload');
    expect(info).toHaveBeenNthCalledWith(2, '[cat]', 'with fields', { count: 3 });
  });

  it('respects level changes at runtime', () => {
    const logger = createLogger('rt');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    setLogLevel('error');
    logger.info('hidden');
    logger.error('visible');

    expect(getLogLevel()).toBe('error');
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[rt]', 'visible');
  });

  it('silences everything at the silent level', () => {
    const records: LogRecord[] = [];
    setLogSink((record) => records.push(record));
    setLogLevel('silent');
    createLogger('quiet').error('dropped');
    expect(records).toEqual([]);
  });

  it('routes records through a custom sink', () => {
    const records: LogRecord[] = [];
    setLogSink((record) => records.push(record));

    const child = createLogger('Field').child('pipeline');
    child.warn('degraded', { stages: 1 });
    child.info('plain');

    expect(records).toEqual([
      { level: 'warn', category: 'Field:pipeline', message: 'degraded', fields: { stages: 1 } },
      { level: 'info', category: 'Field:pipeline', message: 'plain' },
    ]);
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
