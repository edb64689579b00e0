import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveLogColor, resolveLogLevel, validateLoggerEnv } from '../env.schema.js';
import { flushLoggers, getLogger, initLogger, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';

function collectingSink(entries: LogEntry[]): Sink {
  return {
    write: (entry: LogEntry) => entries.push(entry),
    flush: () => undefined,
  };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('is silent when no sink is configured', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    getLogger('silent').info('nobody listens');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('writes entries with level and category', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    getLogger('UnitOfWork').info('commit finished');

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.category).toBe('UnitOfWork');
    expect(entries[0]?.msg).toBe('commit finished');
    expect(entries[0]?.context).toBeUndefined();
  });

  it('drops entries below the configured level', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'warn', sinks: [collectingSink(entries)] });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('serializes errors, bigint and circular references in context', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });

    const data: Record<string, unknown> = { name: 'orders' };
    data['self'] = data;
    getLogger('test').error({ error: new Error('disk full'), rows: BigInt(12), data }, 'flush failed');

    const context = entries[0]?.context;
    expect(context?.['error']).toMatchObject({ name: 'Error', message: 'disk full' });
    expect(context?.['rows']).toBe('12');
    expect(context?.['data']).toEqual({ name: 'orders', self: '[Circular]' });
  });

  it('merges child bindings into every entry', () => {
    const entries: LogEntry[] = [];
    initLogger({ level: 'debug', sinks: [collectingSink(entries)] });

    const scoped = getLogger('UnitOfWork').child({ scope: 'uow-1' });
    scoped.debug('plain message');
    scoped.debug({ inserts: 2 }, 'with context');

    expect(entries[0]?.context).toEqual({ scope: 'uow-1' });
    expect(entries[1]?.context).toEqual({ scope: 'uow-1', inserts: 2 });
    expect(entries[1]?.category).toBe('UnitOfWork');
  });

  it('caches loggers by category', () => {
    expect(getLogger('a')).toBe(getLogger('a'));
    expect(getLogger('a')).not.toBe(getLogger('b'));
  });

  it('applies configuration to loggers created before initLogger', () => {
    const entries: LogEntry[] = [];
    const early = getLogger('early');

    early.info('before init');
    initLogger({ level: 'info', sinks: [collectingSink(entries)] });
    early.info('after init');

    expect(entries.map((e) => e.msg)).toEqual(['after init']);
  });

  it('flushes every sink', () => {
    const flush1 = vi.fn();
    const flush2 = vi.fn();
    initLogger({ sinks: [{ write: () => undefined, flush: flush1 }, { write: () => undefined, flush: flush2 }] });

    flushLoggers();

    expect(flush1).toHaveBeenCalledOnce();
    expect(flush2).toHaveBeenCalledOnce();
  });
});

describe('ConsoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  const entry = (msg: string): LogEntry => ({
    level: 'info',
    category: 'test',
    timestamp: new Date(2024, 0, 1, 12, 0, 0),
    msg,
  });

  it('prints on the next macrotask', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sink = new ConsoleSink({ color: false });
    sink.write(entry('message 1'));

    expect(consoleSpy).not.toHaveBeenCalled();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(consoleSpy).toHaveBeenCalledWith('[12:00:00] INFO  [test] message 1');
  });

  it('drops the oldest entries on overflow and reports the drop', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink = new ConsoleSink({ color: false, maxBuffer: 3 });
    for (let i = 1; i <= 5; i++) {
      sink.write(entry(`message ${i}`));
    }

    sink.flush();

    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{2}:\d{2}:\d{2}\] WARN  \[logger\] Dropped 2 log entries \(buffer overflow\)$/)
    );
    expect(consoleSpy.mock.calls).toEqual([
      ['[12:00:00] INFO  [test] message 3'],
      ['[12:00:00] INFO  [test] message 4'],
      ['[12:00:00] INFO  [test] message 5'],
    ]);
  });

  it('colors levels when ZENTITY_LOG_COLOR is true', () => {
    vi.stubEnv('ZENTITY_LOG_COLOR', 'true');
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sink = new ConsoleSink();

    sink.write(entry('colored'));
    sink.flush();

    expect(consoleSpy).toHaveBeenCalledWith('[12:00:00] \x1b[32mINFO \x1b[0m [test] colored');
  });

  it('formats level, category, message and context', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sink = new ConsoleSink({ color: false });

    sink.write({
      level: 'info',
      category: 'Zentity',
      timestamp: new Date(2024, 0, 1, 9, 5, 7),
      msg: 'database ready',
      context: { path: ':memory:', tables: 2 },
    });
    sink.flush();

    expect(consoleSpy).toHaveBeenCalledWith('[09:05:07] INFO  [Zentity] database ready {path=":memory:", tables=2}');
    consoleSpy.mockRestore();
  });

  it('routes error and warn to console.error and console.warn', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink = new ConsoleSink();

    sink.write({ level: 'error', category: 'test', timestamp: new Date(), msg: 'error message' });
    sink.write({ level: 'warn', category: 'test', timestamp: new Date(), msg: 'warn message' });
    sink.flush();

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('error message'));
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('warn message'));
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });
});

describe('logger environment', () => {
  it('defaults to info without color', () => {
    expect(validateLoggerEnv({})).toEqual({ ZENTITY_LOG_LEVEL: 'info', ZENTITY_LOG_COLOR: false });
  });

  it('reads the level from ZENTITY_LOG_LEVEL', () => {
    expect(resolveLogLevel({ ZENTITY_LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('reads color from ZENTITY_LOG_COLOR', () => {
    expect(resolveLogColor({ ZENTITY_LOG_COLOR: 'true' })).toBe(true);
    expect(resolveLogColor({})).toBe(false);
  });

  it('rejects unknown levels', () => {
    expect(() => validateLoggerEnv({ ZENTITY_LOG_LEVEL: 'loud' })).toThrow(/ZENTITY_LOG_LEVEL/);
  });
});
