import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { LogEvent } from '../../src/providers/ILogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- log() ---

  it('should accept a log event', () => {
    const event: LogEvent = { level: 'info', message: 'test' };
    provider.log(event);
    expect(provider.events).toHaveLength(1);
    expect(provider.events[0]).toMatchObject({ level: 'info', message: 'test' });
  });

  it('should auto-set timestamp if omitted', () => {
    provider.log({ level: 'info', message: 'no ts' });
    const timestamp = provider.events[0]?.timestamp ?? '';
    expect(new Date(timestamp).toISOString()).toBe(timestamp);
  });

  it('should preserve provided timestamp', () => {
    const ts = '2026-01-15T12:00:00.000Z';
    provider.log({ level: 'warn', message: 'with ts', timestamp: ts });
    expect(provider.events[0]?.timestamp).toBe(ts);
  });

  it('should preserve fields on events', () => {
    provider.log({ level: 'error', message: 'boom', fields: { code: 500, path: '/api' } });
    expect(provider.events[0]?.fields).toEqual({ code: 500, path: '/api' });
  });

  // --- convenience methods ---

  it('should log through the level helpers', () => {
    provider.debug('verbose');
    provider.info('hello');
    provider.warn('careful', { detail: 'test' });
    provider.error('broken', { stack: 'trace' });

    expect(provider.events.map((event) => event.level)).toEqual(['debug', 'info', 'warn', 'error']);
    expect(provider.events[2]).toMatchObject({ message: 'careful', fields: { detail: 'test' } });
  });

  // --- filtering and retention ---

  it('should drop events below the minimum level', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('skip');
    quiet.info('skip');
    quiet.warn('keep');
    quiet.error('keep');

    expect(quiet.events.map((event) => event.level)).toEqual(['warn', 'error']);
  });

  it('should not buffer events when retention is off', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const streaming = new ConsoleLogProvider({ outputToConsole: true, retainEvents: false });
    streaming.info('streamed');

    expect(streaming.events).toHaveLength(0);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  // --- console output ---

  it('should write info lines to stdout', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.log({ level: 'info', message: 'hello console', timestamp: '2026-01-15T12:00:00.000Z', fields: { n: 1 } });

    expect(spy).toHaveBeenCalledWith('2026-01-15T12:00:00.000Z [INFO] hello console {"n":1}');
  });

  it('should write warnings and errors to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.log({ level: 'warn', message: 'careful', timestamp: '2026-01-15T12:00:00.000Z' });

    expect(err).toHaveBeenCalledWith('2026-01-15T12:00:00.000Z [WARN] careful');
    expect(out).not.toHaveBeenCalled();
  });

  it('should not write to console by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(spy).not.toHaveBeenCalled();
  });

  // --- flush() / clear() ---

  it('flush() should resolve immediately', async () => {
    provider.info('test');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  it('clear() should empty the events buffer', () => {
    provider.info('one');
    provider.info('two');
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });
});
