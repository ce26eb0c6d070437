/**
 * Tests for Console Logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './console-logger';
import { ArgumentParser } from '../cli/arg-parser';
import { BufferOutput } from '../io/buffer-output';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should only report warnings and errors by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('careful');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should format event type and metadata in pretty mode', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.child({ program: 'demo' }).event('argument_replaced', 'dup', { argument: '--a' });

    expect(warnSpy).toHaveBeenCalledWith('⚠️ (argument_replaced) dup {program=demo, argument=--a}');
  });

  it('should write debug output to stderr, never stdout', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger({ minLevel: 'debug' });

    logger.debug('details');

    expect(errorSpy).toHaveBeenCalledWith('🔍 details');
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should emit one JSON line per event in JSON mode', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ jsonOutput: true });

    logger.error('boom', { argument: '--x' });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(parsed).toMatchObject({
      level: 'error',
      eventType: 'error',
      message: 'boom',
      metadata: { argument: '--x' },
    });
  });

  it('should record emitted events', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger();
    logger.error('boom');
    expect(logger.getEvents().map((e) => e.message)).toEqual(['boom']);
  });

  it('should see events logged by its children', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger();
    const parser = new ArgumentParser(['/bin/prog'], {
      logger,
      stdout: new BufferOutput(),
      stderr: new BufferOutput(),
    });

    parser.addArgument('--a', 'first');
    parser.addArgument('--a', 'again');

    const events = logger.getEvents();
    expect(events).toHaveLength(1);
    expect(events[0].eventType).toBe('argument_replaced');
    expect(events[0].metadata).toEqual({ program: 'prog', argument: '--a' });
  });
});
