/**
 * Tests for logging
 */

import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, createDefaultLogger, isLogLevel, NoopLogger } from '../index.js';

const NOW = new Date('2024-01-02T03:04:05Z');

describe('ConsoleLogger', () => {
  it('should format level, name, message and context', () => {
    const logger = new ConsoleLogger('info', 'widgets');

    expect(logger.format('info', 'Loaded service model', { operations: 4 }, NOW)).toBe(
      '[2024-01-02T03:04:05.000Z] [INFO] [widgets] Loaded service model {"operations":4}'
    );
  });

  it('should omit the name and context when absent', () => {
    const logger = new ConsoleLogger();

    expect(logger.format('warn', 'careful', undefined, NOW)).toBe('[2024-01-02T03:04:05.000Z] [WARN] careful');
  });

  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn');

    logger.debug('hidden');
    logger.trace('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/\[WARN\] shown$/);
  });

  it('should route debug and trace to console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('trace');

    logger.debug('one');
    logger.trace('two');

    expect(debug).toHaveBeenCalledTimes(2);
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new NoopLogger().error('ignored', { code: 1 });

    expect(error).not.toHaveBeenCalled();
  });
});

describe('createDefaultLogger', () => {
  it('should default to warn', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createDefaultLogger({});

    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn.mock.calls[0]?.[0]).toMatch(/\[WARN\] \[model-client\] shown$/);
  });

  it('should honour the level from the environment', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createDefaultLogger({ MODEL_CLIENT_LOG_LEVEL: ' DEBUG ' });

    logger.debug('shown');
    logger.trace('hidden');

    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('should ignore unknown levels', () => {
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('trace')).toBe(true);
  });
});
