import { describe, test, expect, afterEach, vi } from 'vitest';
import { LoggerFactory } from '../LoggerFactory';
import { MemorySink } from '../sinks/MemorySink';
import { RuleParseError } from '../rules/RuleParseError';
import { DEFAULT_LOGGING_CONFIG } from '../../config/schemas/LoggingConfig';

describe('LoggerFactory', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should filter named loggers through the configured rules', () => {
    const memory = new MemorySink();
    const factory = new LoggerFactory({ rules: 'info:api.* error:*' }, { sink: memory });

    const users = factory.createLogger('api.users');
    users.debug('skipped');
    users.info('listed users');
    factory.createLogger('db').info('skipped too');
    factory.createLogger('db').error('connection lost');

    expect(memory.getMessages()).toEqual(['listed users', 'connection lost']);
    expect(memory.getEntries()[1].entry.loggerName).toBe('db');
  });

  test('should hand out one logger per name', () => {
    const factory = new LoggerFactory({}, { sink: new MemorySink() });

    const first = factory.createLogger('api');

    expect(factory.createLogger('api')).toBe(first);
    expect(factory.getLogger('api')).toBe(first);
    expect(factory.getLogger('db')).toBeUndefined();
    expect(factory.getStats()).toEqual({ loggerCount: 1, loggers: ['api'], rules: '*', enabled: true });
  });

  test('should gate the default console sink at the configured level', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new LoggerFactory({ rules: '*', level: 'error' }).createLogger('api');

    logger.debug('dropped');
    logger.info('dropped too');
    logger.warn('still dropped');
    logger.error('kept');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
  });

  test('should throw on rules that do not parse', () => {
    expect(() => new LoggerFactory({ rules: 'verbose:*' })).toThrow(RuleParseError);
  });

  test('should drop everything when disabled', () => {
    const memory = new MemorySink();
    const factory = new LoggerFactory({ enabled: false, rules: 'not-a-level:*' }, { sink: memory });

    factory.getRootLogger().fatal('unseen');

    expect(memory.getEntries()).toEqual([]);
  });

  test('should fill the configuration from the defaults', () => {
    const factory = new LoggerFactory({ console: { useStderr: true } }, { sink: new MemorySink() });

    expect(factory.getConfiguration()).toEqual({
      ...DEFAULT_LOGGING_CONFIG,
      console: { ...DEFAULT_LOGGING_CONFIG.console, useStderr: true }
    });
  });

  test('should flush the sink chain and forget loggers on shutdown', async () => {
    const memory = new MemorySink();
    const flush = vi.spyOn(memory, 'flush');
    const factory = new LoggerFactory({}, { sink: memory });
    factory.createLogger('api');

    await factory.shutdown();

    expect(flush).toHaveBeenCalledTimes(1);
    expect(factory.getStats().loggerCount).toBe(0);
  });
});
