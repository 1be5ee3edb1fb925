import { describe, test, expect } from 'vitest';
import {
  all,
  alwaysFalse,
  alwaysTrue,
  any,
  exactLevel,
  fromFunction,
  minimumLevel,
  not
} from '../FilterAlgebra';
import { FieldSet, ILogFilter, LogEntry, LogLevel } from '../../types';
import { Logger } from '../../Logger';
import { FilteringSink } from '../../sinks/FilteringSink';
import { MemorySink } from '../../sinks/MemorySink';

function entry(level: LogLevel, loggerName: string = ''): LogEntry {
  return { level, loggerName, message: '', timestamp: new Date(0) };
}

function admitted(filter: ILogFilter): string[] {
  const memory = new MemorySink();
  const logger = new Logger(new FilteringSink(memory, filter));

  logger.debug('a');
  logger.info('b');
  logger.warn('c');
  logger.error('d');

  return memory.getMessages();
}

describe('FilterAlgebra', () => {
  describe('level primitives', () => {
    test('should admit the minimum level and everything more severe', () => {
      const filter = minimumLevel(LogLevel.WARN);

      expect(filter.shouldLog(entry(LogLevel.DEBUG))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.INFO))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.WARN))).toBe(true);
      expect(filter.shouldLog(entry(LogLevel.ERROR))).toBe(true);
      expect(filter.shouldLog(entry(LogLevel.FATAL))).toBe(true);
    });

    test('should admit only the exact level', () => {
      const filter = exactLevel(LogLevel.ERROR);

      expect(filter.shouldLog(entry(LogLevel.WARN))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.ERROR))).toBe(true);
      expect(filter.shouldLog(entry(LogLevel.DPANIC))).toBe(false);
    });
  });

  describe('combinators', () => {
    test('should reject with any() over no filters', () => {
      expect(any().shouldLog(entry(LogLevel.INFO))).toBe(false);
      expect(any(null, undefined).shouldLog(entry(LogLevel.INFO))).toBe(false);
    });

    test('should reject with all() over no filters', () => {
      expect(all().shouldLog(entry(LogLevel.INFO))).toBe(false);
      expect(all(null, undefined).shouldLog(entry(LogLevel.INFO))).toBe(false);
    });

    test('should skip missing filters instead of treating them as false', () => {
      expect(any(null, alwaysTrue).shouldLog(entry(LogLevel.INFO))).toBe(true);
      expect(all(null, alwaysTrue, undefined).shouldLog(entry(LogLevel.INFO))).toBe(true);
    });

    test('should negate a single filter', () => {
      const filter = not(exactLevel(LogLevel.DEBUG));

      expect(filter.shouldLog(entry(LogLevel.DEBUG))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.INFO))).toBe(true);
    });

    test('should expose constant filters', () => {
      expect(alwaysTrue.shouldLog(entry(LogLevel.DEBUG))).toBe(true);
      expect(alwaysFalse.shouldLog(entry(LogLevel.FATAL))).toBe(false);
    });
  });

  describe('custom filters', () => {
    test('should pass fields through to callback filters', () => {
      const seen: (FieldSet | undefined)[] = [];
      const filter = fromFunction((_entry, fields) => {
        seen.push(fields);
        return fields?.some(field => field.key === 'audit') ?? false;
      });

      const fields: FieldSet = [{ key: 'audit', value: true }];
      expect(filter.shouldLog(entry(LogLevel.INFO))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.INFO), fields)).toBe(true);
      expect(seen).toEqual([undefined, fields]);
    });

    test('should forward fields through composite filters', () => {
      const hasFields = fromFunction((_entry, fields) => (fields?.length ?? 0) > 0);
      const filter = all(minimumLevel(LogLevel.INFO), any(hasFields));

      expect(filter.shouldLog(entry(LogLevel.INFO))).toBe(false);
      expect(filter.shouldLog(entry(LogLevel.INFO), [{ key: 'k', value: 1 }])).toBe(true);
    });
  });

  describe('through a logger', () => {
    test.each<[string, ILogFilter, string[]]>([
      ['allow-all', fromFunction(() => true), ['a', 'b', 'c', 'd']],
      ['disallow-all', fromFunction(() => false), []],
      ['minimum-debug', minimumLevel(LogLevel.DEBUG), ['a', 'b', 'c', 'd']],
      ['minimum-info', minimumLevel(LogLevel.INFO), ['b', 'c', 'd']],
      ['minimum-warn', minimumLevel(LogLevel.WARN), ['c', 'd']],
      ['minimum-error', minimumLevel(LogLevel.ERROR), ['d']],
      ['exact-debug', exactLevel(LogLevel.DEBUG), ['a']],
      ['exact-info', exactLevel(LogLevel.INFO), ['b']],
      ['exact-warn', exactLevel(LogLevel.WARN), ['c']],
      ['exact-error', exactLevel(LogLevel.ERROR), ['d']],
      ['all-except-debug', not(exactLevel(LogLevel.DEBUG)), ['b', 'c', 'd']],
      ['all-except-info', not(exactLevel(LogLevel.INFO)), ['a', 'c', 'd']],
      ['all-except-warn', not(exactLevel(LogLevel.WARN)), ['a', 'b', 'd']],
      ['all-except-error', not(exactLevel(LogLevel.ERROR)), ['a', 'b', 'c']],
      ['any', any(exactLevel(LogLevel.DEBUG), exactLevel(LogLevel.WARN)), ['a', 'c']],
      ['all-disjoint', all(exactLevel(LogLevel.DEBUG), exactLevel(LogLevel.WARN)), []],
      ['all-same', all(exactLevel(LogLevel.DEBUG), exactLevel(LogLevel.DEBUG)), ['a']]
    ])('%s', (_name, filter, expected) => {
      expect(admitted(filter)).toEqual(expected);
    });
  });
});
