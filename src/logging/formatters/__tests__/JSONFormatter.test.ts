import { describe, test, expect } from 'vitest';
import { JSONFormatter } from '../JSONFormatter';
import { LogEntry, LogLevel } from '../../types';

const rootEntry: LogEntry = {
  level: LogLevel.ERROR,
  loggerName: '',
  message: 'boom',
  timestamp: new Date(0)
};

describe('JSONFormatter', () => {
  test('should omit the logger name for the root logger', () => {
    expect(new JSONFormatter().format(rootEntry, [])).toBe('{"level":"error","msg":"boom"}');
  });

  test('should serialize errors by name and message', () => {
    const formatted = new JSONFormatter().format(rootEntry, [{ key: 'err', value: new TypeError('bad input') }]);

    expect(formatted).toBe('{"level":"error","msg":"boom","err":{"name":"TypeError","message":"bad input"}}');
  });

  test('should let later fields override earlier ones with the same key', () => {
    const formatted = new JSONFormatter().format(rootEntry, [
      { key: 'attempt', value: 1 },
      { key: 'attempt', value: 2 }
    ]);

    expect(formatted).toBe('{"level":"error","msg":"boom","attempt":2}');
  });

  test('should pretty print when asked to', () => {
    const formatter = new JSONFormatter({ includeTimestamp: true });
    formatter.setPrettyPrint(true);

    expect(formatter.format(rootEntry, [])).toBe(
      '{\n  "level": "error",\n  "time": "1970-01-01T00:00:00.000Z",\n  "msg": "boom"\n}'
    );
  });
});
