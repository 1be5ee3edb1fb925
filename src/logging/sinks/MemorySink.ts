/**
 * In-memory sink recording everything written to it
 */

import { FieldSet, ILogSink, LogEntry, LogLevel } from '../types';

export interface RecordedEntry {
  entry: LogEntry;
  /** Context fields followed by the call-site fields. */
  fields: FieldSet;
}

export class MemorySink implements ILogSink {
  constructor(
    private readonly minLevel: LogLevel = LogLevel.DEBUG,
    private readonly records: RecordedEntry[] = [],
    private readonly context: FieldSet = []
  ) {}

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  checkAdmission(entry: LogEntry): boolean {
    return this.isLevelEnabled(entry.level);
  }

  write(entry: LogEntry, fields: FieldSet): void {
    this.records.push({ entry, fields: [...this.context, ...fields] });
  }

  /**
   * The child shares this sink's record.
   */
  withContextFields(fields: FieldSet): ILogSink {
    return new MemorySink(this.minLevel, this.records, [...this.context, ...fields]);
  }

  flush(): void {}

  getEntries(): RecordedEntry[] {
    return [...this.records];
  }

  getMessages(): string[] {
    return this.records.map(record => record.entry.message);
  }

  clear(): void {
    this.records.length = 0;
  }
}
