/**
 * Named logger writing through a sink chain
 */

import { FieldSet, ILogSink, LogEntry, LogLevel, SinkErrorHandler } from './types';
import { ALL_LEVELS } from './levels';

const NAME_SEPARATOR = '.';

const reportToConsole: SinkErrorHandler = error => {
  console.error('Sink error:', error);
};

export class Logger {
  private readonly sink: ILogSink;
  private readonly name: string;
  private readonly onError: SinkErrorHandler;

  constructor(sink: ILogSink, name: string = '', onError: SinkErrorHandler = reportToConsole) {
    this.sink = sink;
    this.name = name;
    this.onError = onError;
  }

  debug(message: string, fields?: FieldSet): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: FieldSet): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: FieldSet): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: FieldSet): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  dpanic(message: string, fields?: FieldSet): void {
    this.log(LogLevel.DPANIC, message, fields);
  }

  panic(message: string, fields?: FieldSet): void {
    this.log(LogLevel.PANIC, message, fields);
  }

  fatal(message: string, fields?: FieldSet): void {
    this.log(LogLevel.FATAL, message, fields);
  }

  log(level: LogLevel, message: string, fields: FieldSet = []): void {
    const entry = this.createEntry(level, message);
    if (!this.admits(entry)) {
      return;
    }

    try {
      const result = this.sink.write(entry, fields);
      if (result instanceof Promise) {
        result.catch(err => this.onError(err, entry));
      }
    } catch (err) {
      this.onError(err, entry);
    }
  }

  /**
   * Whether an entry at `level` from this logger would be written.
   */
  check(level: LogLevel): boolean {
    return this.admits(this.createEntry(level, ''));
  }

  /**
   * Child logger whose name is this name plus `segment`, dot-joined.
   */
  named(segment: string): Logger {
    if (segment === '') {
      return this;
    }
    const name = this.name === '' ? segment : `${this.name}${NAME_SEPARATOR}${segment}`;
    return new Logger(this.sink, name, this.onError);
  }

  with(fields: FieldSet): Logger {
    if (fields.length === 0) {
      return this;
    }
    return new Logger(this.sink.withContextFields(fields), this.name, this.onError);
  }

  getName(): string {
    return this.name;
  }

  getSink(): ILogSink {
    return this.sink;
  }

  async flush(): Promise<void> {
    await this.sink.flush();
  }

  // Levels from DPANIC up skip the sink's level gate and face only its
  // admission check.
  private admits(entry: LogEntry): boolean {
    if (entry.level < LogLevel.DPANIC && !this.sink.isLevelEnabled(entry.level)) {
      return false;
    }
    return this.sink.checkAdmission(entry);
  }

  private createEntry(level: LogLevel, message: string): LogEntry {
    return {
      level,
      loggerName: this.name,
      message,
      timestamp: new Date()
    };
  }
}

/**
 * Whether the logger admits at least one level below PANIC.
 */
export function checkAnyLevel(logger: Logger): boolean {
  for (const level of ALL_LEVELS) {
    if (level >= LogLevel.PANIC) {
      continue;
    }
    if (logger.check(level)) {
      return true;
    }
  }
  return false;
}
