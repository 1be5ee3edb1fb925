/**
 * Console sink for logging to stdout/stderr
 */

import { FieldSet, ILogFormatter, ILogSink, LogEntry, LogLevel } from '../types';
import { JSONFormatter } from '../formatters/JSONFormatter';

export class ConsoleSink implements ILogSink {
  readonly name: string;
  private readonly level: LogLevel;
  private readonly formatter: ILogFormatter;
  private readonly useStderr: boolean;
  private readonly context: FieldSet;

  constructor(options: ConsoleSinkOptions = {}, context: FieldSet = []) {
    this.name = options.name || 'console';
    this.level = options.level ?? LogLevel.DEBUG;
    this.formatter = options.formatter || new JSONFormatter({
      includeTimestamp: options.includeTimestamp ?? false
    });
    this.useStderr = options.useStderr ?? false;
    this.context = context;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  checkAdmission(entry: LogEntry): boolean {
    return this.isLevelEnabled(entry.level);
  }

  write(entry: LogEntry, fields: FieldSet): void {
    const formatted = this.formatter.format(entry, [...this.context, ...fields]);

    if (this.useStderr || entry.level >= LogLevel.WARN) {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  withContextFields(fields: FieldSet): ILogSink {
    return new ConsoleSink(
      {
        name: this.name,
        level: this.level,
        formatter: this.formatter,
        useStderr: this.useStderr
      },
      [...this.context, ...fields]
    );
  }

  flush(): void {}
}

export interface ConsoleSinkOptions {
  name?: string;
  level?: LogLevel;
  formatter?: ILogFormatter;
  includeTimestamp?: boolean;
  useStderr?: boolean;
}
