/**
 * Sink forwarding entries to a language client's output console
 */

import type { RemoteConsole } from 'vscode-languageserver';
import { FieldSet, ILogFormatter, ILogSink, LogEntry, LogLevel } from '../types';
import { JSONFormatter } from '../formatters/JSONFormatter';

export type ConnectionConsole = Pick<RemoteConsole, 'error' | 'warn' | 'info' | 'log'>;

export class ConnectionSink implements ILogSink {
  private readonly formatter: ILogFormatter;

  constructor(
    private readonly console: ConnectionConsole,
    private readonly level: LogLevel = LogLevel.INFO,
    formatter?: ILogFormatter,
    private readonly context: FieldSet = []
  ) {
    this.formatter = formatter ?? new JSONFormatter();
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  checkAdmission(entry: LogEntry): boolean {
    return this.isLevelEnabled(entry.level);
  }

  write(entry: LogEntry, fields: FieldSet): void {
    const message = this.formatter.format(entry, [...this.context, ...fields]);

    if (entry.level >= LogLevel.ERROR) {
      this.console.error(message);
    } else if (entry.level === LogLevel.WARN) {
      this.console.warn(message);
    } else if (entry.level === LogLevel.INFO) {
      this.console.info(message);
    } else {
      this.console.log(message);
    }
  }

  withContextFields(fields: FieldSet): ILogSink {
    return new ConnectionSink(this.console, this.level, this.formatter, [...this.context, ...fields]);
  }

  flush(): void {}
}
