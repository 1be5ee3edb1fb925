/**
 * JSON formatter for structured logging
 */

import { FieldSet, ILogFormatter, LogEntry } from '../types';
import { levelToName } from '../levels';

export class JSONFormatter implements ILogFormatter {
  private readonly includeTimestamp: boolean;
  private prettyPrint: boolean;

  constructor(options: JSONFormatterOptions = {}) {
    this.includeTimestamp = options.includeTimestamp ?? false;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  format(entry: LogEntry, fields: FieldSet): string {
    const formatted: Record<string, unknown> = {
      level: levelToName(entry.level)
    };

    if (this.includeTimestamp) {
      formatted.time = entry.timestamp.toISOString();
    }

    if (entry.loggerName !== '') {
      formatted.logger = entry.loggerName;
    }

    formatted.msg = entry.message;

    for (const field of fields) {
      formatted[field.key] = field.value instanceof Error
        ? { name: field.value.name, message: field.value.message }
        : field.value;
    }

    return this.prettyPrint
      ? JSON.stringify(formatted, null, 2)
      : JSON.stringify(formatted);
  }

  setPrettyPrint(pretty: boolean): void {
    this.prettyPrint = pretty;
  }
}

export interface JSONFormatterOptions {
  includeTimestamp?: boolean;
  prettyPrint?: boolean;
}
