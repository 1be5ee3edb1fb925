/**
 * Level-based log filtering
 */

import { ILogFilter, LogEntry, LogLevel } from '../types';

export class ExactLevelFilter implements ILogFilter {
  constructor(readonly level: LogLevel) {}

  shouldLog(entry: LogEntry): boolean {
    return entry.level === this.level;
  }
}

export class MinimumLevelFilter implements ILogFilter {
  constructor(readonly minLevel: LogLevel) {}

  shouldLog(entry: LogEntry): boolean {
    return entry.level >= this.minLevel;
  }
}
