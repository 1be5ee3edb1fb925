/**
 * Severity ordering helpers and the LevelSet used by the rule language
 */

import { LogLevel, LogLevelName } from './types';

export const ALL_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.DPANIC,
  LogLevel.PANIC,
  LogLevel.FATAL
];

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  dpanic: LogLevel.DPANIC,
  panic: LogLevel.PANIC,
  fatal: LogLevel.FATAL
};

export function isLevelName(name: string): name is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, name);
}

/**
 * Case-insensitive lookup; undefined for unknown names.
 */
export function levelFromName(name: string): LogLevel | undefined {
  const lower = name.toLowerCase();
  return isLevelName(lower) ? LEVEL_NAMES[lower] : undefined;
}

export function levelToName(level: LogLevel): LogLevelName {
  switch (level) {
    case LogLevel.DEBUG: return 'debug';
    case LogLevel.INFO: return 'info';
    case LogLevel.WARN: return 'warn';
    case LogLevel.ERROR: return 'error';
    case LogLevel.DPANIC: return 'dpanic';
    case LogLevel.PANIC: return 'panic';
    case LogLevel.FATAL: return 'fatal';
  }
}

/**
 * Immutable set of severity levels.
 */
export class LevelSet {
  private readonly levels: ReadonlySet<LogLevel>;

  private constructor(levels: Iterable<LogLevel>) {
    this.levels = new Set(levels);
  }

  static empty(): LevelSet {
    return new LevelSet([]);
  }

  static all(): LevelSet {
    return new LevelSet(ALL_LEVELS);
  }

  static exactly(level: LogLevel): LevelSet {
    return new LevelSet([level]);
  }

  static atLeast(level: LogLevel): LevelSet {
    return new LevelSet(ALL_LEVELS.filter(candidate => candidate >= level));
  }

  union(other: LevelSet): LevelSet {
    return new LevelSet([...this.levels, ...other.levels]);
  }

  has(level: LogLevel): boolean {
    return this.levels.has(level);
  }

  isComplete(): boolean {
    return ALL_LEVELS.every(level => this.levels.has(level));
  }

  /** Levels in ascending severity. */
  toArray(): LogLevel[] {
    return ALL_LEVELS.filter(level => this.levels.has(level));
  }
}
