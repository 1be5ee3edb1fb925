/**
 * Core types and interfaces for rule-filtered structured logging
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  DPANIC = 4,
  PANIC = 5,
  FATAL = 6
}

export interface LogEntry {
  readonly level: LogLevel;
  /** Dot-segmented logger name, "" for the root logger. */
  readonly loggerName: string;
  readonly message: string;
  readonly timestamp: Date;
}

export interface LogField {
  readonly key: string;
  readonly value: unknown;
}

export type FieldSet = readonly LogField[];

/**
 * Admission decision over an entry. `fields` is absent during a pre-write
 * check and present during the actual write.
 */
export interface ILogFilter {
  shouldLog(entry: LogEntry, fields?: FieldSet): boolean;
}

export type FilterCallback = (entry: LogEntry, fields?: FieldSet) => boolean;

/**
 * Downstream log writer. Sinks can wrap sinks.
 */
export interface ILogSink {
  isLevelEnabled(level: LogLevel): boolean;
  checkAdmission(entry: LogEntry): boolean;
  write(entry: LogEntry, fields: FieldSet): void | Promise<void>;
  withContextFields(fields: FieldSet): ILogSink;
  flush(): void | Promise<void>;
  close?(): void | Promise<void>;
}

export interface ILogFormatter {
  format(entry: LogEntry, fields: FieldSet): string;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'dpanic' | 'panic' | 'fatal';

export type SinkErrorHandler = (error: unknown, entry: LogEntry) => void;
