/**
 * Sink decorator that forwards only the entries its filter admits
 */

import { FieldSet, ILogFilter, ILogSink, LogEntry, LogLevel } from '../types';
import { alwaysFalse } from '../filters/FilterAlgebra';

export class FilteringSink implements ILogSink {
  readonly filter: ILogFilter;

  constructor(private readonly next: ILogSink, filter?: ILogFilter | null) {
    this.filter = filter ?? alwaysFalse;
  }

  /**
   * Pre-write gate, evaluated without fields. The downstream level gate is
   * reached through isLevelEnabled, which Logger asks first.
   */
  checkAdmission(entry: LogEntry): boolean {
    return this.filter.shouldLog(entry);
  }

  write(entry: LogEntry, fields: FieldSet): void | Promise<void> {
    if (!this.filter.shouldLog(entry, fields)) {
      return;
    }
    return this.next.write(entry, fields);
  }

  withContextFields(fields: FieldSet): ILogSink {
    return new FilteringSink(this.next.withContextFields(fields), this.filter);
  }

  /**
   * Downstream level gate, unfiltered; callers gating by rules must also
   * use checkAdmission.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.next.isLevelEnabled(level);
  }

  flush(): void | Promise<void> {
    return this.next.flush();
  }

  close(): void | Promise<void> {
    return this.next.close?.();
  }
}
