import { FieldSet, FilterCallback, ILogFilter, LogEntry } from '../types';

export class ConstantFilter implements ILogFilter {
  static readonly ALWAYS = new ConstantFilter(true);
  static readonly NEVER = new ConstantFilter(false);

  private constructor(readonly value: boolean) {}

  shouldLog(): boolean {
    return this.value;
  }
}

/**
 * Adapts a plain callback, e.g. a sampling or field-based rule.
 */
export class CallbackFilter implements ILogFilter {
  constructor(private readonly callback: FilterCallback) {}

  shouldLog(entry: LogEntry, fields?: FieldSet): boolean {
    return this.callback(entry, fields);
  }
}
