/**
 * Boolean combinators over filters
 */

import { FieldSet, ILogFilter, LogEntry } from '../types';

export type OptionalFilter = ILogFilter | null | undefined;

/**
 * Admits when at least one member admits. Missing members are skipped.
 */
export class AnyFilter implements ILogFilter {
  readonly filters: readonly ILogFilter[];

  constructor(filters: readonly OptionalFilter[]) {
    this.filters = present(filters);
  }

  shouldLog(entry: LogEntry, fields?: FieldSet): boolean {
    return this.filters.some(filter => filter.shouldLog(entry, fields));
  }
}

/**
 * Admits when every member admits. With no members at all it rejects, so an
 * empty clause never lets everything through.
 */
export class AllFilter implements ILogFilter {
  readonly filters: readonly ILogFilter[];

  constructor(filters: readonly OptionalFilter[]) {
    this.filters = present(filters);
  }

  shouldLog(entry: LogEntry, fields?: FieldSet): boolean {
    if (this.filters.length === 0) {
      return false;
    }
    return this.filters.every(filter => filter.shouldLog(entry, fields));
  }
}

export class NotFilter implements ILogFilter {
  constructor(readonly filter: ILogFilter) {}

  shouldLog(entry: LogEntry, fields?: FieldSet): boolean {
    return !this.filter.shouldLog(entry, fields);
  }
}

function present(filters: readonly OptionalFilter[]): ILogFilter[] {
  return filters.filter((filter): filter is ILogFilter => filter != null);
}
