/**
 * Factory functions composing the built-in filters. Rules parsed from text
 * and hand-built filters share these.
 */

import { FilterCallback, ILogFilter, LogLevel } from '../types';
import { AllFilter, AnyFilter, NotFilter, OptionalFilter } from './CompositeFilter';
import { CallbackFilter, ConstantFilter } from './ConstantFilter';
import { ExactLevelFilter, MinimumLevelFilter } from './LevelFilter';
import { NamespaceFilter, isMatchAllSpec } from './NamespaceFilter';

export const alwaysTrue: ILogFilter = ConstantFilter.ALWAYS;
export const alwaysFalse: ILogFilter = ConstantFilter.NEVER;

export function exactLevel(level: LogLevel): ILogFilter {
  return new ExactLevelFilter(level);
}

export function minimumLevel(level: LogLevel): ILogFilter {
  return new MinimumLevelFilter(level);
}

export function any(...filters: OptionalFilter[]): ILogFilter {
  return new AnyFilter(filters);
}

export function all(...filters: OptionalFilter[]): ILogFilter {
  return new AllFilter(filters);
}

export function not(filter: ILogFilter): ILogFilter {
  return new NotFilter(filter);
}

export function fromFunction(callback: FilterCallback): ILogFilter {
  return new CallbackFilter(callback);
}

/**
 * Compiles a comma-separated namespace spec, e.g. `"foo*,-foo.foo"`.
 */
export function byNamespaces(spec: string): ILogFilter {
  if (spec === '') {
    return alwaysFalse;
  }
  if (isMatchAllSpec(spec)) {
    return alwaysTrue;
  }
  return new NamespaceFilter(spec);
}
