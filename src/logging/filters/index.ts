/**
 * Filter exports
 */

export { ExactLevelFilter, MinimumLevelFilter } from './LevelFilter';
export { AnyFilter, AllFilter, NotFilter } from './CompositeFilter';
export type { OptionalFilter } from './CompositeFilter';
export { ConstantFilter, CallbackFilter } from './ConstantFilter';
export { NamespaceFilter } from './NamespaceFilter';
export { GlobPattern } from './GlobPattern';
export {
  alwaysTrue,
  alwaysFalse,
  exactLevel,
  minimumLevel,
  any,
  all,
  not,
  fromFunction,
  byNamespaces
} from './FilterAlgebra';
