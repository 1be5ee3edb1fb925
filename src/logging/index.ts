/**
 * Rule-filtered structured logging
 */

// Core types and interfaces
export * from './types';
export { ALL_LEVELS, LevelSet, levelFromName, levelToName, isLevelName } from './levels';

export { Logger, checkAnyLevel } from './Logger';
export { LoggerFactory } from './LoggerFactory';
export type { LoggerFactoryOptions } from './LoggerFactory';

// Filters and the filter algebra
export * from './filters';

// Rule language
export * from './rules';

// Sinks
export * from './sinks';

// Formatters
export * from './formatters';
