/**
 * Formatter exports
 */

export { JSONFormatter } from './JSONFormatter';
export type { JSONFormatterOptions } from './JSONFormatter';
