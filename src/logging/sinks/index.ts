/**
 * Sink exports
 */

export { FilteringSink } from './FilteringSink';

export { ConsoleSink } from './ConsoleSink';
export type { ConsoleSinkOptions } from './ConsoleSink';

export { ConnectionSink } from './ConnectionSink';
export type { ConnectionConsole } from './ConnectionSink';

export { MemorySink } from './MemorySink';
export type { RecordedEntry } from './MemorySink';
