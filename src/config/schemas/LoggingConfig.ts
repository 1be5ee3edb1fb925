/**
 * Configuration schema for rule-filtered logging
 */

import type { LogLevelName } from '../../logging/types';

export interface LoggingConfig {
  enabled: boolean;
  /** Rule string, e.g. `"*:myns info,warn:myns.* error:*"`. */
  rules: string;
  /** Level gate of the console sink behind the filter. */
  level: LogLevelName;
  console: {
    useStderr: boolean;
    includeTimestamp: boolean;
  };
}

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  enabled: true,
  rules: '*',
  level: 'debug',
  console: {
    useStderr: false,
    includeTimestamp: true
  }
};

export type PartialLoggingConfig = Partial<Omit<LoggingConfig, 'console'>> & {
  console?: Partial<LoggingConfig['console']>;
};

export function resolveLoggingConfig(config: PartialLoggingConfig = {}): LoggingConfig {
  return {
    ...DEFAULT_LOGGING_CONFIG,
    ...config,
    console: {
      ...DEFAULT_LOGGING_CONFIG.console,
      ...config.console
    }
  };
}
