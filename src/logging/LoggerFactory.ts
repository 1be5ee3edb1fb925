/**
 * Factory for creating and managing logger instances
 */

import { ILogSink, LogLevel, SinkErrorHandler } from './types';
import { Logger } from './Logger';
import { ConsoleSink } from './sinks/ConsoleSink';
import { FilteringSink } from './sinks/FilteringSink';
import { levelFromName } from './levels';
import { alwaysFalse } from './filters/FilterAlgebra';
import { mustParseRules } from './rules/RuleParser';
import { LoggingConfig, PartialLoggingConfig, resolveLoggingConfig } from '../config/schemas/LoggingConfig';

export interface LoggerFactoryOptions {
  /** Sink behind the filter; a ConsoleSink built from the config by default. */
  sink?: ILogSink;
  onError?: SinkErrorHandler;
}

export class LoggerFactory {
  private readonly configuration: LoggingConfig;
  private readonly root: Logger;
  private readonly loggers = new Map<string, Logger>();

  /**
   * Throws a RuleParseError when `config.rules` does not parse.
   */
  constructor(config: PartialLoggingConfig = {}, options: LoggerFactoryOptions = {}) {
    this.configuration = resolveLoggingConfig(config);

    const downstream = options.sink ?? this.createConsoleSink();
    const filter = this.configuration.enabled
      ? mustParseRules(this.configuration.rules)
      : alwaysFalse;

    this.root = new Logger(new FilteringSink(downstream, filter), '', options.onError);
  }

  createLogger(name: string): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const logger = this.root.named(name);
    this.loggers.set(name, logger);
    return logger;
  }

  getLogger(name: string): Logger | undefined {
    return this.loggers.get(name);
  }

  getRootLogger(): Logger {
    return this.root;
  }

  getConfiguration(): LoggingConfig {
    return {
      ...this.configuration,
      console: { ...this.configuration.console }
    };
  }

  async shutdown(): Promise<void> {
    const sink = this.root.getSink();
    await sink.flush();
    await sink.close?.();
    this.loggers.clear();
  }

  getStats() {
    return {
      loggerCount: this.loggers.size,
      loggers: Array.from(this.loggers.keys()),
      rules: this.configuration.rules,
      enabled: this.configuration.enabled
    };
  }

  private createConsoleSink(): ILogSink {
    return new ConsoleSink({
      level: levelFromName(this.configuration.level) ?? LogLevel.DEBUG,
      useStderr: this.configuration.console.useStderr,
      includeTimestamp: this.configuration.console.includeTimestamp
    });
  }
}
