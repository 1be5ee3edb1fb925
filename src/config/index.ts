export { DEFAULT_LOGGING_CONFIG, resolveLoggingConfig } from './schemas/LoggingConfig';
export type { LoggingConfig, PartialLoggingConfig } from './schemas/LoggingConfig';
export { LoggingConfigValidator } from './validators/LoggingConfigValidator';
export type { ValidationResult } from './validators/LoggingConfigValidator';
export { EnvironmentConfigLoader } from './loaders/EnvironmentConfigLoader';
export type { EnvMapping, ConfigWarningHandler } from './loaders/EnvironmentConfigLoader';
export { loadLoggingConfig } from './loadLoggingConfig';
