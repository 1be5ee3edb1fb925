import { EnvironmentConfigLoader } from './loaders/EnvironmentConfigLoader';
import { LoggingConfig, PartialLoggingConfig, resolveLoggingConfig } from './schemas/LoggingConfig';
import { LoggingConfigValidator } from './validators/LoggingConfigValidator';

/**
 * Environment values override `overrides`, which override the defaults.
 * Throws when the merged configuration is invalid.
 */
export async function loadLoggingConfig(
  loader: EnvironmentConfigLoader = new EnvironmentConfigLoader(),
  overrides: PartialLoggingConfig = {}
): Promise<LoggingConfig> {
  const fromEnv = await loader.load();
  const envConsole = fromEnv.console;
  const merged: Record<string, unknown> = {
    ...overrides,
    ...fromEnv,
    console: {
      ...overrides.console,
      ...(envConsole !== null && typeof envConsole === 'object' ? envConsole : {})
    }
  };

  const result = new LoggingConfigValidator().validate(merged);
  if (!result.isValid || !result.data) {
    throw new Error(`Invalid logging configuration: ${result.errors.join('; ')}`);
  }

  return resolveLoggingConfig(result.data);
}
