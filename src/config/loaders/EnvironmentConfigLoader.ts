/**
 * Environment variable mapping configuration
 */
export interface EnvMapping {
  envVar: string;
  configPath: string;
  type: 'string' | 'boolean';
}

export type ConfigWarningHandler = (message: string) => void;

/**
 * Configuration loader that reads from environment variables
 */
export class EnvironmentConfigLoader {
  private envMappings: EnvMapping[] = [];
  private readonly prefix: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly onWarning: ConfigWarningHandler;

  constructor(
    prefix: string = 'LOGRULES_',
    env: NodeJS.ProcessEnv = process.env,
    onWarning: ConfigWarningHandler = message => console.warn(message)
  ) {
    this.prefix = prefix;
    this.env = env;
    this.onWarning = onWarning;
    this.initializeDefaultMappings();
  }

  /**
   * Add custom environment variable mapping
   */
  addMapping(mapping: EnvMapping): void {
    this.envMappings.push(mapping);
  }

  getMappings(): EnvMapping[] {
    return [...this.envMappings];
  }

  /**
   * Load configuration from environment variables. The result is not yet
   * validated.
   */
  async load(): Promise<Record<string, unknown>> {
    const config: Record<string, unknown> = {};

    for (const mapping of this.envMappings) {
      const envValue = this.env[mapping.envVar];
      if (envValue === undefined) {
        continue;
      }

      const converted = this.convertValue(envValue, mapping);
      if (converted === undefined) {
        this.onWarning(`Ignoring ${mapping.envVar}: expected a ${mapping.type}, got ${JSON.stringify(envValue)}`);
        continue;
      }
      setValueByPath(config, mapping.configPath, converted);
    }

    return config;
  }

  private initializeDefaultMappings(): void {
    this.envMappings = [
      { envVar: `${this.prefix}ENABLED`, configPath: 'enabled', type: 'boolean' },
      { envVar: `${this.prefix}RULES`, configPath: 'rules', type: 'string' },
      { envVar: `${this.prefix}LEVEL`, configPath: 'level', type: 'string' },
      { envVar: `${this.prefix}CONSOLE_USE_STDERR`, configPath: 'console.useStderr', type: 'boolean' },
      { envVar: `${this.prefix}CONSOLE_INCLUDE_TIMESTAMP`, configPath: 'console.includeTimestamp', type: 'boolean' }
    ];
  }

  private convertValue(value: string, mapping: EnvMapping): string | boolean | undefined {
    switch (mapping.type) {
      case 'boolean':
        return this.parseBoolean(value);
      case 'string':
      default:
        return value;
    }
  }

  private parseBoolean(value: string): boolean | undefined {
    const lowerValue = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(lowerValue)) {
      return true;
    }
    if (['false', '0', 'no', 'off'].includes(lowerValue)) {
      return false;
    }
    return undefined;
  }
}

function setValueByPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let target = obj;
  for (const key of keys) {
    const next = target[key];
    if (isRecord(next)) {
      target = next;
    } else {
      const created: Record<string, unknown> = {};
      target[key] = created;
      target = created;
    }
  }
  target[lastKey] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
