/**
 * Validator for logging configuration
 */

import { PartialLoggingConfig } from '../schemas/LoggingConfig';
import { isLevelName } from '../../logging/levels';
import { parseRules } from '../../logging/rules/RuleParser';

export interface ValidationResult<T> {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  data: T | undefined;
}

export class LoggingConfigValidator {
  validate(config: unknown): ValidationResult<PartialLoggingConfig> {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isObject(config)) {
      return {
        isValid: false,
        errors: ['Logging configuration must be an object'],
        warnings: [],
        data: undefined
      };
    }

    if (config.enabled !== undefined && typeof config.enabled !== 'boolean') {
      errors.push('enabled must be a boolean');
    }

    if (config.rules !== undefined) {
      errors.push(...this.validateRules(config.rules, warnings));
    }

    if (config.level !== undefined && (typeof config.level !== 'string' || !isLevelName(config.level))) {
      errors.push('level must be one of: debug, info, warn, error, dpanic, panic, fatal');
    }

    if (config.console !== undefined) {
      errors.push(...this.validateConsoleConfig(config.console));
    }

    if (errors.length > 0) {
      return { isValid: false, errors, warnings, data: undefined };
    }

    return {
      isValid: true,
      errors,
      warnings,
      data: this.toConfig(config)
    };
  }

  private validateRules(rules: unknown, warnings: string[]): string[] {
    if (typeof rules !== 'string') {
      return ['rules must be a string'];
    }

    if (rules.trim() === '') {
      warnings.push('rules is empty; every entry will be dropped');
      return [];
    }

    const result = parseRules(rules);
    return result.success ? [] : [`rules: ${result.error.message}`];
  }

  private validateConsoleConfig(config: unknown): string[] {
    if (!isObject(config)) {
      return ['console must be an object'];
    }

    const errors: string[] = [];

    if (config.useStderr !== undefined && typeof config.useStderr !== 'boolean') {
      errors.push('console.useStderr must be a boolean');
    }

    if (config.includeTimestamp !== undefined && typeof config.includeTimestamp !== 'boolean') {
      errors.push('console.includeTimestamp must be a boolean');
    }

    return errors;
  }

  // Only called once every present field has been checked.
  private toConfig(config: Record<string, unknown>): PartialLoggingConfig {
    const result: PartialLoggingConfig = {};

    if (typeof config.enabled === 'boolean') {
      result.enabled = config.enabled;
    }
    if (typeof config.rules === 'string') {
      result.rules = config.rules;
    }
    if (typeof config.level === 'string' && isLevelName(config.level)) {
      result.level = config.level;
    }
    if (isObject(config.console)) {
      result.console = {};
      if (typeof config.console.useStderr === 'boolean') {
        result.console.useStderr = config.console.useStderr;
      }
      if (typeof config.console.includeTimestamp === 'boolean') {
        result.console.includeTimestamp = config.console.includeTimestamp;
      }
    }

    return result;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
