/**
 * Logger-name (namespace) filtering with glob include/exclude patterns
 */

import { ILogFilter, LogEntry } from '../types';
import { GlobPattern } from './GlobPattern';

const EXCLUDE_PREFIX = '-';

export class NamespaceFilter implements ILogFilter {
  private readonly includePatterns: (GlobPattern | null)[] = [];
  private readonly excludePatterns: (GlobPattern | null)[] = [];
  private readonly verdicts = new Map<string, boolean>();

  /**
   * @param spec comma-separated globs; a leading `-` marks an exclusion
   */
  constructor(readonly spec: string) {
    for (const pattern of splitPatterns(spec)) {
      if (pattern.startsWith(EXCLUDE_PREFIX)) {
        // Malformed globs are kept as null and never match.
        this.excludePatterns.push(GlobPattern.compile(pattern.slice(EXCLUDE_PREFIX.length)));
      } else {
        this.includePatterns.push(GlobPattern.compile(pattern));
      }
    }
  }

  shouldLog(entry: LogEntry): boolean {
    return this.matches(entry.loggerName);
  }

  matches(loggerName: string): boolean {
    const cached = this.verdicts.get(loggerName);
    if (cached !== undefined) {
      return cached;
    }

    const verdict = this.evaluate(loggerName);
    this.verdicts.set(loggerName, verdict);
    return verdict;
  }

  /**
   * Number of distinct logger names seen so far.
   */
  get cacheSize(): number {
    return this.verdicts.size;
  }

  private evaluate(loggerName: string): boolean {
    const included = this.includePatterns.some(pattern => pattern?.matches(loggerName) ?? false);
    const excluded = this.excludePatterns.some(pattern => pattern?.matches(loggerName) ?? false);
    return included && !excluded;
  }
}

/**
 * True when the pattern list holds a bare `*` inclusion and no exclusion, i.e. it
 * admits every name.
 */
export function isMatchAllSpec(spec: string): boolean {
  const patterns = splitPatterns(spec);
  return patterns.includes('*') && !patterns.some(pattern => pattern.startsWith(EXCLUDE_PREFIX));
}

function splitPatterns(spec: string): string[] {
  return spec.split(',').filter(pattern => pattern !== '');
}
