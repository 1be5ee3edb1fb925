/**
 * Level keywords of the rule language: `debug`, `info+`, `*`, ...
 */

import { LevelSet, levelFromName } from '../levels';
import { RuleParseError } from './RuleParseError';

const AT_LEAST_SUFFIX = '+';

export type LevelTokenResult =
  | { success: true; levels: LevelSet }
  | { success: false; error: RuleParseError };

/**
 * Parses one keyword. `*` and the empty token select every level.
 */
export function parseLevelToken(token: string): LevelTokenResult {
  if (token === '' || token === '*') {
    return { success: true, levels: LevelSet.all() };
  }

  const atLeast = token.endsWith(AT_LEAST_SUFFIX);
  const name = atLeast ? token.slice(0, -AT_LEAST_SUFFIX.length) : token;
  const level = levelFromName(name);
  if (level === undefined) {
    return { success: false, error: RuleParseError.unsupportedKeyword(token) };
  }

  return { success: true, levels: atLeast ? LevelSet.atLeast(level) : LevelSet.exactly(level) };
}

/**
 * Parses a comma-separated keyword list into the union of its sets.
 */
export function parseLevelList(list: string): LevelTokenResult {
  let levels = LevelSet.empty();
  for (const token of list.split(',')) {
    const result = parseLevelToken(token);
    if (!result.success) {
      return result;
    }
    levels = levels.union(result.levels);
  }
  return { success: true, levels };
}
