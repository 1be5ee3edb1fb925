/**
 * Compiles the textual rule language into a filter.
 *
 *   rule  := [levels ':'] namespaces
 *   rules := rule (whitespace rule)*
 *
 * e.g. `"*:myns info,warn:myns.* error:*"`. Rules are ORed together.
 */

import { ILogFilter } from '../types';
import { all, alwaysFalse, any, byNamespaces, exactLevel } from '../filters/FilterAlgebra';
import { parseLevelList } from './LevelKeywords';
import { RuleParseError } from './RuleParseError';

export type RuleParseResult =
  | { success: true; filter: ILogFilter }
  | { success: false; error: RuleParseError };

const RULE_SEPARATOR = /\s+/;
const LEVEL_SEPARATOR = ':';

export function parseRules(input: string): RuleParseResult {
  const clauses: ILogFilter[] = [];

  for (const rule of input.split(RULE_SEPARATOR)) {
    if (rule === '') {
      continue;
    }

    const compiled = compileRule(rule);
    if (!compiled.success) {
      return compiled;
    }
    clauses.push(compiled.filter);
  }

  return { success: true, filter: clauses.length === 0 ? alwaysFalse : any(...clauses) };
}

/**
 * Like parseRules, but throws the parse error. Meant for startup
 * configuration, where a bad rule string is fatal.
 */
export function mustParseRules(input: string): ILogFilter {
  const result = parseRules(input);
  if (!result.success) {
    throw result.error;
  }
  return result.filter;
}

function compileRule(rule: string): RuleParseResult {
  let levelsPart = '';
  let namespacesPart = rule;

  const separator = rule.indexOf(LEVEL_SEPARATOR);
  if (separator !== -1) {
    levelsPart = rule.slice(0, separator);
    namespacesPart = rule.slice(separator + LEVEL_SEPARATOR.length);
    if (levelsPart === '' || namespacesPart === '') {
      return { success: false, error: RuleParseError.badSyntax(rule) };
    }
  }

  const parsedLevels = parseLevelList(levelsPart);
  if (!parsedLevels.success) {
    const token = parsedLevels.error.token ?? levelsPart;
    return { success: false, error: RuleParseError.unsupportedKeyword(token, rule) };
  }

  const namespaces = byNamespaces(namespacesPart);
  if (parsedLevels.levels.isComplete()) {
    return { success: true, filter: namespaces };
  }

  const levelFilter = any(...parsedLevels.levels.toArray().map(exactLevel));
  return { success: true, filter: all(levelFilter, namespaces) };
}
