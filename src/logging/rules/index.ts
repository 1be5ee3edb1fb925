export { parseRules, mustParseRules } from './RuleParser';
export type { RuleParseResult } from './RuleParser';
export { parseLevelToken, parseLevelList } from './LevelKeywords';
export type { LevelTokenResult } from './LevelKeywords';
export { RuleParseError } from './RuleParseError';
export type { RuleParseErrorCode } from './RuleParseError';
