export type RuleParseErrorCode = 'bad-syntax' | 'unsupported-keyword';

export class RuleParseError extends Error {
  readonly code: RuleParseErrorCode;
  /** Offending level keyword, for `unsupported-keyword`. */
  readonly token?: string;
  /** The whitespace-separated rule the error was found in. */
  readonly rule?: string;

  constructor(code: RuleParseErrorCode, message: string, details: { token?: string; rule?: string }) {
    super(message);
    this.name = 'RuleParseError';
    this.code = code;
    this.token = details.token;
    this.rule = details.rule;
  }

  static badSyntax(rule: string): RuleParseError {
    return new RuleParseError('bad-syntax', 'bad syntax', { rule });
  }

  static unsupportedKeyword(token: string, rule?: string): RuleParseError {
    return new RuleParseError('unsupported-keyword', `unsupported keyword: ${JSON.stringify(token)}`, { token, rule });
  }
}
