/**
 * Shell-style glob patterns over logger names
 *
 * `*` matches any run of characters (dots and slashes included), `?` exactly one,
 * `[abc]`, `[a-z]` and `[^...]` are character classes, and `\` takes the
 * next character literally.
 */

export class GlobPattern {
  private readonly regex: RegExp;

  private constructor(readonly source: string, regex: RegExp) {
    this.regex = regex;
  }

  /**
   * Returns null when the pattern is malformed.
   */
  static compile(pattern: string): GlobPattern | null {
    const chars = Array.from(pattern);
    let body = '';
    let i = 0;

    while (i < chars.length) {
      const c = chars[i];
      switch (c) {
        case '*':
          body += '[\\s\\S]*';
          i++;
          break;
        case '?':
          body += '[\\s\\S]';
          i++;
          break;
        case '[': {
          const parsed = parseClass(chars, i + 1);
          if (!parsed) {
            return null;
          }
          body += parsed.source;
          i = parsed.next;
          break;
        }
        case '\\':
          if (i + 1 >= chars.length) {
            return null;
          }
          body += literal(chars[i + 1]);
          i += 2;
          break;
        default:
          body += literal(c);
          i++;
      }
    }

    return new GlobPattern(pattern, new RegExp(`^${body}$`, 'u'));
  }

  matches(name: string): boolean {
    return this.regex.test(name);
  }
}

interface ParsedClass {
  source: string;
  next: number;
}

function parseClass(chars: string[], start: number): ParsedClass | null {
  let i = start;
  let negated = false;
  if (chars[i] === '^') {
    negated = true;
    i++;
  }

  let ranges = '';
  let count = 0;
  for (;;) {
    if (i >= chars.length) {
      return null;
    }
    if (chars[i] === ']' && count > 0) {
      i++;
      break;
    }

    const lo = readClassChar(chars, i);
    if (!lo) {
      return null;
    }
    i = lo.next;

    if (chars[i] === '-') {
      const hi = readClassChar(chars, i + 1);
      if (!hi || codePoint(hi.char) < codePoint(lo.char)) {
        return null;
      }
      ranges += `${codePointEscape(lo.char)}-${codePointEscape(hi.char)}`;
      i = hi.next;
    } else {
      ranges += codePointEscape(lo.char);
    }
    count++;
  }

  return { source: `[${negated ? '^' : ''}${ranges}]`, next: i };
}

function readClassChar(chars: string[], i: number): { char: string; next: number } | null {
  const c = chars[i];
  if (c === undefined || c === '-' || c === ']') {
    return null;
  }
  if (c === '\\') {
    const escaped = chars[i + 1];
    return escaped === undefined ? null : { char: escaped, next: i + 2 };
  }
  return { char: c, next: i + 1 };
}

function literal(c: string): string {
  return c.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function codePoint(c: string): number {
  return c.codePointAt(0) ?? 0;
}

function codePointEscape(c: string): string {
  return `\\u{${codePoint(c).toString(16)}}`;
}
