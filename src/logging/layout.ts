import type { Layout, LogRecord } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';

type Segment = { kind: 'text'; text: string } | { kind: 'token'; token: Token };
type Token = 'l' | 'm' | 't' | 'd' | 'n';

const TOKENS: Record<Token, (record: LogRecord) => string> = {
  l: (r) => r.level.toUpperCase(),
  m: (r) => r.message,
  t: (r) => r.target,
  d: (r) => (r.timestamp ? r.timestamp.toISOString() : ''),
  n: () => '\n',
};

function isToken(name: string): name is Token {
  return Object.prototype.hasOwnProperty.call(TOKENS, name);
}

/**
 * Pattern-based layout.
 *
 * `{l}` level, `{t}` target, `{m}` message, `{d}` ISO timestamp, `{n}` newline.
 * `{{` and `}}` produce literal braces.
 *
 * @example
 * ```typescript
 * new PatternLayout('{l} {t} {m}').format({ level: 'info', target: 'app', message: 'hi' });
 * // "INFO app hi"
 * ```
 */
export class PatternLayout implements Layout {
  private readonly segments: Segment[];

  constructor(readonly pattern: string) {
    this.segments = PatternLayout.parse(pattern);
  }

  format(record: LogRecord): string {
    let out = '';
    for (const seg of this.segments) {
      out += seg.kind === 'text' ? seg.text : TOKENS[seg.token](record);
    }
    return out;
  }

  private static parse(pattern: string): Segment[] {
    const segments: Segment[] = [];
    let text = '';
    let i = 0;
    while (i < pattern.length) {
      const ch = pattern[i];
      if ((ch === '{' || ch === '}') && pattern[i + 1] === ch) {
        text += ch;
        i += 2;
        continue;
      }
      if (ch === '}') {
        throw new ConfigurationError('invalid-layout', `Unmatched "}" at ${i} in pattern "${pattern}"`);
      }
      if (ch === '{') {
        const close = pattern.indexOf('}', i);
        if (close === -1) {
          throw new ConfigurationError('invalid-layout', `Unclosed "{" at ${i} in pattern "${pattern}"`);
        }
        const name = pattern.slice(i + 1, close);
        if (!isToken(name)) {
          throw new ConfigurationError('invalid-layout', `Unknown token "{${name}}" in pattern "${pattern}"`);
        }
        if (text) segments.push({ kind: 'text', text });
        text = '';
        segments.push({ kind: 'token', token: name });
        i = close + 1;
        continue;
      }
      text += ch;
      i++;
    }
    if (text) segments.push({ kind: 'text', text });
    return segments;
  }
}
