/**
 * Decode a nested value stored as text in a CSV cell.
 *
 * Tries JSON first, then a permissive literal dialect (single or double
 * quotes, `True`/`False`/`None`, tuples, trailing commas) as written by
 * older exports. Anything else is returned unchanged. Never throws.
 */
export function parseNested(raw: string): unknown {
  const text = raw.trim();
  if (text === '') return raw;

  const json = attempt((): unknown => JSON.parse(text));
  if (json.ok) return json.value;

  const literal = attempt(() => new LiteralParser(text).parseDocument());
  if (literal.ok) return literal.value;

  return raw;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function attempt<T>(fn: () => T): { ok: true; value: T } | { ok: false } {
  try {
    return { ok: true, value: fn() };
  } catch {
    return { ok: false };
  }
}

class LiteralSyntaxError extends Error {
  constructor(message: string, position: number) {
    super(`${message} at offset ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

const KEYWORDS: Record<string, unknown> = {
  True: true,
  False: false,
  None: null,
  true: true,
  false: false,
  null: null,
};

const NUMBER = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y;
const WORD = /[A-Za-z_]\w*/y;
const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t', '0': '\0' };

class LiteralParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseDocument(): unknown {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos !== this.text.length) throw this.error('Unexpected trailing input');
    return value;
  }

  private parseValue(): unknown {
    this.skipWhitespace();
    const char = this.peek();
    switch (char) {
      case '{':
        return this.parseDict();
      case '[':
        return this.parseSequence(']');
      case '(':
        return this.parseSequence(')');
      case "'":
      case '"':
        return this.parseString(char);
      default:
        return this.parseAtom();
    }
  }

  private parseDict(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    this.pos += 1;
    for (;;) {
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.pos += 1;
        return result;
      }
      const key = this.parseValue();
      this.skipWhitespace();
      this.expect(':');
      result[String(key)] = this.parseValue();
      if (!this.separator('}')) {
        this.expect('}');
        return result;
      }
    }
  }

  private parseSequence(close: ']' | ')'): unknown[] {
    const items: unknown[] = [];
    this.pos += 1;
    for (;;) {
      this.skipWhitespace();
      if (this.peek() === close) {
        this.pos += 1;
        return items;
      }
      items.push(this.parseValue());
      if (!this.separator(close)) {
        this.expect(close);
        return items;
      }
    }
  }

  private parseString(quote: string): string {
    let result = '';
    this.pos += 1;
    while (this.pos < this.text.length) {
      const char = this.text.charAt(this.pos);
      this.pos += 1;
      if (char === quote) return result;
      if (char !== '\\') {
        result += char;
        continue;
      }
      const escaped = this.text.charAt(this.pos);
      this.pos += 1;
      result += ESCAPES[escaped] ?? escaped;
    }
    throw this.error('Unterminated string');
  }

  private parseAtom(): unknown {
    NUMBER.lastIndex = this.pos;
    const number = NUMBER.exec(this.text);
    if (number) {
      this.pos += number[0].length;
      return Number(number[0]);
    }
    WORD.lastIndex = this.pos;
    const word = WORD.exec(this.text);
    if (word && Object.hasOwn(KEYWORDS, word[0])) {
      this.pos += word[0].length;
      return KEYWORDS[word[0]];
    }
    throw this.error('Unexpected token');
  }

  /** Consume a comma. Returns false when the container ends without one. */
  private separator(close: string): boolean {
    this.skipWhitespace();
    if (this.peek() === ',') {
      this.pos += 1;
      return true;
    }
    if (this.peek() === close) return false;
    throw this.error(`Expected ',' or '${close}'`);
  }

  private expect(char: string): void {
    this.skipWhitespace();
    if (this.peek() !== char) throw this.error(`Expected '${char}'`);
    this.pos += 1;
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek()) && this.pos < this.text.length) this.pos += 1;
  }

  private error(message: string): LiteralSyntaxError {
    return new LiteralSyntaxError(message, this.pos);
  }
}
