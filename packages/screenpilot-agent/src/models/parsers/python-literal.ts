/**
 * Reads a Python literal (dict, list, tuple, str, int, float, None, True,
 * False) as produced by `str()` on model output. JSON's null/true/false are
 * accepted too, since ShowUI mixes both spellings.
 */
export function parsePythonLiteral(text: string): unknown {
  const reader = new LiteralReader(text);
  const value = reader.readValue();
  reader.skipWhitespace();
  if (!reader.atEnd()) {
    throw reader.error('Unexpected trailing input');
  }
  return value;
}

const KEYWORDS: Record<string, unknown> = {
  None: null,
  null: null,
  True: true,
  true: true,
  False: false,
  false: false,
};

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '0': '\0',
};

class LiteralReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  error(message: string): SyntaxError {
    return new SyntaxError(`${message} at position ${this.pos}`);
  }

  skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  readValue(): unknown {
    this.skipWhitespace();
    if (this.atEnd()) {
      throw this.error('Unexpected end of input');
    }
    const char = this.text[this.pos];

    switch (char) {
      case '{':
        return this.readDict();
      case '[':
        return this.readSequence(']');
      case '(':
        return this.readSequence(')');
      case "'":
      case '"':
        return this.readString(char);
    }

    if (/[-+0-9.]/.test(char)) {
      return this.readNumber();
    }

    const word = /^[A-Za-z_]+/.exec(this.text.slice(this.pos));
    if (word && word[0] in KEYWORDS) {
      this.pos += word[0].length;
      return KEYWORDS[word[0]];
    }
    throw this.error(`Unexpected character '${char}'`);
  }

  private readDict(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    this.pos++;
    this.readItems('}', () => {
      const key = this.readValue();
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw this.error('Dict keys must be strings or numbers');
      }
      this.skipWhitespace();
      this.expect(':');
      result[String(key)] = this.readValue();
    });
    return result;
  }

  private readSequence(close: ']' | ')'): unknown[] {
    const result: unknown[] = [];
    this.pos++;
    this.readItems(close, () => {
      result.push(this.readValue());
    });
    return result;
  }

  // Comma-separated items up to `close`; a trailing comma is allowed.
  private readItems(close: string, readItem: () => void): void {
    this.skipWhitespace();
    if (this.text[this.pos] === close) {
      this.pos++;
      return;
    }
    for (;;) {
      readItem();
      this.skipWhitespace();
      const char = this.text[this.pos];
      if (char === close) {
        this.pos++;
        return;
      }
      this.expect(',');
      this.skipWhitespace();
      if (this.text[this.pos] === close) {
        this.pos++;
        return;
      }
    }
  }

  private readString(quote: string): string {
    let result = '';
    this.pos++;
    while (!this.atEnd()) {
      const char = this.text[this.pos++];
      if (char === quote) {
        return result;
      }
      if (char !== '\\') {
        result += char;
        continue;
      }

      if (this.atEnd()) {
        break;
      }
      const escaped = this.text[this.pos++];
      if (escaped === 'u' || escaped === 'x') {
        const length = escaped === 'u' ? 4 : 2;
        const hex = this.text.slice(this.pos, this.pos + length);
        if (!new RegExp(`^[0-9a-fA-F]{${length}}$`).test(hex)) {
          throw this.error('Invalid escape sequence');
        }
        result += String.fromCharCode(parseInt(hex, 16));
        this.pos += length;
      } else if (escaped in ESCAPES) {
        result += ESCAPES[escaped];
      } else {
        // Python keeps unknown escapes verbatim
        result += `\\${escaped}`;
      }
    }
    throw this.error('Unterminated string');
  }

  private readNumber(): number {
    const match = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/.exec(
      this.text.slice(this.pos),
    );
    if (!match) {
      throw this.error('Invalid number');
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      throw this.error(`Expected '${char}'`);
    }
    this.pos++;
  }
}
