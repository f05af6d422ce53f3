import { ScrollDirection } from '@screenpilot/shared';

const SCROLL_DIRECTIONS: readonly string[] = ['up', 'down', 'left', 'right'];

export function isScrollDirection(value: string): value is ScrollDirection {
  return SCROLL_DIRECTIONS.includes(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Body of the first fenced code block, or the trimmed text when there is
 * none.
 */
export function stripCodeFence(text: string): string {
  const fenced = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

/**
 * First balanced `{...}` in `text`. Braces inside string literals do not
 * count. Returns null when there is no complete object.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"') {
      quote = char;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

/**
 * Drops commas that directly precede `}` or `]`, leaving string contents
 * alone.
 */
export function stripTrailingCommas(json: string): string {
  let result = '';
  let inString = false;
  for (let i = 0; i < json.length; i++) {
    const char = json[i];
    if (inString) {
      result += char;
      if (char === '\\') {
        result += json[++i] ?? '';
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === ',' && /^\s*[}\]]/.test(json.slice(i + 1))) {
      continue;
    }
    result += char;
  }
  return result;
}
