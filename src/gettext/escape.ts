import { CatalogSyntaxError, DocumentSchemaError } from './errors.js';

// Catalog strings keep gettext's backslash escapes. These tables are the only
// place where escape text and literal characters are mapped onto each other.
const UNESCAPES = new Map<string, string>([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['"', '"'],
  ['\\', '\\'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['v', '\v'],
]);

const ESCAPES = new Map<string, string>(
  Array.from(UNESCAPES, ([letter, char]): [string, string] => [char, `\\${letter}`])
);

// Raw control characters met inside quotes are stored as their escapes.
function escapeForControlChar(char: string): string | undefined {
  return char === '"' || char === '\\' ? undefined : ESCAPES.get(char);
}

export type QuotedString = { value: string } | { reason: string };

/**
 * Reads one double-quoted catalog string, keeping its escapes. Raw control
 * characters inside the quotes come back as their escapes.
 */
export function readQuotedString(text: string): QuotedString {
  if (!text.startsWith('"')) {
    return { reason: 'expected a quoted string' };
  }
  let value = '';
  for (let i = 1; i < text.length; i++) {
    const char = text.charAt(i);
    if (char === '\\') {
      const letter = text.charAt(i + 1);
      if (letter === '') {
        return { reason: 'unterminated quoted string' };
      }
      if (!UNESCAPES.has(letter)) {
        return { reason: `invalid escape sequence "\\${letter}"` };
      }
      value += char + letter;
      i++;
      continue;
    }
    if (char === '"') {
      if (text.slice(i + 1).trim() !== '') {
        return { reason: 'unexpected text after closing quote' };
      }
      return { value };
    }
    value += escapeForControlChar(char) ?? char;
  }
  return { reason: 'unterminated quoted string' };
}

/**
 * Decodes catalog escape sequences into the characters they stand for.
 * Throws on an unknown sequence or a dangling backslash.
 */
export function unescapeCatalogString(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);
    if (char !== '\\') {
      out += char;
      continue;
    }
    if (i + 1 >= value.length) {
      throw new CatalogSyntaxError(`dangling backslash at end of "${value}"`);
    }
    const letter = value.charAt(i + 1);
    const decoded = UNESCAPES.get(letter);
    if (decoded === undefined) {
      throw new CatalogSyntaxError(`invalid escape sequence "\\${letter}" in "${value}"`);
    }
    out += decoded;
    i++;
  }
  return out;
}

/**
 * Encodes literal text into catalog escape form. With `keepNewlines`, real
 * newlines pass through untouched (the header metadata representation).
 */
export function escapeCatalogString(value: string, options: { keepNewlines?: boolean } = {}): string {
  let out = '';
  for (const char of value) {
    if (char === '\n' && options.keepNewlines) {
      out += char;
      continue;
    }
    out += ESCAPES.get(char) ?? char;
  }
  return out;
}

export function encodeJsonString(value: string): string {
  return JSON.stringify(unescapeCatalogString(value));
}

export function decodeJsonString(json: string): string {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'string') {
    throw new DocumentSchemaError([`expected a JSON string, got ${json}`]);
  }
  return escapeCatalogString(parsed);
}

/**
 * Splits a catalog-escaped value after every `\n` escape. The last segment
 * holds whatever follows the final newline escape and may be empty.
 */
export function splitAtNewlineEscapes(value: string): string[] {
  const segments: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);
    if (char === '\\' && i + 1 < value.length) {
      const pair = value.slice(i, i + 2);
      current += pair;
      i++;
      if (pair === '\\n') {
        segments.push(current);
        current = '';
      }
      continue;
    }
    current += char;
  }
  segments.push(current);
  return segments;
}

/** Header `msgstr` text to header metadata: only `\n` escapes become newlines. */
export function catalogToMeta(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);
    if (char === '\\' && i + 1 < value.length) {
      const next = value.charAt(i + 1);
      out += next === 'n' ? '\n' : char + next;
      i++;
      continue;
    }
    out += char;
  }
  return out;
}

/** Header metadata back to catalog form. */
export function metaToCatalog(meta: string): string {
  return meta.replace(/\n/g, '\\n');
}
