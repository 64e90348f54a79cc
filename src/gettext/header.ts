import PO from 'pofile';
import { HeaderError } from './errors.js';
import { catalogToMeta, readQuotedString } from './escape.js';

export interface SplitHeader {
  headerComment: string;
  headerMeta: string;
}

const HEADER_MSGID = /^msgid\s*""$/;
const HEADER_MSGSTR = /^msgstr\s*(".*)$/;

function quotedValue(text: string, line: string): string {
  const result = readQuotedString(text);
  if ('reason' in result) {
    throw new HeaderError(result.reason, line);
  }
  return result.value;
}

/**
 * Splits the leading line block of a catalog into the free-form comment part
 * and the header entry's metadata. Lines before `msgid ""` are the comment;
 * the `msgstr` body after it is the metadata, with `\n` escapes turned into
 * real newlines.
 */
export function splitHeader(headerLines: readonly string[]): SplitHeader {
  const msgidIndex = headerLines.findIndex(line => HEADER_MSGID.test(line.trim()));
  const commentLines = msgidIndex === -1 ? headerLines : headerLines.slice(0, msgidIndex);
  const headerComment = commentLines.length > 0 ? `${commentLines.join('\n')}\n` : '';
  if (msgidIndex === -1) {
    return { headerComment, headerMeta: '' };
  }

  const body = headerLines.slice(msgidIndex + 1);
  const first = body[0];
  const msgstr = first === undefined ? null : HEADER_MSGSTR.exec(first.trim());
  if (!msgstr || msgstr[1] === undefined) {
    throw new HeaderError('expected msgstr after msgid ""', first);
  }
  let value = quotedValue(msgstr[1], first ?? '');
  for (const line of body.slice(1)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('"')) {
      throw new HeaderError('expected a quoted continuation line', line);
    }
    value += quotedValue(trimmed, line);
  }
  return { headerComment, headerMeta: catalogToMeta(value) };
}

/** `Key: Value` pairs of the header metadata, in order. Values stay catalog-escaped. */
export function parseHeaderMeta(meta: string): Array<[string, string]> {
  const fields: Array<[string, string]> = [];
  for (const line of meta.split('\n')) {
    if (line.trim() === '') continue;
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new HeaderError('metadata line is not "Key: Value"', line);
    }
    fields.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
  }
  return fields;
}

export function getHeaderValue(meta: string, key: string): string | undefined {
  const wanted = key.toLowerCase();
  return parseHeaderMeta(meta).find(([name]) => name.toLowerCase() === wanted)?.[1];
}

/** Number of plural forms declared by `Plural-Forms`, if any. */
export function getPluralFormCount(meta: string): number | undefined {
  const pluralForms = getHeaderValue(meta, 'Plural-Forms');
  if (pluralForms === undefined) {
    return undefined;
  }
  // pofile types the result as a PO instance; it is a plain { nplurals, plural } record.
  const parsed: unknown = PO.parsePluralForms(pluralForms);
  if (typeof parsed !== 'object' || parsed === null || !('nplurals' in parsed)) {
    return undefined;
  }
  const count = Number(parsed.nplurals);
  return Number.isInteger(count) && count > 0 ? count : undefined;
}
