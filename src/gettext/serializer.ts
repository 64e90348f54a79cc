import type { CatalogDocument, CatalogEntry, SerializeOptions } from '../types/index.js';
import { metaToCatalog, splitAtNewlineEscapes } from './escape.js';
import { FUZZY_COMMENT, isFlagComment, mergeFuzzyFlag } from './flags.js';

const OBSOLETE_PREFIX = '#~ ';
const PREVIOUS_PREFIX = '#~| ';

/**
 * Writes a keyword line for a catalog-escaped value. Values with a newline
 * escape before their end are wrapped gettext style: `keyword ""` followed by
 * one quoted line per segment.
 */
function writeString(lines: string[], prefix: string, keyword: string, value: string): void {
  const segments = splitAtNewlineEscapes(value);
  if (segments.length === 1 || (segments.length === 2 && segments[1] === '')) {
    lines.push(`${prefix}${keyword} "${value}"`);
    return;
  }
  lines.push(`${prefix}${keyword} ""`);
  for (const segment of segments) {
    if (segment !== '') {
      lines.push(`${prefix}"${segment}"`);
    }
  }
}

function writeComments(lines: string[], entry: CatalogEntry): void {
  let fuzzyWritten = !entry.fuzzy;
  for (const comment of entry.comments) {
    if (!fuzzyWritten && isFlagComment(comment)) {
      lines.push(mergeFuzzyFlag(comment));
      fuzzyWritten = true;
      continue;
    }
    if (!fuzzyWritten && comment.trim().startsWith('#|')) {
      lines.push(FUZZY_COMMENT);
      fuzzyWritten = true;
    }
    lines.push(comment);
  }
  if (!fuzzyWritten) {
    lines.push(FUZZY_COMMENT);
  }
}

export function serializeEntry(entry: CatalogEntry): string[] {
  const lines: string[] = [];
  writeComments(lines, entry);

  const prefix = entry.obsolete ? OBSOLETE_PREFIX : '';
  if (entry.obsolete && entry.msgctxt_previous !== undefined) {
    writeString(lines, PREVIOUS_PREFIX, 'msgctxt', entry.msgctxt_previous);
  }
  if (entry.obsolete && entry.msgid_previous !== undefined) {
    writeString(lines, PREVIOUS_PREFIX, 'msgid', entry.msgid_previous);
  }
  if (entry.msgctxt !== undefined) {
    writeString(lines, prefix, 'msgctxt', entry.msgctxt);
  }
  writeString(lines, prefix, 'msgid', entry.msgid);

  if (entry.msgid_plural !== undefined) {
    writeString(lines, prefix, 'msgid_plural', entry.msgid_plural);
    const forms = entry.msgstr_plural && entry.msgstr_plural.length > 0 ? entry.msgstr_plural : [''];
    forms.forEach((form, index) => writeString(lines, prefix, `msgstr[${index}]`, form));
  } else {
    writeString(lines, prefix, 'msgstr', entry.msgstr);
  }
  return lines;
}

export function serializeHeader(document: Pick<CatalogDocument, 'header_comment' | 'header_meta'>): string[] {
  const lines: string[] = [];
  if (document.header_comment !== '') {
    lines.push(...document.header_comment.replace(/\n$/, '').split('\n'));
  }
  lines.push('msgid ""', 'msgstr ""');
  for (const segment of splitAtNewlineEscapes(metaToCatalog(document.header_meta))) {
    if (segment !== '') {
      lines.push(`"${segment}"`);
    }
  }
  return lines;
}

/**
 * Writes a document as catalog text: the header block, then every entry,
 * separated by blank lines. `header: false` leaves the header block out.
 */
export function serializeCatalog(document: CatalogDocument, options: SerializeOptions = {}): string {
  const blocks: string[][] = [];
  if (options.header ?? true) {
    blocks.push(serializeHeader(document));
  }
  for (const entry of document.entries) {
    blocks.push(serializeEntry(entry));
  }
  if (blocks.length === 0) {
    return '';
  }
  return `${blocks.map(block => block.join('\n')).join('\n\n')}\n`;
}
