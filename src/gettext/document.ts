import type { CatalogDocument, CatalogEntry, CatalogFormat, ParsedCatalog, SerializeOptions } from '../types/index.js';
import { splitHeader } from './header.js';
import { decodeDocument, type DecodeOptions } from './json.js';
import { parseCatalog } from './parser.js';
import { serializeCatalog, serializeHeader } from './serializer.js';

export function createDocument(init: Partial<CatalogDocument> = {}): CatalogDocument {
  return {
    header_comment: init.header_comment ?? '',
    header_meta: init.header_meta ?? '',
    entries: (init.entries ?? []).map(cloneEntry),
  };
}

export function cloneEntry(entry: CatalogEntry): CatalogEntry {
  const copy: CatalogEntry = {
    msgid: entry.msgid,
    msgstr: entry.msgstr,
    comments: [...entry.comments],
    fuzzy: entry.fuzzy,
    obsolete: entry.obsolete,
  };
  if (entry.msgctxt !== undefined) copy.msgctxt = entry.msgctxt;
  if (entry.msgid_plural !== undefined) copy.msgid_plural = entry.msgid_plural;
  if (entry.msgstr_plural !== undefined) copy.msgstr_plural = [...entry.msgstr_plural];
  if (entry.msgctxt_previous !== undefined) copy.msgctxt_previous = entry.msgctxt_previous;
  if (entry.msgid_previous !== undefined) copy.msgid_previous = entry.msgid_previous;
  return copy;
}

export function withEntries(document: CatalogDocument, entries: readonly CatalogEntry[]): CatalogDocument {
  return {
    header_comment: document.header_comment,
    header_meta: document.header_meta,
    entries: entries.map(cloneEntry),
  };
}

/** Identity of an entry for deduplication and comparison: context, msgid and plural msgid. */
export function entryKey(entry: CatalogEntry): string {
  return `${entry.msgctxt ?? ''}\u0004${entry.msgid}\u0000${entry.msgid_plural ?? ''}`;
}

export function hasHeader(document: CatalogDocument): boolean {
  return document.header_comment !== '' || document.header_meta !== '';
}

export function buildDocument(parsed: ParsedCatalog): CatalogDocument {
  const { headerComment, headerMeta } = splitHeader(parsed.headerLines);
  return {
    header_comment: headerComment,
    header_meta: headerMeta,
    entries: parsed.entries.map(cloneEntry),
  };
}

/** Inverse of {@link buildDocument}: the header block as catalog lines plus the entries. */
export function decomposeDocument(document: CatalogDocument): ParsedCatalog {
  return {
    headerLines: serializeHeader(document),
    entries: document.entries.map(cloneEntry),
  };
}

export function catalogToDocument(text: string): CatalogDocument {
  return buildDocument(parseCatalog(text));
}

export function documentToCatalog(document: CatalogDocument, options: SerializeOptions = {}): string {
  return serializeCatalog(document, options);
}

const CATALOG_KEYWORD = /^(#~\s*)?msgid\s/m;

/**
 * JSON when the text opens with an object or a markdown fence. Otherwise
 * catalog text when a line starts with `msgid`, and JSON again when there is
 * an object somewhere in it (a reply that opens with prose).
 */
export function detectFormat(text: string): CatalogFormat {
  const trimmed = text.replace(/^\uFEFF/, '').trimStart();
  if (/^[{`]/.test(trimmed)) {
    return 'json';
  }
  return !CATALOG_KEYWORD.test(trimmed) && trimmed.includes('{') ? 'json' : 'po';
}

/** Reads either catalog text or catalog JSON, telling them apart by content. */
export function loadDocument(text: string, options: DecodeOptions = {}): CatalogDocument {
  return detectFormat(text) === 'json' ? decodeDocument(text, options) : catalogToDocument(text);
}
