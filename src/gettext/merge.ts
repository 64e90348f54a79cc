import type { CatalogDocument, CatalogEntry } from '../types/index.js';
import { createDocument, entryKey, hasHeader } from './document.js';

/**
 * Concatenates documents into one. The header comes from the first input
 * that has one; of several entries with the same identity the first wins.
 */
export function mergeDocuments(documents: readonly CatalogDocument[]): CatalogDocument {
  const headerSource = documents.find(hasHeader);
  const seen = new Set<string>();
  const entries: CatalogEntry[] = [];

  for (const document of documents) {
    for (const entry of document.entries) {
      const key = entryKey(entry);
      if (seen.has(key)) continue;
      seen.add(key);
      entries.push(entry);
    }
  }

  return createDocument({
    header_comment: headerSource?.header_comment ?? '',
    header_meta: headerSource?.header_meta ?? '',
    entries,
  });
}

export interface UpdateResult {
  document: CatalogDocument;
  updated: number;
  unmatched: CatalogEntry[];
}

/**
 * Writes edited entries back by identity instead of position. Entries of
 * `whole` keep their place; batch entries that match nothing are returned
 * in `unmatched` and not added.
 */
export function updateEntries(whole: CatalogDocument, batch: CatalogDocument): UpdateResult {
  const edits = new Map<string, CatalogEntry>();
  for (const entry of batch.entries) {
    if (!edits.has(entryKey(entry))) {
      edits.set(entryKey(entry), entry);
    }
  }

  let updated = 0;
  const used = new Set<string>();
  const entries = whole.entries.map(entry => {
    const key = entryKey(entry);
    const edit = edits.get(key);
    if (edit === undefined || used.has(key)) {
      return entry;
    }
    used.add(key);
    updated++;
    return edit;
  });

  return {
    document: createDocument({ header_comment: whole.header_comment, header_meta: whole.header_meta, entries }),
    updated,
    unmatched: [...edits.entries()].filter(([key]) => !used.has(key)).map(([, entry]) => entry),
  };
}
