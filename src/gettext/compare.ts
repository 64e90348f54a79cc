import type { CatalogDocument, CatalogEntry, CompareResult, DiffStat } from '../types/index.js';
import { entryKey, withEntries } from './document.js';

function sameForms(a: readonly string[] | undefined, b: readonly string[] | undefined): boolean {
  const left = a ?? [];
  const right = b ?? [];
  return left.length === right.length && left.every((value, i) => value === right[i]);
}

/** Same translation state: msgstr, plural forms and fuzzy flag. Comments are ignored. */
export function entriesEqual(a: CatalogEntry, b: CatalogEntry): boolean {
  return (
    entryKey(a) === entryKey(b) &&
    a.fuzzy === b.fuzzy &&
    a.msgstr === b.msgstr &&
    sameForms(a.msgstr_plural, b.msgstr_plural)
  );
}

/**
 * Compares two versions of a catalog by entry identity, skipping obsolete
 * entries. The review document carries the header of `dest` and every entry
 * that is new or changed there, in `dest` order.
 */
export function compareDocuments(src: CatalogDocument, dest: CatalogDocument): CompareResult {
  const before = new Map<string, CatalogEntry>();
  for (const entry of src.entries) {
    if (!entry.obsolete && !before.has(entryKey(entry))) {
      before.set(entryKey(entry), entry);
    }
  }

  const stat: DiffStat = { added: 0, changed: 0, deleted: 0 };
  const review: CatalogEntry[] = [];
  const matched = new Set<string>();
  for (const entry of dest.entries) {
    const key = entryKey(entry);
    if (entry.obsolete || matched.has(key)) continue;
    matched.add(key);

    const previous = before.get(key);
    if (previous === undefined) {
      stat.added++;
      review.push(entry);
    } else if (!entriesEqual(previous, entry)) {
      stat.changed++;
      review.push(entry);
    }
  }
  stat.deleted = [...before.keys()].filter(key => !matched.has(key)).length;

  return { stat, review: withEntries(dest, review) };
}
