import type { CatalogDocument, CatalogEntry, EntryStateFilter } from '../types/index.js';
import { cloneEntry, withEntries } from './document.js';
import { FilterOptionError } from './errors.js';

function translations(entry: CatalogEntry): string[] {
  return entry.msgstr_plural && entry.msgstr_plural.length > 0 ? entry.msgstr_plural : [entry.msgstr];
}

/** At least one translation is filled in. */
export function isTranslated(entry: CatalogEntry): boolean {
  return translations(entry).some(value => value !== '');
}

export function isUntranslated(entry: CatalogEntry): boolean {
  return !isTranslated(entry);
}

/** The (first) translation is a copy of the source text. */
export function isSame(entry: CatalogEntry): boolean {
  return translations(entry)[0] === entry.msgid;
}

/**
 * Rejects option combinations that cannot be satisfied together:
 * `onlySame` and `onlyObsolete` exclude each other and the state options.
 */
export function validateFilter(filter: EntryStateFilter): void {
  const exclusive = (['onlySame', 'onlyObsolete'] as const).filter(key => filter[key]);
  if (exclusive.length === 0) {
    return;
  }
  const others = (['translated', 'untranslated', 'fuzzy', 'onlySame', 'onlyObsolete'] as const).filter(
    key => filter[key] && key !== exclusive[0]
  );
  if (others.length > 0) {
    throw new FilterOptionError(`Filter option ${exclusive[0]} cannot be combined with ${others.join(', ')}`);
  }
}

export function matchesFilter(entry: CatalogEntry, filter: EntryStateFilter): boolean {
  if (filter.onlySame) {
    return !entry.obsolete && isSame(entry);
  }
  if (filter.onlyObsolete) {
    return entry.obsolete;
  }
  if (entry.obsolete) {
    return !filter.noObsolete;
  }
  if (!filter.translated && !filter.untranslated && !filter.fuzzy) {
    return true;
  }
  return (
    (filter.translated === true && isTranslated(entry) && !entry.fuzzy) ||
    (filter.untranslated === true && isUntranslated(entry)) ||
    (filter.fuzzy === true && entry.fuzzy)
  );
}

/** Entries matching the filter, in order. State options combine with OR. */
export function filterEntries(entries: readonly CatalogEntry[], filter: EntryStateFilter): CatalogEntry[] {
  validateFilter(filter);
  return entries.filter(entry => matchesFilter(entry, filter));
}

/** 1-based positions of the entries matching the filter. */
export function matchingPositions(entries: readonly CatalogEntry[], filter: EntryStateFilter): number[] {
  validateFilter(filter);
  return entries.flatMap((entry, i) => (matchesFilter(entry, filter) ? [i + 1] : []));
}

export function filterDocument(document: CatalogDocument, filter: EntryStateFilter): CatalogDocument {
  return withEntries(document, filterEntries(document.entries, filter));
}

/** Drops the fuzzy flag from every entry, keeping translations. */
export function unsetFuzzy(document: CatalogDocument): CatalogDocument {
  return withEntries(
    document,
    document.entries.map(entry => ({ ...cloneEntry(entry), fuzzy: false }))
  );
}

/**
 * Drops the fuzzy flag and empties the translations of fuzzy entries, so
 * they come out untranslated. Source texts stay.
 */
export function clearFuzzy(document: CatalogDocument): CatalogDocument {
  return withEntries(
    document,
    document.entries.map(entry => {
      const copy = cloneEntry(entry);
      if (!entry.fuzzy) {
        return copy;
      }
      copy.fuzzy = false;
      copy.msgstr = '';
      if (copy.msgstr_plural) {
        copy.msgstr_plural = copy.msgstr_plural.map(() => '');
      }
      return copy;
    })
  );
}
