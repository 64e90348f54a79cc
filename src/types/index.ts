export interface CatalogEntry {
  msgctxt?: string;
  msgid: string;
  msgstr: string; // Empty for plural entries, see msgstr_plural
  msgid_plural?: string;
  msgstr_plural?: string[];
  msgctxt_previous?: string; // From "#~| msgctxt" of an obsolete entry
  msgid_previous?: string; // From "#~| msgid" of an obsolete entry
  comments: string[];
  fuzzy: boolean;
  obsolete: boolean;
}

export interface CatalogDocument {
  header_comment: string;
  header_meta: string;
  entries: CatalogEntry[];
}

export interface ParsedCatalog {
  headerLines: string[];
  entries: CatalogEntry[];
}

export type CatalogFormat = 'po' | 'json';

export interface LoadedCatalog {
  path: string;
  format: CatalogFormat;
  document: CatalogDocument;
  lastModified: Date;
}

export interface EntryStateFilter {
  translated?: boolean;
  untranslated?: boolean;
  fuzzy?: boolean;
  noObsolete?: boolean;
  onlySame?: boolean;
  onlyObsolete?: boolean;
}

export interface CatalogStats {
  total: number;
  translated: number;
  untranslated: number;
  same: number;
  fuzzy: number;
  obsolete: number;
}

export interface DiffStat {
  added: number;
  changed: number;
  deleted: number;
}

export interface CompareResult {
  stat: DiffStat;
  review: CatalogDocument;
}

export interface PluralFormIssue {
  index: number; // 1-based entry number
  msgid: string;
  expected: number;
  actual: number;
}

export interface SerializeOptions {
  header?: boolean;
}

export interface EncodeOptions {
  indent?: number;
}

export interface SelectOptions {
  range?: string;
  format?: CatalogFormat;
  noHeader?: boolean;
  filter?: EntryStateFilter;
  unsetFuzzy?: boolean;
  clearFuzzy?: boolean;
}

export interface BatchPlan {
  total: number;
  batchSize: number;
  range: string;
}

/** A planned batch; `range` counts filtered entries, `wholeRange` the whole catalog. */
export interface PlannedBatch extends BatchPlan {
  wholeRange: string;
}

export interface BatchSelection {
  text: string;
  format: CatalogFormat;
  selected: number; // Entries in the batch
  matched: number; // Entries that passed the state filter
  wholeRange: string; // Catalog positions of the batch, for write-back
}

export interface ApplyResult {
  path: string;
  updated: number;
  unmatched: number; // Batch entries with no counterpart, by identity
}

export interface StatsReport {
  path: string;
  stats: CatalogStats;
  summary: string;
  msgfmt: string;
  pluralIssues: PluralFormIssue[];
}
