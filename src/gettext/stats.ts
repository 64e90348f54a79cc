import type { CatalogDocument, CatalogStats, PluralFormIssue } from '../types/index.js';
import { isSame, isTranslated } from './filter.js';
import { getPluralFormCount } from './header.js';

/**
 * Counts entries by state. Each active entry lands in exactly one bucket,
 * checked in the order fuzzy, untranslated, same, translated.
 */
export function computeStats(document: CatalogDocument): CatalogStats {
  const stats: CatalogStats = { total: document.entries.length, translated: 0, untranslated: 0, same: 0, fuzzy: 0, obsolete: 0 };
  for (const entry of document.entries) {
    if (entry.obsolete) {
      stats.obsolete++;
    } else if (entry.fuzzy) {
      stats.fuzzy++;
    } else if (!isTranslated(entry)) {
      stats.untranslated++;
    } else if (isSame(entry)) {
      stats.same++;
    } else {
      stats.translated++;
    }
  }
  return stats;
}

function count(value: number, singular: string, plural: string): string | undefined {
  if (value === 0) return undefined;
  return value === 1 ? `1 ${singular}` : `${value} ${plural}`;
}

function sentence(parts: Array<string | undefined>): string {
  const present = parts.filter((part): part is string => part !== undefined);
  return present.length === 0 ? '0 translated messages.\n' : `${present.join(', ')}.\n`;
}

/** The line `msgfmt --statistics` prints. Copies of the source count as translated. */
export function formatMsgfmtStatistics(stats: CatalogStats): string {
  return sentence([
    count(stats.translated + stats.same, 'translated message', 'translated messages'),
    count(stats.fuzzy, 'fuzzy translation', 'fuzzy translations'),
    count(stats.untranslated, 'untranslated message', 'untranslated messages'),
  ]);
}

/** Like {@link formatMsgfmtStatistics}, with separate same and obsolete counts. */
export function formatStatLine(stats: CatalogStats): string {
  return sentence([
    count(stats.translated, 'translated message', 'translated messages'),
    count(stats.fuzzy, 'fuzzy translation', 'fuzzy translations'),
    count(stats.untranslated, 'untranslated message', 'untranslated messages'),
    count(stats.same, 'same message', 'same messages'),
    count(stats.obsolete, 'obsolete entry', 'obsolete entries'),
  ]);
}

/**
 * Active plural entries whose number of translations differs from the
 * `nplurals` the header declares. Empty when the header declares none.
 */
export function checkPluralForms(document: CatalogDocument): PluralFormIssue[] {
  const expected = getPluralFormCount(document.header_meta);
  if (expected === undefined) {
    return [];
  }
  const issues: PluralFormIssue[] = [];
  document.entries.forEach((entry, i) => {
    if (entry.obsolete || entry.msgid_plural === undefined) return;
    const actual = entry.msgstr_plural?.length ?? 0;
    if (actual !== expected) {
      issues.push({ index: i + 1, msgid: entry.msgid, expected, actual });
    }
  });
  return issues;
}
