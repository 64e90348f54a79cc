import { describe, expect, it } from 'vitest';
import type { CatalogEntry, CatalogStats } from '../types/index.js';
import { catalogToDocument, createDocument } from './document.js';
import { checkPluralForms, computeStats, formatMsgfmtStatistics, formatStatLine } from './stats.js';

function entry(msgid: string, msgstr: string, extra: Partial<CatalogEntry> = {}): CatalogEntry {
  return { msgid, msgstr, comments: [], fuzzy: false, obsolete: false, ...extra };
}

const EMPTY: CatalogStats = { total: 0, translated: 0, untranslated: 0, same: 0, fuzzy: 0, obsolete: 0 };

describe('computeStats', () => {
  it('puts each entry in one bucket', () => {
    const document = createDocument({
      entries: [
        entry('a', 'A'),
        entry('b', 'B'),
        entry('c', ''),
        entry('d', 'd'),
        entry('e', 'E', { fuzzy: true }),
        entry('f', '', { fuzzy: true }),
        entry('g', 'G', { obsolete: true, fuzzy: true }),
        entry('h', '', { msgid_plural: 'hs', msgstr_plural: ['', ''] }),
      ],
    });
    expect(computeStats(document)).toEqual({ total: 8, translated: 2, untranslated: 2, same: 1, fuzzy: 2, obsolete: 1 });
  });
});

describe('statistics lines', () => {
  it('follows msgfmt wording and counts copies as translated', () => {
    expect(formatMsgfmtStatistics({ ...EMPTY, translated: 2, same: 1, fuzzy: 1, untranslated: 4 })).toBe(
      '3 translated messages, 1 fuzzy translation, 4 untranslated messages.\n'
    );
    expect(formatMsgfmtStatistics({ ...EMPTY, translated: 1 })).toBe('1 translated message.\n');
  });

  it('lists same and obsolete separately in the full line', () => {
    expect(formatStatLine({ ...EMPTY, translated: 2, same: 1, obsolete: 3 })).toBe(
      '2 translated messages, 1 same message, 3 obsolete entries.\n'
    );
    expect(formatStatLine({ ...EMPTY, untranslated: 1, obsolete: 1, fuzzy: 2 })).toBe(
      '2 fuzzy translations, 1 untranslated message, 1 obsolete entry.\n'
    );
  });

  it('reports zero translated messages for an empty catalog', () => {
    expect(formatMsgfmtStatistics(EMPTY)).toBe('0 translated messages.\n');
    expect(formatStatLine(EMPTY)).toBe('0 translated messages.\n');
  });
});

describe('checkPluralForms', () => {
  it('reports plural entries with the wrong number of forms', () => {
    const document = catalogToDocument(
      [
        'msgid ""',
        'msgstr ""',
        '"Plural-Forms: nplurals=3; plural=(n==1 ? 0 : n==2 ? 1 : 2);\\n"',
        '',
        'msgid "one file"',
        'msgid_plural "%d files"',
        'msgstr[0] "a"',
        'msgstr[1] "b"',
        '',
        'msgid "one dir"',
        'msgid_plural "%d dirs"',
        'msgstr[0] "a"',
        'msgstr[1] "b"',
        'msgstr[2] "c"',
        '',
      ].join('\n')
    );
    expect(checkPluralForms(document)).toEqual([{ index: 1, msgid: 'one file', expected: 3, actual: 2 }]);
  });

  it('has nothing to check without Plural-Forms', () => {
    const document = createDocument({ entries: [entry('x', '', { msgid_plural: 'xs', msgstr_plural: ['a'] })] });
    expect(checkPluralForms(document)).toEqual([]);
  });
});
