import { describe, expect, it } from 'vitest';
import type { CatalogDocument, CatalogEntry } from '../types/index.js';
import { createDocument } from './document.js';
import { RangeSpecError } from './errors.js';
import {
  applyEntries,
  batchSizeFor,
  formatRange,
  nextBatchRange,
  parseRange,
  pickEntries,
  resolveSubsetRange,
  selectEntries,
} from './range.js';

function entry(msgid: string, msgstr = ''): CatalogEntry {
  return { msgid, msgstr, comments: [], fuzzy: false, obsolete: false };
}

function documentOf(...msgids: string[]): CatalogDocument {
  return createDocument({ header_meta: 'Language: fr\n', entries: msgids.map(msgid => entry(msgid)) });
}

describe('parseRange', () => {
  it('resolves the basic token forms', () => {
    expect(parseRange('1,3', 5)).toEqual([1, 3]);
    expect(parseRange('-2', 5)).toEqual([1, 2]);
    expect(parseRange('3-', 5)).toEqual([3, 4, 5]);
    expect(parseRange('2-4', 5)).toEqual([2, 3, 4]);
  });

  it('selects everything for an empty expression', () => {
    expect(parseRange('', 3)).toEqual([1, 2, 3]);
    expect(parseRange('  ', 0)).toEqual([]);
    expect(parseRange('1-', 0)).toEqual([]);
  });

  it('sorts, deduplicates and tolerates whitespace', () => {
    expect(parseRange(' 2 - 3 , 5 ', 5)).toEqual([2, 3, 5]);
    expect(parseRange('4,1-2,,2', 5)).toEqual([1, 2, 4]);
  });

  it('rejects bad tokens', () => {
    expect(() => parseRange('6', 5)).toThrow('Invalid range "6": entry 6 is out of range (valid entries: 1-5)');
    expect(() => parseRange('0', 5)).toThrow(RangeSpecError);
    expect(() => parseRange('3-1', 5)).toThrow('Invalid range "3-1": start 3 is after end 1 (valid entries: 1-5)');
    expect(() => parseRange('abc', 5)).toThrow('Invalid range "abc": expected N, A-B, -B or A- (valid entries: 1-5)');
    expect(() => parseRange('-', 5)).toThrow(RangeSpecError);
    expect(() => parseRange('1', 0)).toThrow('(valid entries: none)');
  });
});

describe('formatRange', () => {
  it('joins runs and single entries', () => {
    expect(formatRange([5, 1, 2, 3, 3, 7, 8])).toBe('1-3,5,7-8');
    expect(formatRange([4])).toBe('4');
    expect(formatRange([])).toBe('');
  });
});

describe('resolveSubsetRange', () => {
  it('maps a range over a subset to whole-list positions', () => {
    expect(resolveSubsetRange('-2', [2, 4, 5])).toEqual([2, 4]);
    expect(resolveSubsetRange('2-', [2, 4, 5])).toEqual([4, 5]);
    expect(resolveSubsetRange('1-', [])).toEqual([]);
    expect(() => resolveSubsetRange('4', [2, 4, 5])).toThrow('(valid entries: 1-3)');
  });
});

describe('selectEntries', () => {
  it('keeps the header and the selected entries in order', () => {
    const batch = selectEntries(documentOf('a', 'b', 'c', 'd', 'e'), '4,2');
    expect(batch.header_meta).toBe('Language: fr\n');
    expect(batch.entries.map(e => e.msgid)).toEqual(['b', 'd']);
  });

  it('picks entries by position', () => {
    expect(pickEntries(documentOf('a', 'b', 'c'), [3, 1]).entries.map(e => e.msgid)).toEqual(['c', 'a']);
  });
});

describe('applyEntries', () => {
  it('writes a batch back into the selected positions', () => {
    const whole = documentOf('a', 'b', 'c', 'd', 'e');
    const batch = createDocument({ entries: [entry('b', 'B'), entry('d', 'D')] });
    const merged = applyEntries(whole, batch, '2,4');
    expect(merged.entries.map(e => e.msgstr)).toEqual(['', 'B', '', 'D', '']);
    expect(merged.header_meta).toBe('Language: fr\n');
    expect(whole.entries[1]?.msgstr).toBe('');
  });

  it('rejects a batch whose entries are not the ones at those positions', () => {
    const whole = documentOf('a', 'b', 'c', 'd');
    const batch = createDocument({ entries: [entry('b', 'B')] });
    expect(() => applyEntries(whole, batch, '-1')).toThrow(
      'Invalid range "-1": entry 1 is "a" but the batch holds "b" there (valid entries: 1-4)'
    );

    const withContext = createDocument({ entries: [{ ...entry('b', 'B'), msgctxt: 'menu' }] });
    expect(() => applyEntries(whole, withContext, '2')).toThrow(
      'entry 2 is "b" but the batch holds "b" (context "menu") there'
    );
  });

  it('rejects a batch of the wrong size', () => {
    const whole = documentOf('a', 'b', 'c');
    expect(() => applyEntries(whole, createDocument({ entries: [entry('a')] }), '1-2')).toThrow(
      'Invalid range "1-2": the range selects 2 entries but the batch holds 1 (valid entries: 1-3)'
    );
  });
});

describe('batch sizing', () => {
  it('scales the batch with the workload', () => {
    expect(batchSizeFor(0, 50)).toBe(0);
    expect(batchSizeFor(100, 50)).toBe(100);
    expect(batchSizeFor(101, 50)).toBe(50);
    expect(batchSizeFor(201, 50)).toBe(75);
    expect(batchSizeFor(401, 50)).toBe(100);
    expect(batchSizeFor(150, 25)).toBe(37);
  });

  it('plans the next range from the front', () => {
    expect(nextBatchRange(100, 50)).toEqual({ total: 100, batchSize: 100, range: '1-' });
    expect(nextBatchRange(300, 50)).toEqual({ total: 300, batchSize: 75, range: '-75' });
  });
});
