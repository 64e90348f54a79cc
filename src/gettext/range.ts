import type { BatchPlan, CatalogDocument, CatalogEntry } from '../types/index.js';
import { entryKey, withEntries } from './document.js';
import { RangeSpecError } from './errors.js';

const SINGLE = /^\d+$/;
const SPAN = /^(\d*)\s*-\s*(\d*)$/;

function checkBounds(token: string, value: number, total: number): number {
  if (value < 1 || value > total) {
    throw new RangeSpecError(token, total, `entry ${value} is out of range`);
  }
  return value;
}

/**
 * Resolves a range expression against a catalog of `total` entries.
 *
 * Tokens are comma separated: `N`, `A-B`, `-B` (from the first entry) and
 * `A-` (to the last). An empty expression selects everything. The result is
 * 1-based, ascending and free of duplicates.
 */
export function parseRange(expression: string, total: number): number[] {
  if (expression.trim() === '') {
    return Array.from({ length: total }, (_, i) => i + 1);
  }

  const selected = new Set<number>();
  for (const raw of expression.split(',')) {
    const token = raw.trim();
    if (token === '') continue;

    if (SINGLE.test(token)) {
      selected.add(checkBounds(token, Number(token), total));
      continue;
    }

    const span = SPAN.exec(token);
    if (!span || (span[1] === '' && span[2] === '')) {
      throw new RangeSpecError(token, total, 'expected N, A-B, -B or A-');
    }
    if (total === 0 && span[2] === '' && Number(span[1]) === 1) {
      // "1-" on an empty catalog
      continue;
    }
    const start = span[1] ? checkBounds(token, Number(span[1]), total) : 1;
    const end = span[2] ? checkBounds(token, Number(span[2]), total) : total;
    if (start > end) {
      throw new RangeSpecError(token, total, `start ${start} is after end ${end}`);
    }
    for (let i = start; i <= end; i++) {
      selected.add(i);
    }
  }
  return [...selected].sort((a, b) => a - b);
}

function entryAt<T>(items: readonly T[], index: number): T {
  const item = items[index - 1];
  if (item === undefined) {
    throw new RangeSpecError(String(index), items.length, `entry ${index} is out of range`);
  }
  return item;
}

function describeEntry(entry: CatalogEntry): string {
  return entry.msgctxt === undefined ? `"${entry.msgid}"` : `"${entry.msgid}" (context "${entry.msgctxt}")`;
}

/** Shortest expression naming `indices`: runs become `A-B`, the rest single numbers. */
export function formatRange(indices: readonly number[]): string {
  const runs: Array<[number, number]> = [];
  for (const index of [...new Set(indices)].sort((a, b) => a - b)) {
    const last = runs[runs.length - 1];
    if (last && index === last[1] + 1) {
      last[1] = index;
    } else {
      runs.push([index, index]);
    }
  }
  return runs.map(([start, end]) => (start === end ? String(start) : `${start}-${end}`)).join(',');
}

/**
 * Resolves a range counted over a subset of a list. `positions` holds the
 * 1-based index in the whole list of each subset member; the result is the
 * whole-list indices the range picks.
 */
export function resolveSubsetRange(expression: string, positions: readonly number[]): number[] {
  return parseRange(expression, positions.length).map(index => entryAt(positions, index));
}

/** A new document with the original header and the entries at `indices`. */
export function pickEntries(document: CatalogDocument, indices: readonly number[]): CatalogDocument {
  return withEntries(
    document,
    indices.map(index => entryAt(document.entries, index))
  );
}

/** A new document with the original header and the entries the range names. */
export function selectEntries(document: CatalogDocument, expression: string): CatalogDocument {
  return pickEntries(document, parseRange(expression, document.entries.length));
}

/**
 * Writes a batch back into the document it was selected from. The batch must
 * hold exactly one entry per selected index, with the same msgctxt, msgid and
 * msgid_plural as the entry it replaces. Header and unselected entries of
 * `whole` are kept.
 */
export function applyEntries(whole: CatalogDocument, batch: CatalogDocument, expression: string): CatalogDocument {
  const total = whole.entries.length;
  const indices = parseRange(expression, total);
  if (indices.length !== batch.entries.length) {
    throw new RangeSpecError(
      expression,
      total,
      `the range selects ${indices.length} entries but the batch holds ${batch.entries.length}`
    );
  }
  const entries = [...whole.entries];
  indices.forEach((index, position) => {
    const current = entryAt(whole.entries, index);
    const replacement = entryAt(batch.entries, position + 1);
    if (entryKey(current) !== entryKey(replacement)) {
      throw new RangeSpecError(
        expression,
        total,
        `entry ${index} is ${describeEntry(current)} but the batch holds ${describeEntry(replacement)} there`
      );
    }
    entries[index - 1] = replacement;
  });
  return withEntries(whole, entries);
}

/**
 * Batch size for `count` pending entries: small workloads go in one batch,
 * large ones in batches of up to twice the minimum.
 */
export function batchSizeFor(count: number, minBatchSize: number): number {
  if (count <= minBatchSize * 2) {
    return count;
  }
  if (count > minBatchSize * 8) {
    return minBatchSize * 2;
  }
  if (count > minBatchSize * 4) {
    return minBatchSize + Math.floor(minBatchSize / 2);
  }
  return minBatchSize;
}

/** The range of the next batch to take from the front of `count` pending entries. */
export function nextBatchRange(count: number, minBatchSize: number): BatchPlan {
  const batchSize = batchSizeFor(count, minBatchSize);
  return {
    total: count,
    batchSize,
    range: batchSize >= count ? '1-' : `-${batchSize}`,
  };
}
