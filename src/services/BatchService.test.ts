import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BatchService } from './BatchService.js';
import { CatalogFileService } from './CatalogFileService.js';

const CATALOG = [
  'msgid ""',
  'msgstr ""',
  '"Language: fr\\n"',
  '',
  'msgid "a"',
  'msgstr "A"',
  '',
  'msgid "b"',
  'msgstr ""',
  '',
  '#, fuzzy',
  'msgid "c"',
  'msgstr "C"',
  '',
].join('\n');

describe('BatchService', () => {
  let dir: string;
  let file: string;
  let files: CatalogFileService;
  let service: BatchService;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'batch-service-'));
    file = path.join(dir, 'fr.po');
    await fs.writeFile(file, CATALOG, 'utf-8');
    files = new CatalogFileService(0);
    service = new BatchService(files, 1);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('selectBatch', () => {
    it('filters, then takes the range from the matches', async () => {
      const selection = await service.selectBatch(file, {
        filter: { untranslated: true, fuzzy: true },
        range: '2',
        clearFuzzy: true,
      });
      expect(selection).toEqual({
        text: '{"header_comment":"","header_meta":"Language: fr\\n","entries":[{"msgid":"c","msgstr":"","comments":[],"fuzzy":false}]}\n',
        format: 'json',
        selected: 1,
        matched: 2,
        wholeRange: '3',
      });
    });

    it('renders catalog text without the header', async () => {
      const selection = await service.selectBatch(file, {
        filter: { untranslated: true },
        format: 'po',
        noHeader: true,
      });
      expect(selection.text).toBe('msgid "b"\nmsgstr ""\n');
    });

    it('rejects both fuzzy operations at once', async () => {
      await expect(service.selectBatch(file, { unsetFuzzy: true, clearFuzzy: true })).rejects.toThrow(
        'unsetFuzzy and clearFuzzy cannot be used together'
      );
    });
  });

  describe('applyBatch', () => {
    it('writes a batch back into a range', async () => {
      const result = await service.applyBatch(file, '{"entries":[{"msgid":"b","msgstr":"B"}]}', '2');

      expect(result).toEqual({ path: file, updated: 1, unmatched: 0 });
      expect(await fs.readFile(file, 'utf-8')).toBe(CATALOG.replace('msgid "b"\nmsgstr ""', 'msgid "b"\nmsgstr "B"'));
    });

    it('refuses a batch that does not fit the range', async () => {
      await expect(service.applyBatch(file, '{"entries":[{"msgid":"b","msgstr":"B"}]}', '1-2')).rejects.toThrow(
        'the range selects 2 entries but the batch holds 1'
      );
    });

    it('matches entries by identity without a range', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const batch = '```json\n{"entries":[{"msgid":"c","msgstr":"C2"},{"msgid":"zzz","msgstr":"Z"}]}\n```';
      const output = path.join(dir, 'out', 'fr.po');

      const result = await service.applyBatch(file, batch, undefined, output);

      expect(result).toEqual({ path: output, updated: 1, unmatched: 1 });
      expect(warn).toHaveBeenCalledWith(`Repaired malformed batch JSON for ${file} (stage: fence)`);
      expect(warn).toHaveBeenCalledWith(`1 batch entries had no counterpart in ${file} and were skipped`);
      const saved = await files.getCatalog(output);
      expect(saved.document.entries.map(e => [e.msgid, e.msgstr, e.fuzzy])).toEqual([
        ['a', 'A', false],
        ['b', '', false],
        ['c', 'C2', false],
      ]);
      expect(await fs.readFile(file, 'utf-8')).toBe(CATALOG);
    });
  });

  describe('whole-file operations', () => {
    let other: string;

    beforeEach(async () => {
      other = path.join(dir, 'other.po');
      await fs.writeFile(other, 'msgid "a"\nmsgstr "X"\n\nmsgid "d"\nmsgstr "D"\n', 'utf-8');
    });

    it('merges catalogs keeping the first occurrence', async () => {
      const merged = await service.mergeFiles([file, other], path.join(dir, 'merged.json'));
      expect(merged.format).toBe('json');
      expect(merged.document.header_meta).toBe('Language: fr\n');
      expect(merged.document.entries.map(e => [e.msgid, e.msgstr])).toEqual([
        ['a', 'A'],
        ['b', ''],
        ['c', 'C'],
        ['d', 'D'],
      ]);
    });

    it('refuses to merge nothing', async () => {
      await expect(service.mergeFiles([], path.join(dir, 'merged.po'))).rejects.toThrow(
        'No input files given. Pass at least one catalog to merge.'
      );
    });

    it('converts to the opposite format when the target does not say', async () => {
      const target = path.join(dir, 'fr.txt');
      const converted = await service.convertFile(file, target, { noHeader: true });
      expect(converted.format).toBe('json');
      expect(await fs.readFile(target, 'utf-8')).toBe(
        '{"header_comment":"","header_meta":"","entries":[' +
          '{"msgid":"a","msgstr":"A","comments":[],"fuzzy":false},' +
          '{"msgid":"b","msgstr":"","comments":[],"fuzzy":false},' +
          '{"msgid":"c","msgstr":"C","comments":[],"fuzzy":true}]}\n'
      );
    });

    it('compares two catalogs and saves the review', async () => {
      const review = path.join(dir, 'review.json');
      const result = await service.compareFiles(file, other, review);
      expect(result.stat).toEqual({ added: 1, changed: 1, deleted: 2 });
      expect((await files.getCatalog(review)).document.entries.map(e => e.msgid)).toEqual(['a', 'd']);
    });
  });

  it('reports statistics', async () => {
    const report = await service.getStats(file);
    expect(report.stats).toEqual({ total: 3, translated: 1, untranslated: 1, same: 0, fuzzy: 1, obsolete: 0 });
    expect(report.summary).toBe('1 translated message, 1 fuzzy translation, 1 untranslated message.\n');
    expect(report.msgfmt).toBe('1 translated message, 1 fuzzy translation, 1 untranslated message.\n');
    expect(report.pluralIssues).toEqual([]);
  });

  it('plans the next batch of pending entries', async () => {
    expect(await service.planNextBatch(file)).toEqual({ total: 2, batchSize: 2, range: '1-', wholeRange: '2-3' });
    expect(service.getLoadedFiles()).toEqual([file]);
  });

  describe('plan, select and apply', () => {
    const PENDING = { untranslated: true, fuzzy: true, noObsolete: true };
    const HEADER = 'msgid ""\nmsgstr ""\n"Language: de\\n"\n\n';
    let catalog: string;

    beforeEach(async () => {
      catalog = path.join(dir, 'de.po');
      await fs.writeFile(
        catalog,
        `${HEADER}msgid "a"\nmsgstr "A"\n\nmsgid "b"\nmsgstr ""\n\nmsgid "c"\nmsgstr ""\n\nmsgid "d"\nmsgstr ""\n`,
        'utf-8'
      );
    });

    it('writes the batch back where it came from', async () => {
      const plan = await service.planNextBatch(catalog);
      expect(plan).toEqual({ total: 3, batchSize: 1, range: '-1', wholeRange: '2' });

      const selection = await service.selectBatch(catalog, { filter: PENDING, range: plan.range });
      expect(selection.wholeRange).toBe('2');
      expect(selection.text).toBe(
        '{"header_comment":"","header_meta":"Language: de\\n","entries":[{"msgid":"b","msgstr":"","comments":[],"fuzzy":false}]}\n'
      );

      const edited = selection.text.replace('"msgstr":""', '"msgstr":"B"');
      await service.applyBatch(catalog, edited, selection.wholeRange);
      expect(await fs.readFile(catalog, 'utf-8')).toBe(
        `${HEADER}msgid "a"\nmsgstr "A"\n\nmsgid "b"\nmsgstr "B"\n\nmsgid "c"\nmsgstr ""\n\nmsgid "d"\nmsgstr ""\n`
      );
    });

    it('refuses the filtered range as a catalog range', async () => {
      const before = await fs.readFile(catalog, 'utf-8');
      const batch = '{"entries":[{"msgid":"b","msgstr":"B"}]}';
      await expect(service.applyBatch(catalog, batch, '-1')).rejects.toThrow(
        'Invalid range "-1": entry 1 is "a" but the batch holds "b" there (valid entries: 1-4)'
      );
      expect(await fs.readFile(catalog, 'utf-8')).toBe(before);
    });
  });
});
