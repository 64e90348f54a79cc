import {
  applyEntries,
  checkPluralForms,
  clearFuzzy,
  compareDocuments,
  computeStats,
  FilterOptionError,
  formatMsgfmtStatistics,
  formatRange,
  formatStatLine,
  loadDocument,
  matchingPositions,
  mergeDocuments,
  nextBatchRange,
  pickEntries,
  resolveSubsetRange,
  unsetFuzzy,
  updateEntries,
} from '../gettext/index.js';
import type {
  ApplyResult,
  BatchSelection,
  CatalogDocument,
  CatalogFormat,
  CompareResult,
  EntryStateFilter,
  LoadedCatalog,
  PlannedBatch,
  SelectOptions,
  StatsReport,
} from '../types/index.js';
import { CatalogFileService, formatFromPath } from './CatalogFileService.js';

// Entries still waiting for a translator.
const PENDING: EntryStateFilter = { untranslated: true, fuzzy: true, noObsolete: true };

export class BatchService {
  constructor(
    private readonly fileService: CatalogFileService,
    private readonly minBatchSize: number
  ) {}

  public async loadCatalog(filePath: string): Promise<LoadedCatalog> {
    return await this.fileService.loadCatalog(filePath);
  }

  /**
   * Filters a catalog by entry state, then takes the range from what is
   * left. The range counts entries after filtering; `wholeRange` names the
   * same entries by their catalog position for {@link applyBatch}.
   */
  public async selectBatch(filePath: string, options: SelectOptions = {}): Promise<BatchSelection> {
    if (options.unsetFuzzy && options.clearFuzzy) {
      throw new FilterOptionError('unsetFuzzy and clearFuzzy cannot be used together');
    }
    const { document } = await this.fileService.getCatalog(filePath);
    const positions = matchingPositions(document.entries, options.filter ?? {});
    const picked = resolveSubsetRange(options.range ?? '', positions);
    let batch = pickEntries(document, picked);
    if (options.unsetFuzzy) batch = unsetFuzzy(batch);
    if (options.clearFuzzy) batch = clearFuzzy(batch);

    const format = options.format ?? 'json';
    return {
      text: this.fileService.render(batch, format, !options.noHeader),
      format,
      selected: batch.entries.length,
      matched: positions.length,
      wholeRange: formatRange(picked),
    };
  }

  /**
   * Writes an edited batch back into a catalog. With a range (catalog
   * positions, as in `wholeRange`) the batch replaces those entries; without
   * one entries are matched by identity.
   */
  public async applyBatch(filePath: string, batchText: string, range?: string, outputPath?: string): Promise<ApplyResult> {
    const { document } = await this.fileService.getCatalog(filePath);
    const batch = loadDocument(batchText, {
      onRepair: stage => console.warn(`Repaired malformed batch JSON for ${filePath} (stage: ${stage})`),
    });

    let result: ApplyResult;
    if (range !== undefined) {
      const updated = applyEntries(document, batch, range);
      const saved = await this.fileService.saveCatalog(outputPath ?? filePath, updated);
      result = { path: saved.path, updated: batch.entries.length, unmatched: 0 };
    } else {
      const update = updateEntries(document, batch);
      const saved = await this.fileService.saveCatalog(outputPath ?? filePath, update.document);
      result = { path: saved.path, updated: update.updated, unmatched: update.unmatched.length };
    }
    if (result.unmatched > 0) {
      console.warn(`${result.unmatched} batch entries had no counterpart in ${filePath} and were skipped`);
    }
    return result;
  }

  public async mergeFiles(inputPaths: string[], outputPath: string, format?: CatalogFormat): Promise<LoadedCatalog> {
    if (inputPaths.length === 0) {
      throw new Error('No input files given. Pass at least one catalog to merge.');
    }
    const documents: CatalogDocument[] = [];
    for (const inputPath of inputPaths) {
      documents.push((await this.fileService.getCatalog(inputPath)).document);
    }
    return await this.fileService.saveCatalog(outputPath, mergeDocuments(documents), { format });
  }

  public async convertFile(
    inputPath: string,
    outputPath: string,
    options: { format?: CatalogFormat; noHeader?: boolean } = {}
  ): Promise<LoadedCatalog> {
    const { document, format: sourceFormat } = await this.fileService.getCatalog(inputPath);
    const format = options.format ?? formatFromPath(outputPath) ?? (sourceFormat === 'po' ? 'json' : 'po');
    return await this.fileService.saveCatalog(outputPath, document, { format, header: !options.noHeader });
  }

  public async getStats(filePath: string): Promise<StatsReport> {
    const catalog = await this.fileService.getCatalog(filePath);
    const stats = computeStats(catalog.document);
    return {
      path: catalog.path,
      stats,
      summary: formatStatLine(stats),
      msgfmt: formatMsgfmtStatistics(stats),
      pluralIssues: checkPluralForms(catalog.document),
    };
  }

  public async compareFiles(srcPath: string, destPath: string, outputPath?: string): Promise<CompareResult> {
    const src = await this.fileService.getCatalog(srcPath);
    const dest = await this.fileService.getCatalog(destPath);
    const result = compareDocuments(src.document, dest.document);
    if (outputPath !== undefined) {
      await this.fileService.saveCatalog(outputPath, result.review);
    }
    return result;
  }

  /** Range of the next batch of pending entries, counted after the filter and over the whole catalog. */
  public async planNextBatch(filePath: string, filter: EntryStateFilter = PENDING): Promise<PlannedBatch> {
    const { document } = await this.fileService.getCatalog(filePath);
    const positions = matchingPositions(document.entries, filter);
    const plan = nextBatchRange(positions.length, this.minBatchSize);
    return { ...plan, wholeRange: formatRange(resolveSubsetRange(plan.range, positions)) };
  }

  public getLoadedFiles(): string[] {
    return this.fileService.getLoadedFiles();
  }
}
