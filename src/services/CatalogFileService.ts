import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import {
  CatalogError,
  catalogToDocument,
  decodeDocument,
  detectFormat,
  documentToCatalog,
  encodeDocument,
} from '../gettext/index.js';
import type { CatalogDocument, CatalogFormat, LoadedCatalog } from '../types/index.js';

export interface SaveOptions {
  format?: CatalogFormat;
  header?: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Format implied by a file name, if any. */
export function formatFromPath(filePath: string): CatalogFormat | undefined {
  switch (path.extname(filePath).toLowerCase()) {
    case '.json':
      return 'json';
    case '.po':
    case '.pot':
      return 'po';
    default:
      return undefined;
  }
}

export class CatalogFileService {
  private loadedFiles: Map<string, LoadedCatalog> = new Map();

  constructor(private readonly jsonIndent: number = 2) {}

  /** Parses catalog text or JSON read from `source`, warning when JSON needed repair. */
  public parse(content: string, format: CatalogFormat, source: string): CatalogDocument {
    if (format === 'po') {
      return catalogToDocument(content);
    }
    return decodeDocument(content, {
      onRepair: stage => console.warn(`Repaired malformed JSON from ${source} (stage: ${stage})`),
    });
  }

  public render(document: CatalogDocument, format: CatalogFormat, header = true): string {
    if (format === 'po') {
      return documentToCatalog(document, { header });
    }
    const payload = header ? document : { ...document, header_comment: '', header_meta: '' };
    return encodeDocument(payload, { indent: this.jsonIndent });
  }

  public async loadCatalog(filePath: string): Promise<LoadedCatalog> {
    const absolutePath = path.resolve(filePath);
    let content: string;
    let lastModified: Date;
    try {
      content = await fs.readFile(absolutePath, 'utf-8');
      lastModified = (await fs.stat(absolutePath)).mtime;
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`File not found: ${filePath}. Use find_catalogs to locate catalog files.`);
      }
      throw new Error(`Failed to read catalog ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const format = formatFromPath(absolutePath) ?? detectFormat(content);
    try {
      const catalog: LoadedCatalog = {
        path: absolutePath,
        format,
        document: this.parse(content, format, filePath),
        lastModified,
      };
      this.loadedFiles.set(absolutePath, catalog);
      return catalog;
    } catch (error) {
      if (error instanceof CatalogError) {
        throw new Error(`Invalid ${format === 'po' ? 'PO' : 'JSON'} catalog ${filePath}: ${error.message}`);
      }
      throw error;
    }
  }

  /** The cached catalog, reloaded when the file changed on disk since it was read. */
  public async getCatalog(filePath: string): Promise<LoadedCatalog> {
    const cached = this.loadedFiles.get(path.resolve(filePath));
    if (cached) {
      const stats = await fs.stat(cached.path).catch((error: unknown) => {
        if (isMissingFile(error)) return undefined;
        throw error;
      });
      if (stats && stats.mtime.getTime() === cached.lastModified.getTime()) {
        return cached;
      }
    }
    return this.loadCatalog(filePath);
  }

  public async saveCatalog(filePath: string, document: CatalogDocument, options: SaveOptions = {}): Promise<LoadedCatalog> {
    const absolutePath = path.resolve(filePath);
    const format = options.format ?? formatFromPath(absolutePath) ?? 'po';
    try {
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });
      await fs.writeFile(absolutePath, this.render(document, format, options.header ?? true), 'utf-8');
      const stats = await fs.stat(absolutePath);
      const catalog: LoadedCatalog = { path: absolutePath, format, document, lastModified: stats.mtime };
      this.loadedFiles.set(absolutePath, catalog);
      return catalog;
    } catch (error) {
      throw new Error(`Failed to save catalog ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  public async findCatalogs(directory: string, pattern: string = '**/*.{po,pot}'): Promise<string[]> {
    try {
      const files = await glob(pattern, { cwd: path.resolve(directory), absolute: true, nodir: true });
      return files.sort();
    } catch (error) {
      throw new Error(`Failed to find catalogs in ${directory}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  public getLoadedFiles(): string[] {
    return Array.from(this.loadedFiles.keys());
  }

  public isFileLoaded(filePath: string): boolean {
    return this.loadedFiles.has(path.resolve(filePath));
  }
}
