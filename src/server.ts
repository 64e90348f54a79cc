import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ServerConfig } from './config.js';
import { BatchService } from './services/BatchService.js';
import { CatalogFileService } from './services/CatalogFileService.js';

const formatSchema = z.enum(['po', 'json']);

const filterSchema = z
  .object({
    translated: z.boolean().optional(),
    untranslated: z.boolean().optional(),
    fuzzy: z.boolean().optional(),
    noObsolete: z.boolean().optional(),
    onlySame: z.boolean().optional(),
    onlyObsolete: z.boolean().optional(),
  })
  .strict();

const argSchemas = {
  load_catalog: z.object({ filePath: z.string().min(1) }),
  find_catalogs: z.object({ directory: z.string().min(1), pattern: z.string().optional() }),
  get_loaded_catalogs: z.object({}),
  select_entries: z.object({
    filePath: z.string().min(1),
    range: z.string().optional(),
    format: formatSchema.optional(),
    noHeader: z.boolean().optional(),
    filter: filterSchema.optional(),
    unsetFuzzy: z.boolean().optional(),
    clearFuzzy: z.boolean().optional(),
  }),
  apply_batch: z.object({
    filePath: z.string().min(1),
    batch: z.string(),
    range: z.string().optional(),
    outputPath: z.string().optional(),
  }),
  merge_catalogs: z.object({
    inputPaths: z.array(z.string().min(1)).min(1),
    outputPath: z.string().min(1),
    format: formatSchema.optional(),
  }),
  convert_catalog: z.object({
    inputPath: z.string().min(1),
    outputPath: z.string().min(1),
    format: formatSchema.optional(),
    noHeader: z.boolean().optional(),
  }),
  get_catalog_stats: z.object({ filePath: z.string().min(1) }),
  compare_catalogs: z.object({
    srcPath: z.string().min(1),
    destPath: z.string().min(1),
    outputPath: z.string().optional(),
  }),
  plan_batch: z.object({ filePath: z.string().min(1), filter: filterSchema.optional() }),
};

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, tool: string): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(arguments)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid arguments for ${tool}: ${details}`);
  }
  return parsed.data;
}

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    ...(isError && { isError: true }),
  };
}

const filterProperty = {
  type: 'object',
  description:
    'Entry state filter. translated/untranslated/fuzzy combine with OR; onlySame and onlyObsolete exclude each other and the three state options',
  properties: {
    translated: { type: 'boolean' },
    untranslated: { type: 'boolean' },
    fuzzy: { type: 'boolean' },
    noObsolete: { type: 'boolean' },
    onlySame: { type: 'boolean' },
    onlyObsolete: { type: 'boolean' },
  },
};

export const TOOLS: Tool[] = [
  {
    name: 'load_catalog',
    description: 'Load a gettext catalog (.po, .pot) or catalog JSON file',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: 'Path to the catalog file' },
      },
      required: ['filePath'],
    },
  },
  {
    name: 'find_catalogs',
    description: 'Find catalog files under a directory',
    inputSchema: {
      type: 'object',
      properties: {
        directory: { type: 'string', description: 'Directory to search' },
        pattern: { type: 'string', description: 'Glob pattern relative to the directory (default **/*.{po,pot})' },
      },
      required: ['directory'],
    },
  },
  {
    name: 'get_loaded_catalogs',
    description: 'Get list of currently loaded catalogs',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'select_entries',
    description: 'Select a batch of entries by state and range, as catalog JSON or PO text',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: 'Path to the catalog file' },
        range: {
          type: 'string',
          description:
            'Entry range such as "1-50", "-20", "31-" or "1,3,5-7", counted over the entries the filter keeps (default: all)',
        },
        format: { type: 'string', enum: ['json', 'po'], description: 'Output format (default json)' },
        noHeader: { type: 'boolean', description: 'Leave the header out of the output' },
        filter: filterProperty,
        unsetFuzzy: { type: 'boolean', description: 'Drop the fuzzy flag, keep translations' },
        clearFuzzy: { type: 'boolean', description: 'Drop the fuzzy flag and empty the translations of fuzzy entries' },
      },
      required: ['filePath'],
    },
  },
  {
    name: 'apply_batch',
    description: 'Write an edited batch (catalog JSON or PO text) back into a catalog file',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: 'Catalog the batch was selected from' },
        batch: { type: 'string', description: 'The edited batch' },
        range: {
          type: 'string',
          description:
            'Catalog positions the batch replaces, as reported by select_entries; each batch entry must have the msgctxt, msgid and msgid_plural of the entry it replaces. When omitted entries are matched by identity',
        },
        outputPath: { type: 'string', description: 'Write the result here instead of overwriting filePath' },
      },
      required: ['filePath', 'batch'],
    },
  },
  {
    name: 'merge_catalogs',
    description: 'Merge catalogs into one file; the first occurrence of an entry wins',
    inputSchema: {
      type: 'object',
      properties: {
        inputPaths: { type: 'array', items: { type: 'string' }, description: 'Catalogs to merge, in priority order' },
        outputPath: { type: 'string', description: 'Where to write the merged catalog' },
        format: { type: 'string', enum: ['json', 'po'], description: 'Output format (default from the file extension)' },
      },
      required: ['inputPaths', 'outputPath'],
    },
  },
  {
    name: 'convert_catalog',
    description: 'Convert a catalog between PO text and catalog JSON',
    inputSchema: {
      type: 'object',
      properties: {
        inputPath: { type: 'string', description: 'Catalog to convert' },
        outputPath: { type: 'string', description: 'Where to write the result' },
        format: { type: 'string', enum: ['json', 'po'], description: 'Output format (default from the file extension)' },
        noHeader: { type: 'boolean', description: 'Leave the header out of the output' },
      },
      required: ['inputPath', 'outputPath'],
    },
  },
  {
    name: 'get_catalog_stats',
    description: 'Get translation statistics and plural form problems of a catalog',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: 'Path to the catalog file' },
      },
      required: ['filePath'],
    },
  },
  {
    name: 'compare_catalogs',
    description: 'Compare two versions of a catalog and collect the new and changed entries for review',
    inputSchema: {
      type: 'object',
      properties: {
        srcPath: { type: 'string', description: 'Old version' },
        destPath: { type: 'string', description: 'New version' },
        outputPath: { type: 'string', description: 'Optional file for the review catalog' },
      },
      required: ['srcPath', 'destPath'],
    },
  },
  {
    name: 'plan_batch',
    description:
      'Compute the next batch of pending entries: a range for select_entries with the same filter and the catalog positions for apply_batch',
    inputSchema: {
      type: 'object',
      properties: {
        filePath: { type: 'string', description: 'Path to the catalog file' },
        filter: filterProperty,
      },
      required: ['filePath'],
    },
  },
];

export class CatalogMCPServer {
  private server: Server;
  private fileService: CatalogFileService;
  private batchService: BatchService;

  constructor(config: ServerConfig) {
    this.server = new Server(
      {
        name: 'po-json-mcp',
        version: '1.0.0',
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.fileService = new CatalogFileService(config.jsonIndent);
    this.batchService = new BatchService(this.fileService, config.minBatchSize);
    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
    this.server.setRequestHandler(CallToolRequestSchema, async request =>
      this.handleToolCall(request.params.name, request.params.arguments)
    );
  }

  public async handleToolCall(name: string, args: unknown): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'load_catalog': {
          const { filePath } = parseArgs(argSchemas.load_catalog, args, name);
          const catalog = await this.batchService.loadCatalog(filePath);
          return textResult(
            `Successfully loaded ${catalog.format === 'po' ? 'PO' : 'JSON'} catalog: ${filePath}\n` +
              `Entries: ${catalog.document.entries.length}\n` +
              `Header:\n${catalog.document.header_meta}`
          );
        }

        case 'find_catalogs': {
          const { directory, pattern } = parseArgs(argSchemas.find_catalogs, args, name);
          const files = await this.fileService.findCatalogs(directory, pattern);
          if (files.length === 0) {
            return textResult(`No catalog files found in ${directory}.`);
          }
          return textResult(`Found ${files.length} catalog files in ${directory}:\n${files.join('\n')}`);
        }

        case 'get_loaded_catalogs': {
          parseArgs(argSchemas.get_loaded_catalogs, args, name);
          const files = this.batchService.getLoadedFiles();
          if (files.length === 0) {
            return textResult('No catalogs loaded. Use load_catalog to load a catalog first.');
          }
          return textResult(`Loaded catalogs (${files.length}):\n${files.join('\n')}`);
        }

        case 'select_entries': {
          const { filePath, ...options } = parseArgs(argSchemas.select_entries, args, name);
          const selection = await this.batchService.selectBatch(filePath, options);
          const writeBack = selection.selected > 0 ? ` (apply_batch range: ${selection.wholeRange})` : '';
          return textResult(
            `Selected ${selection.selected} of ${selection.matched} matching entries from ${filePath}${writeBack}:\n${selection.text}`
          );
        }

        case 'apply_batch': {
          const { filePath, batch, range, outputPath } = parseArgs(argSchemas.apply_batch, args, name);
          const result = await this.batchService.applyBatch(filePath, batch, range, outputPath);
          const skipped = result.unmatched > 0 ? `\n${result.unmatched} batch entries matched nothing and were skipped` : '';
          return textResult(`Updated ${result.updated} entries in ${result.path}${skipped}`);
        }

        case 'merge_catalogs': {
          const { inputPaths, outputPath, format } = parseArgs(argSchemas.merge_catalogs, args, name);
          const merged = await this.batchService.mergeFiles(inputPaths, outputPath, format);
          return textResult(
            `Merged ${inputPaths.length} catalogs into ${merged.path} (${merged.document.entries.length} entries)`
          );
        }

        case 'convert_catalog': {
          const { inputPath, outputPath, format, noHeader } = parseArgs(argSchemas.convert_catalog, args, name);
          const converted = await this.batchService.convertFile(inputPath, outputPath, { format, noHeader });
          return textResult(
            `Converted ${inputPath} to ${converted.format === 'po' ? 'PO' : 'JSON'}: ${converted.path}`
          );
        }

        case 'get_catalog_stats': {
          const { filePath } = parseArgs(argSchemas.get_catalog_stats, args, name);
          const report = await this.batchService.getStats(filePath);
          const plural =
            report.pluralIssues.length === 0
              ? ''
              : `\nPlural form problems:\n${report.pluralIssues
                  .map(issue => `  entry ${issue.index} "${issue.msgid}": ${issue.actual} forms, expected ${issue.expected}`)
                  .join('\n')}`;
          return textResult(
            `Translation statistics for ${filePath}:\n${report.summary}${JSON.stringify(report.stats, null, 2)}${plural}`
          );
        }

        case 'compare_catalogs': {
          const { srcPath, destPath, outputPath } = parseArgs(argSchemas.compare_catalogs, args, name);
          const { stat, review } = await this.batchService.compareFiles(srcPath, destPath, outputPath);
          const summary = `${stat.added} added, ${stat.changed} changed, ${stat.deleted} deleted`;
          if (outputPath !== undefined) {
            return textResult(`Compared ${srcPath} with ${destPath}: ${summary}\nReview catalog written to ${outputPath}`);
          }
          return textResult(
            `Compared ${srcPath} with ${destPath}: ${summary}\n${this.fileService.render(review, 'json')}`
          );
        }

        case 'plan_batch': {
          const { filePath, filter } = parseArgs(argSchemas.plan_batch, args, name);
          const plan = await this.batchService.planNextBatch(filePath, filter);
          const writeBack = plan.total > 0 ? `\nWrite-back range: ${plan.wholeRange}` : '';
          return textResult(
            `Pending entries: ${plan.total}\nBatch size: ${plan.batchSize}\nNext range: ${plan.range}${writeBack}`
          );
        }

        default:
          return textResult(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      return textResult(`Error executing tool ${name}: ${error instanceof Error ? error.message : 'Unknown error'}`, true);
    }
  }

  public async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('po-json-mcp server running on stdio');
  }
}
