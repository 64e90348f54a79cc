import { z } from 'zod';
import type { CatalogDocument, CatalogEntry, EncodeOptions } from '../types/index.js';
import { DocumentSchemaError, type RepairStage } from './errors.js';
import { escapeCatalogString, unescapeCatalogString } from './escape.js';
import { hasFuzzyFlag, stripFuzzyFlag } from './flags.js';
import { repairJson } from './jsonRepair.js';
import { isCommentLine } from './parser.js';

// Wire shape of one entry. Strings hold literal text; the model keeps them
// catalog-escaped, and the conversion happens only in this module.
interface JsonEntry {
  msgctxt?: string;
  msgid: string;
  msgstr: string;
  msgid_plural?: string;
  msgstr_plural?: string[];
  msgctxt_previous?: string;
  msgid_previous?: string;
  comments: string[];
  fuzzy: boolean;
  obsolete?: true;
}

interface JsonDocument {
  header_comment: string;
  header_meta: string;
  entries: JsonEntry[];
}

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

// Model output often keeps the newline that ends a comment line.
const commentLine = z
  .string()
  .transform(line => line.replace(/\r?\n$/, ''))
  .refine(isCommentLine, {
    message: 'comment lines must be single lines starting with "#", without entry or previous-value markers',
  });

const entrySchema = z
  .object({
    msgctxt: optionalText,
    msgid: z.string(),
    msgstr: z.string().default(''),
    msgid_plural: optionalText,
    msgstr_plural: z.array(z.string()).nullish(),
    msgctxt_previous: optionalText,
    msgid_previous: optionalText,
    comments: z.array(commentLine).nullish(),
    fuzzy: z.boolean().default(false),
    obsolete: z.boolean().default(false),
  })
  .refine(entry => entry.msgstr_plural == null || entry.msgid_plural !== undefined, {
    message: 'msgstr_plural requires msgid_plural',
    path: ['msgstr_plural'],
  })
  .refine(entry => entry.obsolete || (entry.msgid_previous === undefined && entry.msgctxt_previous === undefined), {
    message: 'previous values are only kept on obsolete entries',
    path: ['msgid_previous'],
  })
  .refine(entry => entry.obsolete || entry.msgctxt !== undefined || entry.msgid !== '', {
    message: 'empty msgid is reserved for the header entry',
    path: ['msgid'],
  });

const documentSchema = z
  .object({
    header_comment: z
      .string()
      .default('')
      .refine(text => text.replace(/\n$/, '').split('\n').every(line => line.trim() === '' || isCommentLine(line)), {
        message: 'header_comment may only hold comment lines and blank lines',
      }),
    header_meta: z.string().default(''),
    entries: z.array(entrySchema),
  })
  .strict();

/** An object with an `entries` array; anything else found in prose is not a catalog. */
function isDocumentShaped(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'entries' in value && Array.isArray(value.entries);
}

type DecodedEntry = z.infer<typeof entrySchema>;

export interface DecodeOptions {
  /** Called when the payload only parsed after a repair stage. */
  onRepair?: (stage: RepairStage) => void;
}

function toJsonEntry(entry: CatalogEntry): JsonEntry {
  return {
    msgctxt: entry.msgctxt === undefined ? undefined : unescapeCatalogString(entry.msgctxt),
    msgid: unescapeCatalogString(entry.msgid),
    msgstr: unescapeCatalogString(entry.msgstr),
    msgid_plural: entry.msgid_plural === undefined ? undefined : unescapeCatalogString(entry.msgid_plural),
    msgstr_plural: entry.msgstr_plural?.map(form => unescapeCatalogString(form)),
    msgctxt_previous: entry.msgctxt_previous === undefined ? undefined : unescapeCatalogString(entry.msgctxt_previous),
    msgid_previous: entry.msgid_previous === undefined ? undefined : unescapeCatalogString(entry.msgid_previous),
    comments: [...entry.comments],
    fuzzy: entry.fuzzy,
    obsolete: entry.obsolete ? true : undefined,
  };
}

function fromJsonEntry(decoded: DecodedEntry): CatalogEntry {
  let fuzzy = decoded.fuzzy;
  const comments: string[] = [];
  for (const comment of decoded.comments ?? []) {
    if (!hasFuzzyFlag(comment)) {
      comments.push(comment);
      continue;
    }
    fuzzy = true;
    const residual = stripFuzzyFlag(comment);
    if (residual !== '') {
      comments.push(residual);
    }
  }

  const entry: CatalogEntry = {
    msgid: escapeCatalogString(decoded.msgid),
    msgstr: escapeCatalogString(decoded.msgstr),
    comments,
    fuzzy,
    obsolete: decoded.obsolete,
  };
  if (decoded.msgctxt !== undefined) entry.msgctxt = escapeCatalogString(decoded.msgctxt);
  if (decoded.msgid_plural !== undefined) {
    entry.msgid_plural = escapeCatalogString(decoded.msgid_plural);
    // A plural entry always has at least the first form, as in catalog text.
    const forms = decoded.msgstr_plural && decoded.msgstr_plural.length > 0 ? decoded.msgstr_plural : [''];
    entry.msgstr_plural = forms.map(form => escapeCatalogString(form));
  }
  if (decoded.msgctxt_previous !== undefined) entry.msgctxt_previous = escapeCatalogString(decoded.msgctxt_previous);
  if (decoded.msgid_previous !== undefined) entry.msgid_previous = escapeCatalogString(decoded.msgid_previous);
  return entry;
}

/**
 * Encodes a document as JSON. Compact unless `indent` is given; always
 * newline-terminated.
 */
export function encodeDocument(document: CatalogDocument, options: EncodeOptions = {}): string {
  const payload: JsonDocument = {
    header_comment: document.header_comment,
    header_meta: unescapeCatalogString(document.header_meta),
    entries: document.entries.map(toJsonEntry),
  };
  const indent = options.indent !== undefined && options.indent > 0 ? options.indent : undefined;
  return `${JSON.stringify(payload, null, indent)}\n`;
}

/**
 * Decodes catalog JSON, repairing model output when plain parsing fails.
 * Throws JsonSyntaxError when no JSON can be recovered and
 * DocumentSchemaError when the JSON is not a catalog document.
 */
export function decodeDocument(text: string, options: DecodeOptions = {}): CatalogDocument {
  const { value, stage } = repairJson(text, { accept: isDocumentShaped });
  if (stage !== 'none') {
    options.onRepair?.(stage);
  }
  const parsed = documentSchema.safeParse(value);
  if (!parsed.success) {
    throw new DocumentSchemaError(
      parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
  return {
    header_comment: parsed.data.header_comment,
    header_meta: escapeCatalogString(parsed.data.header_meta, { keepNewlines: true }),
    entries: parsed.data.entries.map(fromJsonEntry),
  };
}
