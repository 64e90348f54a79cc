import { JsonSyntaxError, type RepairStage } from './errors.js';

export interface RepairResult {
  value: unknown;
  stage: RepairStage;
}

export interface RepairOptions {
  /** Balanced objects found in surrounding text are taken only when this accepts them. */
  accept?: (value: unknown) => boolean;
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: Error };

const SNIPPET_LENGTH = 800;
const FENCE = '```';

function tryParse(text: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

export function stripBom(text: string): string {
  return text.trim().replace(/^\uFEFF/, '').trim();
}

/**
 * Interior of the first markdown code fence, language tag skipped. An
 * unclosed fence runs to the end of the text.
 */
export function extractFencedBlock(text: string): string | undefined {
  const start = text.indexOf(FENCE);
  if (start === -1) {
    return undefined;
  }
  let rest = text.slice(start + FENCE.length);
  const tag = /^[\w+.-]*/.exec(rest)?.[0] ?? '';
  rest = rest.slice(tag.length);
  const end = rest.indexOf(FENCE);
  return (end === -1 ? rest : rest.slice(0, end)).trim();
}

/** End index (inclusive) of the object opening at `start`, skipping braces inside strings. */
function matchBrace(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text.charAt(i);
    if (escaped) {
      escaped = false;
      continue;
    }
    if (inString) {
      if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return undefined;
}

/**
 * Balanced `{...}` substrings in order of their opening brace. An unclosed
 * brace swallows the rest of the text, so the scan ends there.
 */
export function* balancedObjects(text: string): Generator<string> {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = matchBrace(text, start);
    if (end === undefined) {
      return;
    }
    yield text.slice(start, end + 1);
  }
}

function errorOffset(text: string, error: Error): number | undefined {
  const match = /position (\d+)/.exec(error.message);
  if (!match || match[1] === undefined) {
    return undefined;
  }
  return Buffer.byteLength(text.slice(0, Number(match[1])), 'utf8');
}

function snippetOf(text: string): string {
  if (text.length <= SNIPPET_LENGTH) {
    return text;
  }
  return `${text.slice(0, SNIPPET_LENGTH)}\n... (truncated, total ${Buffer.byteLength(text, 'utf8')} bytes)`;
}

/**
 * Parses JSON produced by a language model. Plain parsing comes first; only
 * when it fails are the repair stages tried in order: drop a byte-order mark,
 * take the inside of a markdown fence, take the first balanced object that
 * parses and passes `accept`. The first stage that yields valid JSON wins.
 */
export function repairJson(text: string, options: RepairOptions = {}): RepairResult {
  const accept = options.accept ?? (() => true);
  const initial = tryParse(text);
  if (initial.ok) {
    return { value: initial.value, stage: 'none' };
  }

  let stage: RepairStage = 'bom';
  let current = stripBom(text);
  if (current !== text) {
    const attempt = tryParse(current);
    if (attempt.ok) return { value: attempt.value, stage };
  }

  const fenced = extractFencedBlock(current);
  if (fenced !== undefined) {
    stage = 'fence';
    current = fenced;
    const attempt = tryParse(current);
    if (attempt.ok) return { value: attempt.value, stage };
  }

  stage = 'balanced';
  for (const candidate of balancedObjects(current)) {
    const attempt = tryParse(candidate);
    if (attempt.ok && accept(attempt.value)) return { value: attempt.value, stage };
  }

  throw new JsonSyntaxError({
    snippet: snippetOf(text),
    offset: errorOffset(text, initial.error),
    diagnostic: initial.error.message,
    stage,
  });
}
