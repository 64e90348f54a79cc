import type { CatalogEntry, ParsedCatalog } from '../types/index.js';
import { CatalogSyntaxError } from './errors.js';
import { readQuotedString } from './escape.js';
import { hasFuzzyFlag, stripFuzzyFlag } from './flags.js';

type Field = 'msgctxt' | 'msgid' | 'msgid_plural' | 'msgstr' | 'msgctxt_previous' | 'msgid_previous' | number;

interface EntryDraft {
  rawLines: string[];
  comments: string[];
  fuzzy: boolean;
  obsolete?: boolean;
  hasPrevious: boolean;
  msgctxt?: string;
  msgid?: string;
  msgidPlural?: string;
  msgstr?: string;
  msgstrPlural: string[];
  msgctxtPrevious?: string;
  msgidPrevious?: string;
  field?: Field;
  startLine: number;
}

const KEYWORD_LINE = /^(msgctxt|msgid_plural|msgid|msgstr)(?:\[(\d+)\])?\s*(".*)$/;
const PREVIOUS_LINE = /^(msgctxt|msgid)\s*(".*)$/;

function newDraft(): EntryDraft {
  return { rawLines: [], comments: [], fuzzy: false, hasPrevious: false, msgstrPlural: [], startLine: 0 };
}

function isKeywordOrContinuation(text: string): boolean {
  return text.startsWith('"') || KEYWORD_LINE.test(text);
}

/**
 * True for a single line the parser would read back as a comment, and not as
 * a fuzzy flag, an obsolete keyword or a previous-value marker.
 */
export function isCommentLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed.startsWith('#') || line.includes('\n') || trimmed.startsWith('#~|')) {
    return false;
  }
  return !(trimmed.startsWith('#~') && isKeywordOrContinuation(trimmed.slice(2).trim()));
}

/**
 * Parses catalog text into its header lines and entries. Strings are kept in
 * catalog escape form; raw control characters inside quotes are rewritten as
 * their escapes.
 */
export function parseCatalog(text: string): ParsedCatalog {
  return new CatalogParser(text).parse();
}

class CatalogParser {
  private readonly lines: string[];
  private leadingLines: string[] = [];
  private headerLines: string[] | undefined;
  private entries: CatalogEntry[] = [];
  private draft: EntryDraft = newDraft();
  private lineNo = 0;
  private line = '';

  constructor(text: string) {
    const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
    this.lines = body.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
    if (this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
  }

  public parse(): ParsedCatalog {
    this.lines.forEach((line, index) => {
      this.lineNo = index + 1;
      this.line = line;
      this.consume(line);
    });
    this.finishInput();
    return { headerLines: this.headerLines ?? [], entries: this.entries };
  }

  private get inHeaderZone(): boolean {
    return this.headerLines === undefined;
  }

  private hasKeywords(): boolean {
    return this.draft.msgctxt !== undefined || this.draft.msgid !== undefined;
  }

  private syntaxError(reason: string, line = this.lineNo, content = this.line): CatalogSyntaxError {
    return new CatalogSyntaxError(reason, line, content);
  }

  private consume(line: string): void {
    const trimmed = line.trim();
    if (trimmed === '') {
      this.blank(line);
      return;
    }
    if (trimmed.startsWith('#~|')) {
      this.previous(trimmed.slice(3).trim(), line);
      return;
    }
    if (trimmed.startsWith('#~')) {
      const rest = trimmed.slice(2).trim();
      if (isKeywordOrContinuation(rest)) {
        this.keyword(rest, true, line);
        return;
      }
    }
    if (trimmed.startsWith('#')) {
      this.comment(line);
      return;
    }
    this.keyword(trimmed, false, line);
  }

  private blank(line: string): void {
    if (this.hasKeywords()) {
      this.finishDraft();
      return;
    }
    if (this.inHeaderZone && !this.draft.hasPrevious) {
      // Comments separated from the first entry by a blank line describe the file.
      this.leadingLines.push(...this.draft.rawLines, line);
      this.draft = newDraft();
    }
  }

  private comment(line: string): void {
    if (this.hasKeywords()) {
      this.finishDraft();
    }
    this.touch();
    this.draft.rawLines.push(line);
    if (hasFuzzyFlag(line)) {
      this.draft.fuzzy = true;
      const residual = stripFuzzyFlag(line);
      if (residual !== '') {
        this.draft.comments.push(residual);
      }
      return;
    }
    this.draft.comments.push(line);
  }

  private previous(rest: string, line: string): void {
    if (this.draft.msgid !== undefined) {
      this.finishDraft();
    }
    this.touch();
    const draft = this.draft;
    if (rest.startsWith('"')) {
      const value = this.readQuoted(rest);
      if (draft.field === 'msgid_previous') {
        draft.msgidPrevious = (draft.msgidPrevious ?? '') + value;
      } else if (draft.field === 'msgctxt_previous') {
        draft.msgctxtPrevious = (draft.msgctxtPrevious ?? '') + value;
      } else {
        throw this.syntaxError('previous-value continuation without a preceding "#~| msgid" or "#~| msgctxt"');
      }
    } else {
      const match = PREVIOUS_LINE.exec(rest);
      if (!match || match[1] === undefined || match[2] === undefined) {
        throw this.syntaxError('unrecognized previous-value line');
      }
      const value = this.readQuoted(match[2]);
      if (match[1] === 'msgctxt') {
        if (draft.msgctxtPrevious !== undefined || draft.msgidPrevious !== undefined) {
          throw this.syntaxError('duplicate previous msgctxt');
        }
        draft.msgctxtPrevious = value;
        draft.field = 'msgctxt_previous';
      } else {
        if (draft.msgidPrevious !== undefined) {
          throw this.syntaxError('duplicate previous msgid');
        }
        draft.msgidPrevious = value;
        draft.field = 'msgid_previous';
      }
    }
    draft.hasPrevious = true;
    draft.rawLines.push(line);
  }

  private keyword(text: string, obsolete: boolean, line: string): void {
    if (text.startsWith('"')) {
      this.continuation(text, obsolete, line);
      return;
    }
    const match = KEYWORD_LINE.exec(text);
    if (!match || match[1] === undefined || match[3] === undefined) {
      throw this.syntaxError('unrecognized line');
    }
    const keyword = match[1];
    const index = match[2];
    const value = this.readQuoted(match[3]);

    if (index !== undefined && keyword !== 'msgstr') {
      throw this.syntaxError(`"${keyword}" does not take a plural index`);
    }
    if ((keyword === 'msgctxt' || keyword === 'msgid') && this.draft.msgid !== undefined) {
      this.finishDraft();
    }
    this.touch();
    const draft = this.draft;
    this.checkObsolete(obsolete);

    switch (keyword) {
      case 'msgctxt':
        if (draft.msgctxt !== undefined) {
          throw this.syntaxError('duplicate msgctxt');
        }
        draft.msgctxt = value;
        draft.field = 'msgctxt';
        break;
      case 'msgid':
        draft.msgid = value;
        draft.field = 'msgid';
        break;
      case 'msgid_plural':
        if (draft.msgid === undefined || draft.msgidPlural !== undefined || draft.msgstr !== undefined || draft.msgstrPlural.length > 0) {
          throw this.syntaxError('msgid_plural must directly follow msgid');
        }
        draft.msgidPlural = value;
        draft.field = 'msgid_plural';
        break;
      default:
        if (draft.msgid === undefined) {
          throw this.syntaxError('msgstr without a preceding msgid');
        }
        if (index === undefined) {
          if (draft.msgidPlural !== undefined) {
            throw this.syntaxError('plural entry requires msgstr[N] lines');
          }
          if (draft.msgstr !== undefined) {
            throw this.syntaxError('duplicate msgstr');
          }
          draft.msgstr = value;
          draft.field = 'msgstr';
        } else {
          if (draft.msgidPlural === undefined) {
            throw this.syntaxError('msgstr[N] without a preceding msgid_plural');
          }
          const position = Number(index);
          if (position !== draft.msgstrPlural.length) {
            throw this.syntaxError(`expected msgstr[${draft.msgstrPlural.length}], found msgstr[${index}]`);
          }
          draft.msgstrPlural.push(value);
          draft.field = position;
        }
    }
    draft.rawLines.push(line);
  }

  private continuation(text: string, obsolete: boolean, line: string): void {
    const draft = this.draft;
    const field = draft.field;
    if (field === undefined || field === 'msgctxt_previous' || field === 'msgid_previous' || !this.hasKeywords()) {
      throw this.syntaxError('string continuation without a preceding keyword');
    }
    this.checkObsolete(obsolete);
    const value = this.readQuoted(text);
    if (typeof field === 'number') {
      draft.msgstrPlural[field] = (draft.msgstrPlural[field] ?? '') + value;
    } else if (field === 'msgctxt') {
      draft.msgctxt = (draft.msgctxt ?? '') + value;
    } else if (field === 'msgid') {
      draft.msgid = (draft.msgid ?? '') + value;
    } else if (field === 'msgid_plural') {
      draft.msgidPlural = (draft.msgidPlural ?? '') + value;
    } else {
      draft.msgstr = (draft.msgstr ?? '') + value;
    }
    draft.rawLines.push(line);
  }

  private checkObsolete(obsolete: boolean): void {
    const draft = this.draft;
    if (draft.hasPrevious && !obsolete) {
      throw this.syntaxError('previous-value marker "#~|" on an active entry');
    }
    if (draft.obsolete === undefined) {
      draft.obsolete = obsolete;
    } else if (draft.obsolete !== obsolete) {
      throw this.syntaxError('entry mixes obsolete "#~" lines with active lines');
    }
  }

  private touch(): void {
    if (this.draft.rawLines.length === 0) {
      this.draft.startLine = this.lineNo;
    }
  }

  private readQuoted(text: string): string {
    const result = readQuotedString(text);
    if ('reason' in result) {
      throw this.syntaxError(result.reason);
    }
    return result.value;
  }

  private finishDraft(): void {
    const draft = this.draft;
    const start = draft.startLine;
    const startContent = draft.rawLines[0] ?? '';
    if (draft.msgid === undefined) {
      throw this.syntaxError('msgctxt without msgid', start, startContent);
    }
    if (draft.msgidPlural !== undefined && draft.msgstrPlural.length === 0) {
      throw this.syntaxError('plural entry without msgstr[0]', start, startContent);
    }
    if (draft.msgidPlural === undefined && draft.msgstr === undefined) {
      throw this.syntaxError('entry without msgstr', start, startContent);
    }

    const entry: CatalogEntry = {
      msgid: draft.msgid,
      msgstr: draft.msgstr ?? '',
      comments: draft.comments,
      fuzzy: draft.fuzzy,
      obsolete: draft.obsolete ?? false,
    };
    if (draft.msgctxt !== undefined) entry.msgctxt = draft.msgctxt;
    if (draft.msgidPlural !== undefined) {
      entry.msgid_plural = draft.msgidPlural;
      entry.msgstr_plural = draft.msgstrPlural;
    }
    if (draft.msgctxtPrevious !== undefined) entry.msgctxt_previous = draft.msgctxtPrevious;
    if (draft.msgidPrevious !== undefined) entry.msgid_previous = draft.msgidPrevious;

    const isHeaderShape = !entry.obsolete && entry.msgid === '' && entry.msgctxt === undefined;
    if (this.inHeaderZone && isHeaderShape && entry.msgid_plural === undefined) {
      this.headerLines = [...this.leadingLines, ...draft.rawLines];
    } else {
      if (isHeaderShape) {
        throw this.syntaxError('empty msgid is reserved for the header entry', start, startContent);
      }
      if (this.inHeaderZone) {
        this.headerLines = this.leadingLines;
      }
      this.entries.push(entry);
    }
    this.leadingLines = [];
    this.draft = newDraft();
  }

  private finishInput(): void {
    if (this.hasKeywords()) {
      this.finishDraft();
      return;
    }
    const draft = this.draft;
    if (draft.rawLines.length === 0) {
      if (this.inHeaderZone) {
        this.headerLines = this.leadingLines;
      }
      return;
    }
    if (this.inHeaderZone && !draft.hasPrevious) {
      this.headerLines = [...this.leadingLines, ...draft.rawLines];
      return;
    }
    throw this.syntaxError('comment lines without a following entry', draft.startLine, draft.rawLines[0] ?? '');
  }
}
