/**
 * Base class for every error raised by the catalog core. Callers can catch
 * `CatalogError` to handle all of them, or a subclass for one kind.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CatalogSyntaxError extends CatalogError {
  public readonly line: number | undefined;
  public readonly content: string | undefined;

  constructor(reason: string, line?: number, content?: string) {
    super(
      line !== undefined
        ? `Catalog syntax error at line ${line}: ${reason}${content !== undefined ? `\n  ${content}` : ''}`
        : `Catalog syntax error: ${reason}`
    );
    this.line = line;
    this.content = content;
  }
}

export class HeaderError extends CatalogError {
  public readonly content: string | undefined;

  constructor(reason: string, content?: string) {
    super(`Malformed header entry: ${reason}${content !== undefined ? `\n  ${content}` : ''}`);
    this.content = content;
  }
}

export type RepairStage = 'none' | 'bom' | 'fence' | 'balanced';

export interface JsonSyntaxErrorDetails {
  snippet: string;
  offset: number | undefined;
  diagnostic: string;
  stage: RepairStage;
}

export class JsonSyntaxError extends CatalogError {
  public readonly snippet: string;
  public readonly offset: number | undefined;
  public readonly diagnostic: string;
  public readonly stage: RepairStage;

  constructor(details: JsonSyntaxErrorDetails) {
    const position = details.offset !== undefined ? ` at offset ${details.offset}` : '';
    super(
      `Failed to parse catalog JSON${position}: ${details.diagnostic}\n\n` +
        `Repair attempts (byte-order mark removal, markdown code block extraction, ` +
        `balanced object extraction) all failed; last stage tried: ${details.stage}.\n\n` +
        `Expected schema:\n` +
        `  {"header_comment":"","header_meta":"","entries":[{"msgid":"...","msgstr":"...","fuzzy":false}]}\n\n` +
        `Content snippet:\n---\n${details.snippet}\n---\n\n` +
        `Please supply valid JSON that conforms to this schema.`
    );
    this.snippet = details.snippet;
    this.offset = details.offset;
    this.diagnostic = details.diagnostic;
    this.stage = details.stage;
  }
}

export class DocumentSchemaError extends CatalogError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Catalog JSON does not match the document schema:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

export class RangeSpecError extends CatalogError {
  public readonly token: string;
  public readonly total: number;

  constructor(token: string, total: number, reason: string) {
    super(`Invalid range "${token}": ${reason} (valid entries: ${total === 0 ? 'none' : `1-${total}`})`);
    this.token = token;
    this.total = total;
  }
}

export class FilterOptionError extends CatalogError {}
