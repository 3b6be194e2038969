/**
 * Schema Parser Error Types
 *
 * Structured errors with exact line/col info for user-facing diagnostics.
 * Both are fail-fast: the first one aborts parsing of the file it occurs in.
 */

export interface SourcePosition {
  line: number;
  col: number;
}

export interface SyntaxErrorContext {
  line: number;
  col: number;
  expected: string;
  found?: string;
}

export class SchemaSyntaxError extends Error {
  readonly line: number;
  readonly col: number;
  readonly expected: string;
  readonly found?: string;

  constructor(message: string, ctx: SyntaxErrorContext) {
    const foundInfo = ctx.found !== undefined ? ` (found: '${ctx.found}')` : '';
    super(`[Schema Syntax Error] Line ${ctx.line}:${ctx.col}: ${message}${foundInfo}`);
    this.name = 'SchemaSyntaxError';
    this.line = ctx.line;
    this.col = ctx.col;
    this.expected = ctx.expected;
    this.found = ctx.found;
  }
}

export class SchemaLexError extends Error {
  readonly line: number;
  readonly col: number;

  constructor(message: string, line: number, col: number) {
    super(`[Schema Lex Error] Line ${line}:${col}: ${message}`);
    this.name = 'SchemaLexError';
    this.line = line;
    this.col = col;
  }
}
