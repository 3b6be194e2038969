/**
 * Structured Diagnostics — machine-readable diagnostic types and utilities
 * shared by every pipeline stage.
 *
 * Schema version: 1.0
 */

import { createHash } from 'crypto';
import { SchemaSyntaxError, SchemaLexError } from './parser/errors.js';

// ---- Types ----

export interface DiagnosticLocation {
  file: string;
  line: number;
  col: number;
  sourceLine?: string;
}

export interface RelatedLocation extends DiagnosticLocation {
  message: string;
}

export interface DiagnosticFix {
  description: string;
  suggestion?: string;
}

export type DiagnosticSeverity = 'error' | 'warning' | 'info';
export type DiagnosticCategory = 'syntax' | 'import' | 'semantic' | 'data';

export type DiagnosticKind =
  | 'SyntaxError'
  | 'ImportNotFoundError'
  | 'CircularImportError'
  | 'DuplicateDefinitionError'
  | 'UnresolvedTypeError'
  | 'UnresolvedForeignKeyError'
  | 'ConstraintTypeMismatchError'
  | 'MissingAnnotationParameterError'
  | 'InvalidAnnotationParameterError'
  | 'InvalidPrimaryKeyError'
  | 'RedundantConstraintWarning'
  | 'DuplicateKeyError';

export interface Diagnostic {
  code: string;
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  message: string;
  location: DiagnosticLocation;
  related?: RelatedLocation[];
  fix?: DiagnosticFix;
}

export interface DiagnosticResult {
  valid: boolean;
  diagnostics: Diagnostic[];
  summary: { errors: number; warnings: number; info: number };
  source_hash: string;
  compiler_version: string;
  schema_version: string;
}

// ---- Constants ----

export const SCHEMA_VERSION = '1.0';
export const COMPILER_VERSION = '0.1.0';

interface KindInfo {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
}

export const DIAGNOSTIC_KINDS: Readonly<Record<DiagnosticKind, KindInfo>> = {
  SyntaxError: { code: 'SF-P001', severity: 'error', category: 'syntax' },
  ImportNotFoundError: { code: 'SF-I001', severity: 'error', category: 'import' },
  CircularImportError: { code: 'SF-I002', severity: 'error', category: 'import' },
  DuplicateDefinitionError: { code: 'SF-E001', severity: 'error', category: 'semantic' },
  UnresolvedTypeError: { code: 'SF-E002', severity: 'error', category: 'semantic' },
  UnresolvedForeignKeyError: { code: 'SF-E003', severity: 'error', category: 'semantic' },
  ConstraintTypeMismatchError: { code: 'SF-E004', severity: 'error', category: 'semantic' },
  MissingAnnotationParameterError: { code: 'SF-E005', severity: 'error', category: 'semantic' },
  InvalidAnnotationParameterError: { code: 'SF-E006', severity: 'error', category: 'semantic' },
  InvalidPrimaryKeyError: { code: 'SF-E007', severity: 'error', category: 'semantic' },
  RedundantConstraintWarning: { code: 'SF-W001', severity: 'warning', category: 'semantic' },
  DuplicateKeyError: { code: 'SF-D001', severity: 'error', category: 'data' },
};

// ---- Factory ----

export function createDiagnostic(
  kind: DiagnosticKind,
  message: string,
  location: DiagnosticLocation,
  opts?: {
    related?: RelatedLocation[];
    fix?: DiagnosticFix;
  },
): Diagnostic {
  const info = DIAGNOSTIC_KINDS[kind];
  const d: Diagnostic = {
    code: info.code,
    kind,
    severity: info.severity,
    category: info.category,
    message,
    location: { ...location },
  };
  if (opts?.related && opts.related.length > 0) d.related = opts.related;
  if (opts?.fix) d.fix = opts.fix;
  return d;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(d => d.severity === 'error');
}

// ---- Syntax Error Wrapping ----

export function wrapSyntaxError(err: SchemaSyntaxError | SchemaLexError, file: string): Diagnostic {
  if (err instanceof SchemaSyntaxError) {
    // Strip the "[Schema Syntax Error] Line X:Y: " prefix
    const coreMsg = err.message.replace(/^\[Schema Syntax Error\] Line \d+:\d+: /, '');
    const fix: DiagnosticFix = { description: `Insert or replace with ${err.expected}` };
    if (err.found !== undefined && err.found !== 'end of file') {
      fix.suggestion = `Check the token '${err.found}'`;
    }
    return createDiagnostic('SyntaxError', coreMsg, { file, line: err.line, col: err.col }, { fix });
  }

  const coreMsg = err.message.replace(/^\[Schema Lex Error\] Line \d+:\d+: /, '');
  const fix: DiagnosticFix = { description: 'Fix the lexer error at this location' };
  if (coreMsg.includes('Unterminated string')) {
    fix.description = 'Close the string literal with a matching quote on the same line';
  } else if (coreMsg.includes('Unterminated block comment')) {
    fix.description = "Close the block comment with '*/'";
  }
  return createDiagnostic('SyntaxError', coreMsg, { file, line: err.line, col: err.col }, { fix });
}

// ---- Sorting ----

const SEVERITY_ORDER: Record<DiagnosticSeverity, number> = { error: 0, warning: 1, info: 2 };

export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    // 1. By severity (error first)
    const sevDiff = SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity];
    if (sevDiff !== 0) return sevDiff;
    // 2. By position
    if (a.location.file !== b.location.file) return a.location.file < b.location.file ? -1 : 1;
    if (a.location.line !== b.location.line) return a.location.line - b.location.line;
    if (a.location.col !== b.location.col) return a.location.col - b.location.col;
    // 3. By code, then message for full stability
    if (a.code !== b.code) return a.code < b.code ? -1 : 1;
    return a.message < b.message ? -1 : a.message > b.message ? 1 : 0;
  });
}

// ---- Source excerpts ----

/** Fill in `sourceLine` from the loaded sources where the diagnostic lacks one. */
export function attachSourceLines(
  diagnostics: readonly Diagnostic[],
  sources: ReadonlyMap<string, string>,
): Diagnostic[] {
  const split = new Map<string, string[]>();
  const lineOf = (loc: DiagnosticLocation): string | undefined => {
    const text = sources.get(loc.file);
    if (text === undefined) return undefined;
    let lines = split.get(loc.file);
    if (!lines) {
      lines = text.split(/\r?\n/);
      split.set(loc.file, lines);
    }
    return lines[loc.line - 1];
  };

  return diagnostics.map(d => {
    if (d.location.sourceLine !== undefined) return d;
    const sourceLine = lineOf(d.location);
    if (sourceLine === undefined) return d;
    return { ...d, location: { ...d.location, sourceLine } };
  });
}

// ---- Result Builder ----

export function buildResult(diagnostics: readonly Diagnostic[], sourceHash: string): DiagnosticResult {
  const sorted = sortDiagnostics(diagnostics);
  const errors = sorted.filter(d => d.severity === 'error').length;
  const warnings = sorted.filter(d => d.severity === 'warning').length;
  const info = sorted.filter(d => d.severity === 'info').length;

  return {
    valid: errors === 0,
    diagnostics: sorted,
    summary: { errors, warnings, info },
    source_hash: sourceHash,
    compiler_version: COMPILER_VERSION,
    schema_version: SCHEMA_VERSION,
  };
}

export function hashSource(source: string): string {
  return createHash('sha256').update(source).digest('hex');
}

/** Hash of every loaded file, in path order, so the result is independent of visitation order. */
export function hashSources(sources: ReadonlyMap<string, string>): string {
  const hash = createHash('sha256');
  for (const path of [...sources.keys()].sort()) {
    hash.update(path);
    hash.update('\0');
    hash.update(sources.get(path) ?? '');
    hash.update('\0');
  }
  return hash.digest('hex');
}

// ---- CLI Formatter ----

export function formatDiagnosticCLI(d: Diagnostic): string {
  const lines: string[] = [];
  lines.push(`${d.severity}[${d.code}]: ${d.message}`);
  lines.push(`  --> ${d.location.file}:${d.location.line}:${d.location.col}`);

  if (d.location.sourceLine !== undefined) {
    const gutter = String(d.location.line).length;
    lines.push(`${' '.repeat(gutter + 1)}|`);
    lines.push(`${d.location.line} | ${d.location.sourceLine}`);
    lines.push(`${' '.repeat(gutter + 1)}| ${' '.repeat(Math.max(0, d.location.col - 1))}^`);
  }

  for (const r of d.related ?? []) {
    lines.push(`  note: ${r.message} at ${r.file}:${r.line}:${r.col}`);
  }

  if (d.fix) {
    lines.push(`  = fix: ${d.fix.description}`);
  }

  return lines.join('\n');
}
