/**
 * Compilation pipeline: resolve → validate → build IR → generate.
 *
 * Syntax and import errors stop before validation; any error diagnostic stops
 * before the IR is built. Warnings never block.
 */

import {
  attachSourceLines,
  buildResult,
  hasErrors,
  hashSources,
  type Diagnostic,
  type DiagnosticResult,
} from './diagnostics.js';
import { generate } from './generators/index.js';
import type { GeneratorTarget, OutputFile } from './generators/types.js';
import { buildIr } from './ir/builder.js';
import type { Ir } from './ir/types.js';
import { resolveSchema, type SourceHost } from './resolver/index.js';
import { GENERATOR_TARGETS } from './semantic/annotations.js';
import { validate } from './validator/index.js';

export interface CompileOptions {
  targets?: readonly GeneratorTarget[];
  compositePrimaryKeys?: boolean;
  /** Stop after diagnostics; no IR, no output files. */
  checkOnly?: boolean;
}

export interface CompileResult {
  result: DiagnosticResult;
  ir?: Ir;
  files: OutputFile[];
}

export function compile(entry: string, host: SourceHost, options: CompileOptions = {}): CompileResult {
  const resolved = resolveSchema(entry, host);
  const sourceHash = hashSources(resolved.sources);
  const finish = (diagnostics: readonly Diagnostic[], ir?: Ir, files: OutputFile[] = []): CompileResult => ({
    result: buildResult(attachSourceLines(diagnostics, resolved.sources), sourceHash),
    ir,
    files,
  });

  if (!resolved.ast) return finish(resolved.diagnostics);

  const validateOptions = { compositePrimaryKeys: options.compositePrimaryKeys };
  const diagnostics = [...resolved.diagnostics, ...validate(resolved.ast, validateOptions)];
  if (hasErrors(diagnostics) || options.checkOnly) return finish(diagnostics);

  const ir = buildIr(resolved.ast, validateOptions);
  return finish(diagnostics, ir, generate(ir, options.targets ?? GENERATOR_TARGETS));
}
