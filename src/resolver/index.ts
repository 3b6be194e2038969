/**
 * Import Resolver
 *
 * Starting at the entry file, walks `import "path";` statements breadth-first,
 * parsing every file exactly once, then merges the per-file ASTs by namespace
 * FQN. A syntax error in one file is reported and the remaining files are
 * still attempted; import cycles are reported instead of followed.
 */

import { parse } from '../parser/index.js';
import { SchemaLexError, SchemaSyntaxError } from '../parser/errors.js';
import { buildAst } from '../ast/builder.js';
import type { FileAst, MergedAst, SourceLocation } from '../ast/types.js';
import { createDiagnostic, wrapSyntaxError, hasErrors, type Diagnostic } from '../diagnostics.js';
import { mergeFiles } from './merge.js';
import type { SourceHost } from './host.js';

export interface ResolveResult {
  /** Undefined when any syntax or import error occurred. */
  ast?: MergedAst;
  /** Successfully parsed files, in visitation order. */
  files: FileAst[];
  /** Text of every file that could be read, keyed by host path. */
  sources: Map<string, string>;
  diagnostics: Diagnostic[];
}

export interface ParseFileResult {
  ast?: FileAst;
  diagnostics: Diagnostic[];
}

export function parseFile(path: string, text: string): ParseFileResult {
  try {
    return { ast: buildAst(parse(text), path), diagnostics: [] };
  } catch (err) {
    if (err instanceof SchemaSyntaxError || err instanceof SchemaLexError) {
      return { diagnostics: [wrapSyntaxError(err, path)] };
    }
    throw err;
  }
}

interface ImportEdge {
  from: string;
  to: string;
  loc: SourceLocation;
}

export function resolveSchema(entryPath: string, host: SourceHost): ResolveResult {
  const entry = host.normalize(entryPath);
  const sources = new Map<string, string>();
  const files: FileAst[] = [];
  const diagnostics: Diagnostic[] = [];
  const edges: ImportEdge[] = [];

  const visited = new Set<string>([entry]);
  const queue: { path: string; importedAt?: SourceLocation }[] = [{ path: entry }];

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;

    const text = host.readFile(next.path);
    if (text === undefined) {
      const loc = next.importedAt ?? { file: next.path, line: 1, col: 1 };
      diagnostics.push(createDiagnostic(
        'ImportNotFoundError',
        next.importedAt ? `Imported file '${next.path}' not found` : `Schema file '${next.path}' not found`,
        loc,
        { fix: { description: 'Check the import path; it is resolved relative to the importing file' } },
      ));
      continue;
    }
    sources.set(next.path, text);

    const parsed = parseFile(next.path, text);
    diagnostics.push(...parsed.diagnostics);
    if (!parsed.ast) continue;
    files.push(parsed.ast);

    for (const imp of parsed.ast.imports) {
      const target = host.resolveImport(next.path, imp.path);
      edges.push({ from: next.path, to: target, loc: imp.loc });
      if (!visited.has(target)) {
        visited.add(target);
        queue.push({ path: target, importedAt: imp.loc });
      }
    }
  }

  diagnostics.push(...detectCycles(entry, edges));

  if (hasErrors(diagnostics)) {
    return { files, sources, diagnostics };
  }

  const merged = mergeFiles(files);
  return { ast: merged.ast, files, sources, diagnostics: [...diagnostics, ...merged.diagnostics] };
}

/**
 * Depth-first search over the import graph in declaration order; every back
 * edge is one cycle, reported at the import statement that closes it.
 */
function detectCycles(entry: string, edges: ImportEdge[]): Diagnostic[] {
  const out = new Map<string, ImportEdge[]>();
  for (const e of edges) {
    const list = out.get(e.from);
    if (list) list.push(e);
    else out.set(e.from, [e]);
  }

  const diagnostics: Diagnostic[] = [];
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (path: string): void => {
    stack.push(path);
    for (const e of out.get(path) ?? []) {
      const at = stack.indexOf(e.to);
      if (at >= 0) {
        const chain = [...stack.slice(at), e.to].join(' -> ');
        diagnostics.push(createDiagnostic(
          'CircularImportError',
          `Circular import: ${chain}`,
          e.loc,
          { fix: { description: 'Move the shared definitions into a file that both can import' } },
        ));
      } else if (!done.has(e.to)) {
        visit(e.to);
      }
    }
    stack.pop();
    done.add(path);
  };

  visit(entry);
  return diagnostics;
}

export { mergeFiles } from './merge.js';
export { createNodeHost, createMemoryHost, type SourceHost } from './host.js';
