/**
 * Namespace merge — an explicit reduction over per-file ASTs keyed by FQN.
 *
 * Nested and dotted namespaces flatten to one FQN each. Same-FQN namespaces
 * from different files are one logical namespace: members are concatenated in
 * file-visitation order, imports and annotations unioned.
 */

import type {
  Definition,
  FileAst,
  MergedAst,
  MergedNamespace,
  SourceLocation,
  TypeDefinition,
} from '../ast/types.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics.js';

export interface MergeResult {
  ast: MergedAst;
  diagnostics: Diagnostic[];
}

export function namespaceLabel(fqn: string): string {
  return fqn === '' ? '<root>' : fqn;
}

export function formatLocation(loc: SourceLocation): string {
  return `${loc.file}:${loc.line}:${loc.col}`;
}

interface Accumulator {
  namespaces: Map<string, MergedNamespace>;
  /** FQN → definition name → location of the first definition */
  seen: Map<string, Map<string, SourceLocation>>;
  diagnostics: Diagnostic[];
}

export function mergeFiles(files: readonly FileAst[]): MergeResult {
  const acc = files.reduce<Accumulator>(
    (state, file) => {
      const root = namespaceFor(state, [], undefined);
      for (const def of file.definitions) addDefinition(state, root, def);
      return state;
    },
    { namespaces: new Map(), seen: new Map(), diagnostics: [] },
  );

  return {
    ast: { files: files.map(f => f.path), namespaces: [...acc.namespaces.values()] },
    diagnostics: acc.diagnostics,
  };
}

function namespaceFor(acc: Accumulator, path: string[], loc: SourceLocation | undefined): MergedNamespace {
  const fqn = path.join('.');
  let ns = acc.namespaces.get(fqn);
  if (!ns) {
    ns = { fqn, path, imports: [], annotations: [], items: [], locations: [] };
    acc.namespaces.set(fqn, ns);
  }
  if (loc) ns.locations.push(loc);
  return ns;
}

function addDefinition(acc: Accumulator, parent: MergedNamespace, def: Definition): void {
  if (def.kind !== 'namespace') {
    addItem(acc, parent, def);
    return;
  }

  const ns = namespaceFor(acc, [...parent.path, ...def.path], def.loc);
  for (const imp of def.imports) {
    const dup = ns.imports.some(
      i => i.wildcard === imp.wildcard && i.path.join('.') === imp.path.join('.'),
    );
    if (!dup) ns.imports.push(imp);
  }
  ns.annotations.push(...def.annotations);
  for (const child of def.definitions) addDefinition(acc, ns, child);
}

function addItem(acc: Accumulator, ns: MergedNamespace, def: TypeDefinition): void {
  const name = def.name ?? '';
  let names = acc.seen.get(ns.fqn);
  if (!names) {
    names = new Map();
    acc.seen.set(ns.fqn, names);
  }

  const first = names.get(name);
  if (first) {
    acc.diagnostics.push(createDiagnostic(
      'DuplicateDefinitionError',
      `Duplicate definition '${name}' in namespace '${namespaceLabel(ns.fqn)}' (first defined at ${formatLocation(first)})`,
      def.loc,
      {
        related: [{ ...first, message: `first definition of '${name}'` }],
        fix: { description: `Rename or remove one of the '${name}' definitions` },
      },
    ));
    return;
  }

  names.set(name, def.loc);
  ns.items.push(def);
}
