/**
 * Symbol table and name resolution over the merged AST.
 *
 * Every addressable type definition gets an FQN: namespace-level items are
 * `<namespace>.<Name>`, types declared inside a table or embed are
 * `<owner>.<Name>`. Anonymous field types are addressed as
 * `<owner>::<field>` and are never resolvable by name.
 */

import type {
  EmbedDef,
  EnumDef,
  FieldDef,
  MergedAst,
  MergedNamespace,
  NestedDef,
  TableDef,
} from '../ast/types.js';

export type EmbedClassification = 'reusable' | 'nested' | 'inline';

export type SymbolEntry =
  | { kind: 'table'; fqn: string; namespace: string; def: TableDef }
  | { kind: 'embed'; fqn: string; namespace: string; owner?: string; classification: EmbedClassification; def: EmbedDef }
  | { kind: 'enum'; fqn: string; namespace: string; owner?: string; classification: EmbedClassification; def: EnumDef };

/** Where a name is being looked up from. */
export interface Scope {
  namespace: string;
  /** Enclosing table/embed FQNs, outermost first. */
  owners: string[];
}

export function joinFqn(...parts: string[]): string {
  return parts.filter(p => p !== '').join('.');
}

export function inlineFqn(owner: string, field: string): string {
  return `${owner}::${field}`;
}

export function namespaceChain(fqn: string): string[] {
  const chain: string[] = [];
  const parts = fqn === '' ? [] : fqn.split('.');
  for (let i = parts.length; i > 0; i--) chain.push(parts.slice(0, i).join('.'));
  chain.push('');
  return chain;
}

export class SymbolTable {
  private readonly symbols = new Map<string, SymbolEntry>();
  private readonly namespaces = new Map<string, MergedNamespace>();

  constructor(ast: MergedAst) {
    for (const ns of ast.namespaces) {
      this.namespaces.set(ns.fqn, ns);
      for (const item of ns.items) {
        const fqn = joinFqn(ns.fqn, item.name ?? '');
        switch (item.kind) {
          case 'table':
            this.define({ kind: 'table', fqn, namespace: ns.fqn, def: item });
            this.defineMembers(ns.fqn, fqn, item.fields, item.nested);
            break;
          case 'embed':
            this.define({ kind: 'embed', fqn, namespace: ns.fqn, classification: 'reusable', def: item });
            this.defineMembers(ns.fqn, fqn, item.fields, item.nested);
            break;
          case 'enum':
            this.define({ kind: 'enum', fqn, namespace: ns.fqn, classification: 'reusable', def: item });
            break;
        }
      }
    }
  }

  get(fqn: string): SymbolEntry | undefined {
    return this.symbols.get(fqn);
  }

  namespace(fqn: string): MergedNamespace | undefined {
    return this.namespaces.get(fqn);
  }

  /**
   * Resolve a dotted path: innermost scope outwards (owners, enclosing
   * namespaces, root), then through the namespace imports in effect.
   */
  resolve(path: readonly string[], scope: Scope): SymbolEntry | undefined {
    const name = path.join('.');

    for (let i = scope.owners.length - 1; i >= 0; i--) {
      const hit = this.symbols.get(joinFqn(scope.owners[i], name));
      if (hit) return hit;
    }

    const chain = namespaceChain(scope.namespace);
    for (const ns of chain) {
      const hit = this.symbols.get(joinFqn(ns, name));
      if (hit) return hit;
    }

    for (const ns of chain) {
      for (const imp of this.namespaces.get(ns)?.imports ?? []) {
        const base = imp.path.join('.');
        if (imp.wildcard) {
          const hit = this.symbols.get(joinFqn(base, name));
          if (hit) return hit;
        } else if (imp.path[imp.path.length - 1] === path[0]) {
          const hit = this.symbols.get(joinFqn(base, ...path.slice(1)));
          if (hit) return hit;
        }
      }
    }

    return undefined;
  }

  private define(entry: SymbolEntry): void {
    // Duplicates are reported by the validator; first definition wins here.
    if (!this.symbols.has(entry.fqn)) this.symbols.set(entry.fqn, entry);
  }

  private defineMembers(namespace: string, owner: string, fields: FieldDef[], nested: NestedDef[]): void {
    for (const def of nested) {
      const fqn = joinFqn(owner, def.name ?? '');
      if (def.kind === 'embed') {
        this.define({ kind: 'embed', fqn, namespace, owner, classification: 'nested', def });
        this.defineMembers(namespace, fqn, def.fields, def.nested);
      } else {
        this.define({ kind: 'enum', fqn, namespace, owner, classification: 'nested', def });
      }
    }
    // Named types declared inside anonymous embeds live under the field's synthetic owner.
    for (const field of fields) {
      if (field.type.kind === 'inline_embed') {
        const embed = field.type.embed;
        this.defineMembers(namespace, inlineFqn(owner, field.name), embed.fields, embed.nested);
      }
    }
  }
}
