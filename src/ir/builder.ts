/**
 * IR Builder
 *
 * Consumes a merged AST that validates cleanly and produces the frozen IR:
 * fully-qualified type resolution, embed classification by declaration site,
 * relationship edges with inferred cardinalities and reverse names, indexes,
 * and interpreted annotation effects.
 */

import type {
  Constraint,
  EmbedDef,
  EnumDef,
  FieldDef,
  Literal,
  MergedAst,
  NestedDef,
  TableDef,
} from '../ast/types.js';
import type { Diagnostic } from '../diagnostics.js';
import { interpretAnnotation, type AnnotationEffect } from '../semantic/annotations.js';
import {
  SymbolTable,
  inlineFqn,
  joinFqn,
  namespaceChain,
  type EmbedClassification,
  type Scope,
} from '../semantic/scope.js';
import { validate, type ValidateOptions } from '../validator/index.js';
import { deepFreeze } from './freeze.js';
import { indexName, pascalCase } from './names.js';
import { inferRelationships, type ForeignKeyRef, type RelationshipGraph } from './relationships.js';
import type {
  IndexSource,
  Ir,
  IrConstraint,
  IrEmbed,
  IrEnum,
  IrField,
  IrIndex,
  IrItemRef,
  IrNamespace,
  IrTable,
  IrTypeBase,
  IrTypeRef,
  TableHandle,
} from './types.js';

export type IrBuildOptions = ValidateOptions;

export class IrBuildError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(`Cannot build IR: ${diagnostics.length} error(s) outstanding (first: ${diagnostics[0]?.message ?? 'unknown'})`);
    this.name = 'IrBuildError';
    this.diagnostics = diagnostics;
  }
}

/** Validates, then builds. Throws IrBuildError while any error diagnostic is outstanding. */
export function buildIr(ast: MergedAst, options: IrBuildOptions = {}): Ir {
  const errors = validate(ast, options).filter(d => d.severity === 'error');
  if (errors.length > 0) throw new IrBuildError(errors);
  return deepFreeze(new IrBuilder(ast).build());
}

interface TableEntry {
  handle: TableHandle;
  fqn: string;
  namespace: string;
  def: TableDef;
}

function firstOfKind<K extends Constraint['kind']>(
  constraints: readonly Constraint[],
  kind: K,
): Extract<Constraint, { kind: K }> | undefined {
  for (const c of constraints) {
    if (isKind(c, kind)) return c;
  }
  return undefined;
}

function isKind<K extends Constraint['kind']>(c: Constraint, kind: K): c is Extract<Constraint, { kind: K }> {
  return c.kind === kind;
}

function numericValue(lit: Literal): number | bigint {
  if (lit.kind === 'integer' || lit.kind === 'float') return lit.value;
  throw new Error(`Internal error: expected a numeric literal, got ${lit.kind}`);
}

class IrBuilder {
  private readonly symbols: SymbolTable;
  private readonly handles = new Map<string, TableHandle>();
  private readonly entries: TableEntry[] = [];
  private readonly embeds = new Map<string, IrEmbed>();
  private readonly embedOrder: string[] = [];
  private readonly enums = new Map<string, IrEnum>();
  private readonly enumOrder: string[] = [];
  /** `${handle}.${field}` → relationship id and target table */
  private readonly foreignKeys = new Map<string, { id: number; target: TableHandle }>();

  constructor(private readonly ast: MergedAst) {
    this.symbols = new SymbolTable(ast);
  }

  build(): Ir {
    for (const ns of this.ast.namespaces) {
      for (const item of ns.items) {
        if (item.kind !== 'table') continue;
        const fqn = joinFqn(ns.fqn, item.name);
        const handle = this.entries.length;
        this.handles.set(fqn, handle);
        this.entries.push({ handle, fqn, namespace: ns.fqn, def: item });
      }
    }

    const graph = inferRelationships(this.collectForeignKeys());

    const namespaces: IrNamespace[] = [];
    const tables: IrTable[] = [];
    for (const ns of this.ast.namespaces) {
      const items: IrItemRef[] = [];
      for (const item of ns.items) {
        const fqn = joinFqn(ns.fqn, item.name ?? '');
        const scope: Scope = { namespace: ns.fqn, owners: [fqn] };
        switch (item.kind) {
          case 'table': {
            const handle = this.handleOf(fqn);
            tables.push(this.convertTable(this.entries[handle], graph));
            items.push({ kind: 'table', handle });
            break;
          }
          case 'embed':
            this.convertEmbed(item, fqn, item.name ?? '', 'reusable', ns.fqn, undefined, scope);
            items.push({ kind: 'embed', fqn });
            break;
          case 'enum':
            this.convertEnum(item, fqn, item.name ?? '', 'reusable', ns.fqn, undefined);
            items.push({ kind: 'enum', fqn });
            break;
        }
      }

      const datasource = this.inheritedDatasource(ns.fqn);
      namespaces.push({
        fqn: ns.fqn,
        path: ns.path,
        items,
        ...(datasource !== undefined && { datasource }),
        annotations: ns.annotations,
      });
    }

    return {
      namespaces,
      tables,
      embeds: Object.fromEntries(this.embedOrder.map(fqn => [fqn, this.lookup(this.embeds, fqn)])),
      enums: Object.fromEntries(this.enumOrder.map(fqn => [fqn, this.lookup(this.enums, fqn)])),
      relationships: graph.relationships,
      manyToMany: graph.manyToMany,
    };
  }

  private lookup<T>(map: Map<string, T>, fqn: string): T {
    const value = map.get(fqn);
    if (value === undefined) throw new Error(`Internal error: '${fqn}' was never converted`);
    return value;
  }

  private handleOf(fqn: string): TableHandle {
    const handle = this.handles.get(fqn);
    if (handle === undefined) throw new Error(`Internal error: no table handle for '${fqn}'`);
    return handle;
  }

  // ---- Relationships ----

  private collectForeignKeys(): ForeignKeyRef[] {
    const refs: ForeignKeyRef[] = [];
    for (const entry of this.entries) {
      const scope: Scope = { namespace: entry.namespace, owners: [entry.fqn] };
      for (const field of entry.def.fields) {
        const fk = firstOfKind(field.constraints, 'foreign_key');
        if (!fk) continue;
        const target = this.symbols.resolve(fk.target.slice(0, -1), scope);
        if (!target || target.kind !== 'table') {
          throw new Error(`Internal error: unresolved foreign key on '${entry.fqn}.${field.name}'`);
        }
        const targetHandle = this.handleOf(target.fqn);
        this.foreignKeys.set(`${entry.handle}.${field.name}`, { id: refs.length, target: targetHandle });
        refs.push({
          source: entry.handle,
          sourceName: entry.def.name,
          field: field.name,
          cardinality: field.cardinality,
          keyLike: field.constraints.some(c => c.kind === 'primary_key' || c.kind === 'unique'),
          target: targetHandle,
          targetField: fk.target[fk.target.length - 1],
          ...(fk.alias !== undefined && { alias: fk.alias }),
        });
      }
    }
    return refs;
  }

  // ---- Tables ----

  private convertTable(entry: TableEntry, graph: RelationshipGraph): IrTable {
    const { def, fqn, handle } = entry;
    const scope: Scope = { namespace: entry.namespace, owners: [fqn] };
    const nested = this.convertNested(def.nested, fqn, entry.namespace, scope);
    const fields = def.fields.map(f => this.convertField(f, fqn, entry.namespace, scope, handle));

    const fieldNames = new Set(def.fields.map(f => f.name));
    const effects: AnnotationEffect[] = [];
    for (const a of def.annotations) {
      const { effect } = interpretAnnotation(a, { site: 'table', fields: fieldNames });
      if (effect) effects.push(effect);
    }

    const own = effects.find(e => e.kind === 'datasource');
    const datasource = own?.kind === 'datasource' ? own.name : this.inheritedDatasource(entry.namespace);

    return {
      handle,
      fqn,
      name: def.name,
      namespace: entry.namespace,
      fields,
      primaryKey: fields.filter(f => f.primaryKey).map(f => f.name),
      indexes: buildIndexes(fields, effects),
      nested,
      effects,
      annotations: def.annotations,
      ...(datasource !== undefined && { datasource }),
      isJunction: graph.junctions.has(handle),
      outgoing: graph.relationships.filter(r => r.source === handle).map(r => r.id),
      incoming: graph.relationships.filter(r => r.target === handle).map(r => r.id),
      ...(def.doc !== undefined && { doc: def.doc }),
      loc: def.loc,
    };
  }

  private inheritedDatasource(namespace: string): string | undefined {
    for (const fqn of namespaceChain(namespace)) {
      for (const a of this.symbols.namespace(fqn)?.annotations ?? []) {
        const { effect } = interpretAnnotation(a, { site: 'namespace', fields: new Set() });
        if (effect?.kind === 'datasource') return effect.name;
      }
    }
    return undefined;
  }

  // ---- Embeds and enums ----

  private convertNested(nested: readonly NestedDef[], owner: string, namespace: string, scope: Scope): string[] {
    return nested.map(def => {
      const name = def.name ?? '';
      const fqn = joinFqn(owner, name);
      if (def.kind === 'embed') {
        this.convertEmbed(def, fqn, name, 'nested', namespace, owner, scope);
      } else {
        this.convertEnum(def, fqn, name, 'nested', namespace, owner);
      }
      return fqn;
    });
  }

  private convertEmbed(
    def: EmbedDef,
    fqn: string,
    name: string,
    classification: EmbedClassification,
    namespace: string,
    owner: string | undefined,
    outer: Scope,
  ): void {
    this.embedOrder.push(fqn);
    const scope: Scope = classification === 'reusable'
      ? outer
      : { namespace, owners: [...outer.owners, fqn] };
    const nested = this.convertNested(def.nested, fqn, namespace, scope);
    const fields = def.fields.map(f => this.convertField(f, fqn, namespace, scope, undefined));

    this.embeds.set(fqn, {
      fqn,
      name,
      classification,
      namespace,
      ...(owner !== undefined && { owner }),
      fields,
      nested,
      annotations: def.annotations,
      ...(def.doc !== undefined && { doc: def.doc }),
    });
  }

  private convertEnum(
    def: EnumDef,
    fqn: string,
    name: string,
    classification: EmbedClassification,
    namespace: string,
    owner: string | undefined,
  ): void {
    this.enumOrder.push(fqn);
    this.enums.set(fqn, {
      fqn,
      name,
      classification,
      namespace,
      ...(owner !== undefined && { owner }),
      variants: def.variants.map(v => ({
        name: v.name,
        value: v.value,
        ...(v.doc !== undefined && { doc: v.doc }),
      })),
      annotations: def.annotations,
      ...(def.doc !== undefined && { doc: def.doc }),
    });
  }

  // ---- Fields ----

  private convertField(
    field: FieldDef,
    owner: string,
    namespace: string,
    scope: Scope,
    table: TableHandle | undefined,
  ): IrField {
    const type = this.resolveType(field, owner, namespace, scope);

    const constraints: IrConstraint[] = [];
    const seen = new Set<string>();
    for (const c of field.constraints) {
      if (seen.has(c.kind)) continue;
      seen.add(c.kind);
      constraints.push(this.convertConstraint(c, field, table));
    }

    const dflt = firstOfKind(field.constraints, 'default');
    return {
      name: field.name,
      type,
      constraints,
      primaryKey: seen.has('primary_key'),
      unique: seen.has('unique'),
      autoIncrement: seen.has('auto_increment'),
      ...(dflt !== undefined && { default: dflt.value }),
      annotations: field.annotations,
      ...(field.doc !== undefined && { doc: field.doc }),
    };
  }

  private convertConstraint(c: Constraint, field: FieldDef, table: TableHandle | undefined): IrConstraint {
    switch (c.kind) {
      case 'primary_key':
        return { kind: 'primary_key' };
      case 'unique':
        return { kind: 'unique' };
      case 'index':
        return { kind: 'index' };
      case 'auto_increment':
        return { kind: 'auto_increment' };
      case 'max_length':
        return { kind: 'max_length', length: c.length };
      case 'default':
        return { kind: 'default', value: c.value };
      case 'range':
        return { kind: 'range', min: numericValue(c.min), max: numericValue(c.max) };
      case 'regex':
        return { kind: 'regex', pattern: c.pattern };
      case 'foreign_key': {
        const fk = table === undefined ? undefined : this.foreignKeys.get(`${table}.${field.name}`);
        if (!fk) throw new Error(`Internal error: foreign key on '${field.name}' outside a table`);
        return {
          kind: 'foreign_key',
          table: fk.target,
          field: c.target[c.target.length - 1],
          relationship: fk.id,
        };
      }
    }
  }

  private resolveType(field: FieldDef, owner: string, namespace: string, scope: Scope): IrTypeRef {
    const t = field.type;
    let base: IrTypeBase;
    let display: string;

    switch (t.kind) {
      case 'primitive':
        base = { kind: 'primitive', name: t.name };
        display = t.name;
        break;
      case 'ref': {
        const sym = this.symbols.resolve(t.path, scope);
        if (!sym) throw new Error(`Internal error: unresolved type '${t.path.join('.')}'`);
        base = sym.kind === 'table'
          ? { kind: 'table', handle: this.handleOf(sym.fqn) }
          : sym.kind === 'embed' ? { kind: 'embed', fqn: sym.fqn } : { kind: 'enum', fqn: sym.fqn };
        display = sym.fqn;
        break;
      }
      case 'inline_embed': {
        const fqn = inlineFqn(owner, field.name);
        display = pascalCase(field.name);
        this.convertEmbed(t.embed, fqn, display, 'inline', namespace, owner, scope);
        base = { kind: 'embed', fqn };
        break;
      }
      case 'inline_enum': {
        const fqn = inlineFqn(owner, field.name);
        display = pascalCase(field.name);
        this.convertEnum(t.enum, fqn, display, 'inline', namespace, owner);
        base = { kind: 'enum', fqn };
        break;
      }
    }

    const suffix = field.cardinality === 'optional' ? '?' : field.cardinality === 'array' ? '[]' : '';
    return { base, cardinality: field.cardinality, display: `${display}${suffix}` };
  }
}

// ---- Indexes ----

function buildIndexes(fields: readonly IrField[], effects: readonly AnnotationEffect[]): IrIndex[] {
  const indexes: IrIndex[] = [];
  const seen = new Set<string>();
  const add = (names: string[], unique: boolean, source: IndexSource) => {
    const key = names.join(',');
    if (names.length === 0 || seen.has(key)) return;
    seen.add(key);
    indexes.push({ name: indexName(names), fields: names, unique, source });
  };

  add(fields.filter(f => f.primaryKey).map(f => f.name), true, 'primary_key');
  for (const f of fields) {
    if (f.unique) add([f.name], true, 'unique');
    else if (f.constraints.some(c => c.kind === 'index')) add([f.name], false, 'index');
    else if (f.constraints.some(c => c.kind === 'foreign_key')) add([f.name], false, 'foreign_key');
  }
  for (const e of effects) {
    if (e.kind === 'index') add([...e.fields], e.unique, 'annotation');
  }
  return indexes;
}
