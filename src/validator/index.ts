/**
 * Schema Validator
 *
 * Checks referential and structural integrity of the merged AST. Never stops
 * at the first problem: a single run reports every diagnostic it can find.
 * Warnings never block later stages; any error does.
 */

import type {
  Constraint,
  EnumDef,
  FieldDef,
  MergedAst,
  NestedDef,
  PrimitiveType,
  SourceLocation,
  TableDef,
} from '../ast/types.js';
import { createDiagnostic, type Diagnostic, type DiagnosticKind } from '../diagnostics.js';
import { formatLocation } from '../resolver/merge.js';
import { interpretAnnotation } from '../semantic/annotations.js';
import { literalFits, literalToString, isInteger, isNumeric } from '../semantic/primitives.js';
import { SymbolTable, inlineFqn, joinFqn, type Scope } from '../semantic/scope.js';

export interface ValidateOptions {
  /** Allow several `primary_key` fields on one table. */
  compositePrimaryKeys?: boolean;
}

type FieldTypeInfo =
  | { kind: 'primitive'; name: PrimitiveType }
  | { kind: 'enum'; def: EnumDef }
  | { kind: 'embed' }
  | { kind: 'table' }
  | { kind: 'unknown' };

type MemberSite = 'table' | 'embed';

export function validate(ast: MergedAst, options: ValidateOptions = {}): Diagnostic[] {
  return new Validator(ast, options).run();
}

class Validator {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly symbols: SymbolTable;
  /** target table FQN → explicit reverse relation name → first use */
  private readonly reverseNames = new Map<string, Map<string, SourceLocation>>();

  constructor(private readonly ast: MergedAst, private readonly options: ValidateOptions) {
    this.symbols = new SymbolTable(ast);
  }

  run(): Diagnostic[] {
    for (const ns of this.ast.namespaces) {
      for (const a of ns.annotations) {
        this.diagnostics.push(...interpretAnnotation(a, { site: 'namespace', fields: new Set() }).diagnostics);
      }

      for (const item of ns.items) {
        const fqn = joinFqn(ns.fqn, item.name ?? '');
        const scope: Scope = { namespace: ns.fqn, owners: [fqn] };
        switch (item.kind) {
          case 'table':
            this.checkTable(item, fqn, scope);
            break;
          case 'embed':
            this.checkMembers(item, fqn, scope, 'embed');
            break;
          case 'enum':
            this.checkEnum(item);
            break;
        }
      }
    }
    return this.diagnostics;
  }

  // ---- Reporting ----

  private report(kind: DiagnosticKind, message: string, loc: SourceLocation, hint?: string, related?: SourceLocation & { message: string }): void {
    this.diagnostics.push(createDiagnostic(kind, message, loc, {
      ...(hint !== undefined && { fix: { description: hint } }),
      ...(related !== undefined && { related: [related] }),
    }));
  }

  private mismatch(c: Constraint, message: string, hint: string): void {
    this.report('ConstraintTypeMismatchError', message, c.loc, hint);
  }

  private duplicate(what: string, name: string, loc: SourceLocation, first: SourceLocation): void {
    this.report(
      'DuplicateDefinitionError',
      `Duplicate ${what} '${name}' (first defined at ${formatLocation(first)})`,
      loc,
      `Rename or remove one of the '${name}' declarations`,
      { ...first, message: `first declaration of '${name}'` },
    );
  }

  // ---- Definitions ----

  private checkTable(def: TableDef, fqn: string, scope: Scope): void {
    this.checkMembers(def, fqn, scope, 'table');

    const keys = def.fields.filter(f => f.constraints.some(c => c.kind === 'primary_key'));
    if (keys.length > 1 && !this.options.compositePrimaryKeys) {
      const names = keys.map(f => `'${f.name}'`).join(', ');
      for (const extra of keys.slice(1)) {
        this.report(
          'InvalidPrimaryKeyError',
          `Table '${fqn}' declares more than one primary_key field (${names})`,
          extra.loc,
          'Keep primary_key on a single field, or enable compositePrimaryKeys',
        );
      }
    }

    const fields = new Set(def.fields.map(f => f.name));
    for (const a of def.annotations) {
      this.diagnostics.push(...interpretAnnotation(a, { site: 'table', fields }).diagnostics);
    }
  }

  private checkMembers(
    def: { fields: FieldDef[]; nested: NestedDef[] },
    ownerFqn: string,
    scope: Scope,
    site: MemberSite,
  ): void {
    const typeNames = new Map<string, SourceLocation>();
    for (const nested of def.nested) {
      const name = nested.name ?? '';
      const first = typeNames.get(name);
      if (first) {
        this.duplicate('nested type', name, nested.loc, first);
        continue;
      }
      typeNames.set(name, nested.loc);

      if (nested.kind === 'embed') {
        const fqn = joinFqn(ownerFqn, name);
        this.checkMembers(nested, fqn, { namespace: scope.namespace, owners: [...scope.owners, fqn] }, 'embed');
      } else {
        this.checkEnum(nested);
      }
    }

    const fieldNames = new Map<string, SourceLocation>();
    for (const field of def.fields) {
      const first = fieldNames.get(field.name);
      if (first) this.duplicate('field', field.name, field.loc, first);
      else fieldNames.set(field.name, field.loc);

      const info = this.fieldType(field, ownerFqn, scope);
      this.checkConstraints(field, info, site, scope);
    }
  }

  private checkEnum(def: EnumDef): void {
    const seen = new Map<string, SourceLocation>();
    for (const v of def.variants) {
      const first = seen.get(v.name);
      if (first) this.duplicate('enum variant', v.name, v.loc, first);
      else seen.set(v.name, v.loc);
    }
  }

  private fieldType(field: FieldDef, ownerFqn: string, scope: Scope): FieldTypeInfo {
    const t = field.type;
    switch (t.kind) {
      case 'primitive':
        return { kind: 'primitive', name: t.name };
      case 'ref': {
        const sym = this.symbols.resolve(t.path, scope);
        if (!sym) {
          this.report(
            'UnresolvedTypeError',
            `Unknown type '${t.path.join('.')}' for field '${field.name}'`,
            field.loc,
            'Declare the type, import its namespace, or use its fully-qualified name',
          );
          return { kind: 'unknown' };
        }
        if (sym.kind === 'enum') return { kind: 'enum', def: sym.def };
        return sym.kind === 'table' ? { kind: 'table' } : { kind: 'embed' };
      }
      case 'inline_embed': {
        const owner = inlineFqn(ownerFqn, field.name);
        this.checkMembers(t.embed, owner, { namespace: scope.namespace, owners: [...scope.owners, owner] }, 'embed');
        return { kind: 'embed' };
      }
      case 'inline_enum':
        this.checkEnum(t.enum);
        return { kind: 'enum', def: t.enum };
    }
  }

  // ---- Constraints ----

  private checkConstraints(field: FieldDef, info: FieldTypeInfo, site: MemberSite, scope: Scope): void {
    const seen = new Set<string>();
    const isKey = field.constraints.some(c => c.kind === 'primary_key');

    for (const c of field.constraints) {
      if (seen.has(c.kind)) {
        this.report('RedundantConstraintWarning', `Constraint '${c.kind}' is repeated on field '${field.name}'`,
          c.loc, 'Remove the repeated constraint');
        continue;
      }
      seen.add(c.kind);

      switch (c.kind) {
        case 'primary_key':
          if (site === 'embed') {
            this.report('InvalidPrimaryKeyError', `primary_key is not allowed on embed field '${field.name}'`,
              c.loc, 'Embeds have no identity; move the key to the owning table');
          } else if (field.cardinality === 'optional') {
            this.report('InvalidPrimaryKeyError', `Primary key field '${field.name}' cannot be optional`,
              c.loc, `Remove '?' from the type of '${field.name}'`);
          }
          this.checkKeyable(c, field, info);
          break;

        case 'unique':
        case 'index':
          this.checkKeyable(c, field, info);
          if (isKey) {
            this.report('RedundantConstraintWarning',
              `'${c.kind}' is redundant on primary key field '${field.name}'`, c.loc,
              `Remove '${c.kind}'; primary keys are already unique and indexed`);
          }
          break;

        case 'auto_increment':
          if (info.kind !== 'primitive' || !isInteger(info.name) || field.cardinality === 'array') {
            this.mismatch(c, `auto_increment requires a scalar integer field, '${field.name}' is ${describe(info, field)}`,
              'Use an integer type such as u32 or i64');
          }
          break;

        case 'max_length':
          if (info.kind !== 'primitive' || (info.name !== 'string' && info.name !== 'bytes')) {
            this.mismatch(c, `max_length requires a string or bytes field, '${field.name}' is ${describe(info, field)}`,
              'Remove max_length or change the field type');
          } else if (c.length < 1) {
            this.mismatch(c, `max_length must be positive, got ${c.length}`, 'Use a length of at least 1');
          }
          break;

        case 'regex':
          if (info.kind !== 'primitive' || info.name !== 'string') {
            this.mismatch(c, `regex requires a string field, '${field.name}' is ${describe(info, field)}`,
              'Remove regex or change the field type to string');
          } else {
            this.checkPattern(c, c.pattern);
          }
          break;

        case 'range':
          this.checkRange(c, field, info);
          break;

        case 'default':
          this.checkDefault(c, field, info);
          break;

        case 'foreign_key':
          this.checkForeignKey(c, field, info, site, scope);
          break;
      }
    }
  }

  private checkKeyable(c: Constraint, field: FieldDef, info: FieldTypeInfo): void {
    if (field.cardinality === 'array' || info.kind === 'embed' || info.kind === 'table') {
      this.mismatch(c, `'${c.kind}' cannot be applied to field '${field.name}', it is ${describe(info, field)}`,
        `Apply '${c.kind}' to a scalar primitive or enum field`);
    }
  }

  private checkPattern(c: Constraint, pattern: string): void {
    try {
      new RegExp(pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.mismatch(c, `Invalid regex pattern: ${reason}`, 'Fix the regular expression');
    }
  }

  private checkRange(c: Extract<Constraint, { kind: 'range' }>, field: FieldDef, info: FieldTypeInfo): void {
    if (info.kind !== 'primitive' || !isNumeric(info.name)) {
      this.mismatch(c, `range requires a numeric field, '${field.name}' is ${describe(info, field)}`,
        'Remove range or change the field type');
      return;
    }
    const { min, max } = c;
    if ((min.kind !== 'integer' && min.kind !== 'float') || (max.kind !== 'integer' && max.kind !== 'float')) {
      this.mismatch(c, `range bounds must be numbers, got ${literalToString(min)} and ${literalToString(max)}`,
        'Write range(<min>, <max>) with numeric bounds');
      return;
    }
    if (isInteger(info.name) && (min.kind === 'float' || max.kind === 'float')) {
      this.mismatch(c, `range bounds on integer field '${field.name}' must be integers`,
        'Use integer bounds or a float field type');
      return;
    }
    if (min.value > max.value) {
      this.mismatch(c, `range lower bound ${min.value} exceeds upper bound ${max.value}`, 'Swap the bounds');
    }
  }

  private checkDefault(c: Extract<Constraint, { kind: 'default' }>, field: FieldDef, info: FieldTypeInfo): void {
    if (field.cardinality === 'array') {
      this.mismatch(c, `default is not allowed on array field '${field.name}'`, 'Remove the default');
      return;
    }
    const lit = c.value;
    switch (info.kind) {
      case 'unknown':
        return;
      case 'embed':
      case 'table':
        this.mismatch(c, `default is not allowed on ${info.kind}-typed field '${field.name}'`, 'Remove the default');
        return;
      case 'enum': {
        const name = lit.kind === 'identifier' || lit.kind === 'string' ? lit.value : undefined;
        if (name === undefined || !info.def.variants.some(v => v.name === name)) {
          this.mismatch(c, `default ${literalToString(lit)} is not a variant of the enum type of '${field.name}'`,
            `Use one of: ${info.def.variants.map(v => v.name).join(', ')}`);
        }
        return;
      }
      case 'primitive':
        if (!literalFits(lit, info.name)) {
          this.mismatch(c, `default ${literalToString(lit)} is not compatible with type '${info.name}' of field '${field.name}'`,
            `Use a ${info.name} literal`);
        }
        return;
    }
  }

  private checkForeignKey(
    c: Extract<Constraint, { kind: 'foreign_key' }>,
    field: FieldDef,
    info: FieldTypeInfo,
    site: MemberSite,
    scope: Scope,
  ): void {
    if (site === 'embed') {
      this.mismatch(c, `foreign_key is only allowed on table fields, '${field.name}' belongs to an embed`,
        'Move the reference to a table field');
      return;
    }

    const written = c.target.join('.');
    if (c.target.length < 2) {
      this.report('UnresolvedForeignKeyError', `foreign_key target '${written}' must name a table field (Table.field)`,
        c.loc, `Write foreign_key(${written}.id)`);
      return;
    }

    const tablePath = c.target.slice(0, -1);
    const fieldName = c.target[c.target.length - 1];
    const sym = this.symbols.resolve(tablePath, scope);
    if (!sym) {
      this.report('UnresolvedForeignKeyError', `foreign_key target table '${tablePath.join('.')}' not found`,
        c.loc, 'Declare the table, import its namespace, or use its fully-qualified name');
      return;
    }
    if (sym.kind !== 'table') {
      this.report('UnresolvedForeignKeyError', `foreign_key target '${sym.fqn}' is ${sym.kind === 'enum' ? 'an enum' : 'an embed'}, not a table`,
        c.loc, 'Reference a table');
      return;
    }
    const target = sym.def.fields.find(f => f.name === fieldName);
    if (!target) {
      this.report('UnresolvedForeignKeyError', `Table '${sym.fqn}' has no field '${fieldName}'`, c.loc,
        `Use one of: ${sym.def.fields.map(f => f.name).join(', ')}`);
      return;
    }
    if (!target.constraints.some(k => k.kind === 'primary_key' || k.kind === 'unique')) {
      this.report('UnresolvedForeignKeyError',
        `foreign_key target '${sym.fqn}.${fieldName}' must be a primary_key or unique field`, c.loc,
        `Add unique to '${sym.fqn}.${fieldName}' or reference its primary key`);
      return;
    }

    if (info.kind !== 'primitive') {
      if (info.kind !== 'unknown') {
        this.mismatch(c, `foreign_key field '${field.name}' must have a primitive type, it is ${describe(info, field)}`,
          `Declare '${field.name}' with the type of '${sym.fqn}.${fieldName}'`);
      }
    } else if (target.type.kind === 'primitive' && target.type.name !== info.name) {
      this.mismatch(c,
        `foreign_key field '${field.name}' has type '${info.name}' but '${sym.fqn}.${fieldName}' is '${target.type.name}'`,
        `Change '${field.name}' to ${target.type.name}`);
    }

    if (c.alias !== undefined) {
      let names = this.reverseNames.get(sym.fqn);
      if (!names) {
        names = new Map();
        this.reverseNames.set(sym.fqn, names);
      }
      const first = names.get(c.alias);
      if (first) this.duplicate(`reverse relation name on table '${sym.fqn}'`, c.alias, c.loc, first);
      else names.set(c.alias, c.loc);
    }
  }
}

function describe(info: FieldTypeInfo, field: FieldDef): string {
  const base = info.kind === 'primitive' ? info.name : info.kind;
  if (field.cardinality === 'array') return `an array of ${base}`;
  if (field.cardinality === 'optional') return `an optional ${base}`;
  return info.kind === 'primitive' ? `'${base}'` : `${info.kind === 'enum' ? 'an' : 'a'} ${base}`;
}
