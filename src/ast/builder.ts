/**
 * AST Builder
 *
 * Walks the generic parse tree and produces typed definitions. Pure and
 * order-preserving: the same tree always yields the same FileAst.
 */

import type { ParseNode, ParseTree } from '../parser/types.js';
import type {
  Annotation,
  AnnotationArg,
  Cardinality,
  Constraint,
  Definition,
  EmbedDef,
  EnumDef,
  EnumVariant,
  FieldDef,
  FileAst,
  FileImport,
  Literal,
  NamespaceDef,
  NamespaceImport,
  NestedDef,
  PrimitiveType,
  SourceLocation,
  TableDef,
  TypeExpr,
} from './types.js';

export class AstBuildError extends Error {
  readonly line: number;
  readonly col: number;

  constructor(message: string, at: ParseNode) {
    super(`[AST Build Error] Line ${at.line}:${at.col}: ${message}`);
    this.name = 'AstBuildError';
    this.line = at.line;
    this.col = at.col;
  }
}

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveType>([
  'string', 'bool', 'bytes', 'timestamp',
  'i8', 'i16', 'i32', 'i64',
  'u8', 'u16', 'u32', 'u64',
  'f32', 'f64',
]);

function isPrimitive(name: string): name is PrimitiveType {
  return PRIMITIVES.has(name);
}

export function buildAst(tree: ParseTree, file: string): FileAst {
  const b = new Builder(file);
  const imports: FileImport[] = [];
  const definitions: Definition[] = [];

  for (const child of tree.children) {
    if (child.rule === 'file_import') {
      imports.push({ path: b.value(child), loc: b.loc(child) });
    } else {
      definitions.push(b.definition(child, imports));
    }
  }

  return { path: file, imports, definitions };
}

interface Metadata {
  annotations: Annotation[];
  doc?: string;
}

class Builder {
  constructor(private readonly file: string) {}

  loc(n: ParseNode): SourceLocation {
    return { file: this.file, line: n.line, col: n.col };
  }

  value(n: ParseNode): string {
    if (n.value === undefined) {
      throw new AstBuildError(`Missing value for '${n.rule}'`, n);
    }
    return n.value;
  }

  private name(n: ParseNode): string {
    const nameNode = n.children.find(c => c.rule === 'name');
    if (!nameNode) throw new AstBuildError(`Missing name for '${n.rule}'`, n);
    return this.value(nameNode);
  }

  private metadata(n: ParseNode): Metadata {
    const annotations: Annotation[] = [];
    const docs: string[] = [];
    for (const c of n.children) {
      if (c.rule === 'annotation') annotations.push(this.annotation(c));
      else if (c.rule === 'doc_comment') docs.push(this.value(c));
    }
    const meta: Metadata = { annotations };
    if (docs.length > 0) meta.doc = docs.join('\n');
    return meta;
  }

  // ---- Definitions ----

  definition(n: ParseNode, fileImports: FileImport[]): Definition {
    switch (n.rule) {
      case 'namespace': return this.namespace(n, fileImports);
      case 'table': return this.table(n);
      case 'embed': return this.embed(n, this.name(n));
      case 'enum': return this.enumDef(n, this.name(n));
      default:
        throw new AstBuildError(`Unexpected rule '${n.rule}', expected a definition`, n);
    }
  }

  private namespace(n: ParseNode, fileImports: FileImport[]): NamespaceDef {
    const pathNode = n.children.find(c => c.rule === 'path');
    if (!pathNode) throw new AstBuildError('Missing namespace path', n);

    const imports: NamespaceImport[] = [];
    const definitions: Definition[] = [];
    for (const c of n.children) {
      switch (c.rule) {
        case 'path':
        case 'annotation':
        case 'doc_comment':
          break;
        case 'namespace_import':
          imports.push(this.namespaceImport(c));
          break;
        case 'file_import':
          fileImports.push({ path: this.value(c), loc: this.loc(c) });
          break;
        default:
          definitions.push(this.definition(c, fileImports));
      }
    }

    return {
      kind: 'namespace',
      path: this.path(pathNode),
      imports,
      definitions,
      ...this.metadata(n),
      loc: this.loc(n),
    };
  }

  private namespaceImport(n: ParseNode): NamespaceImport {
    const pathNode = n.children[0];
    if (!pathNode || pathNode.rule !== 'path') throw new AstBuildError('Missing import path', n);
    return {
      path: this.path(pathNode),
      wildcard: n.children.some(c => c.rule === 'wildcard'),
      loc: this.loc(n),
    };
  }

  private path(n: ParseNode): string[] {
    return n.children.map(seg => this.value(seg));
  }

  private table(n: ParseNode): TableDef {
    const { fields, nested } = this.members(n);
    return {
      kind: 'table',
      name: this.name(n),
      fields,
      nested,
      ...this.metadata(n),
      loc: this.loc(n),
    };
  }

  private embed(n: ParseNode, name: string | undefined): EmbedDef {
    const { fields, nested } = this.members(n);
    const def: EmbedDef = {
      kind: 'embed',
      fields,
      nested,
      ...this.metadata(n),
      loc: this.loc(n),
    };
    if (name !== undefined) def.name = name;
    return def;
  }

  private members(n: ParseNode): { fields: FieldDef[]; nested: NestedDef[] } {
    const fields: FieldDef[] = [];
    const nested: NestedDef[] = [];
    for (const c of n.children) {
      switch (c.rule) {
        case 'field':
          fields.push(this.field(c));
          break;
        case 'embed':
          nested.push(this.embed(c, this.name(c)));
          break;
        case 'enum':
          nested.push(this.enumDef(c, this.name(c)));
          break;
      }
    }
    return { fields, nested };
  }

  // ---- Enums ----

  private enumDef(n: ParseNode, name: string | undefined): EnumDef {
    const variants: EnumVariant[] = [];
    let next = 0;
    for (const c of n.children) {
      if (c.rule !== 'variant') continue;
      const valueNode = c.children.find(v => v.rule === 'integer');
      const value = valueNode ? Number(this.value(valueNode)) : next;
      next = value + 1;
      const variant: EnumVariant = {
        name: this.name(c),
        value,
        explicit: valueNode !== undefined,
        loc: this.loc(c),
      };
      const doc = this.metadata(c).doc;
      if (doc !== undefined) variant.doc = doc;
      variants.push(variant);
    }

    const def: EnumDef = { kind: 'enum', variants, ...this.metadata(n), loc: this.loc(n) };
    if (name !== undefined) def.name = name;
    return def;
  }

  // ---- Fields ----

  private field(n: ParseNode): FieldDef {
    const typeNode = n.children.find(c => c.rule === 'field_type');
    if (!typeNode) throw new AstBuildError('Missing field type', n);

    const { type, cardinality } = this.fieldType(typeNode);
    const constraints = n.children
      .filter(c => c.rule === 'constraint')
      .map(c => this.constraint(c));

    return {
      name: this.name(n),
      type,
      cardinality,
      constraints,
      ...this.metadata(n),
      loc: this.loc(n),
    };
  }

  private fieldType(n: ParseNode): { type: TypeExpr; cardinality: Cardinality } {
    const [base, card] = n.children;
    if (!base) throw new AstBuildError('Missing base type', n);

    let type: TypeExpr;
    switch (base.rule) {
      case 'primitive': {
        const name = this.value(base);
        if (!isPrimitive(name)) throw new AstBuildError(`Unknown primitive type '${name}'`, base);
        type = { kind: 'primitive', name };
        break;
      }
      case 'path':
        type = { kind: 'ref', path: this.path(base) };
        break;
      case 'inline_embed':
        type = { kind: 'inline_embed', embed: this.embed(base, undefined) };
        break;
      case 'inline_enum':
        type = { kind: 'inline_enum', enum: this.enumDef(base, undefined) };
        break;
      default:
        throw new AstBuildError(`Unexpected rule '${base.rule}', expected a type`, base);
    }

    let cardinality: Cardinality = 'scalar';
    if (card) cardinality = card.value === '?' ? 'optional' : 'array';
    return { type, cardinality };
  }

  private constraint(n: ParseNode): Constraint {
    const loc = this.loc(n);
    const name = this.value(n);
    const args = n.children;

    switch (name) {
      case 'primary_key':
      case 'unique':
      case 'index':
      case 'auto_increment':
        return { kind: name, loc };
      case 'max_length':
        return { kind: 'max_length', length: Number(this.value(this.arg(n, 0))), loc };
      case 'default':
        return { kind: 'default', value: this.literal(this.arg(n, 0)), loc };
      case 'range':
        return { kind: 'range', min: this.literal(this.arg(n, 0)), max: this.literal(this.arg(n, 1)), loc };
      case 'regex':
        return { kind: 'regex', pattern: this.value(this.arg(n, 0)), loc };
      case 'foreign_key': {
        const pathNode = args.find(c => c.rule === 'path');
        if (!pathNode) throw new AstBuildError('Missing foreign key target', n);
        const aliasNode = args.find(c => c.rule === 'alias');
        const fk: Constraint = { kind: 'foreign_key', target: this.path(pathNode), loc };
        if (aliasNode) fk.alias = this.value(aliasNode);
        return fk;
      }
      default:
        throw new AstBuildError(`Unknown constraint '${name}'`, n);
    }
  }

  private arg(n: ParseNode, index: number): ParseNode {
    const a = n.children[index];
    if (!a) throw new AstBuildError(`Missing argument ${index + 1} for '${n.value ?? n.rule}'`, n);
    return a;
  }

  // ---- Annotations and literals ----

  private annotation(n: ParseNode): Annotation {
    const args: AnnotationArg[] = n.children.map(argNode => {
      const [first, second] = argNode.children;
      if (!first) throw new AstBuildError('Empty annotation argument', argNode);
      if (second) return { key: this.value(first), value: this.literal(second) };
      return { value: this.literal(first) };
    });
    return { name: this.value(n), args, loc: this.loc(n) };
  }

  private literal(n: ParseNode): Literal {
    const text = this.value(n);
    switch (n.rule) {
      case 'string': return { kind: 'string', value: text };
      case 'integer': return { kind: 'integer', value: integerValue(text) };
      case 'float': return { kind: 'float', value: Number(text) };
      case 'boolean': return { kind: 'boolean', value: text === 'true' };
      case 'identifier': return { kind: 'identifier', value: text };
      default:
        throw new AstBuildError(`Unexpected rule '${n.rule}', expected a literal`, n);
    }
  }
}

function integerValue(text: string): number | bigint {
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : BigInt(text);
}
