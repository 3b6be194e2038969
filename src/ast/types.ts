/**
 * Schema Abstract Syntax Tree type definitions
 */

// ---- Locations ----

export interface SourceLocation {
  file: string;
  line: number;
  col: number;
}

// ---- Literals ----

export type Literal =
  | { kind: 'string'; value: string }
  /** `bigint` when the literal lies outside the safe integer range. */
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'identifier'; value: string };

// ---- Types ----

export type PrimitiveType =
  | 'string' | 'bool' | 'bytes' | 'timestamp'
  | 'i8' | 'i16' | 'i32' | 'i64'
  | 'u8' | 'u16' | 'u32' | 'u64'
  | 'f32' | 'f64';

export type Cardinality = 'scalar' | 'optional' | 'array';

export type TypeExpr =
  | { kind: 'primitive'; name: PrimitiveType }
  | { kind: 'ref'; path: string[] }
  | { kind: 'inline_embed'; embed: EmbedDef }
  | { kind: 'inline_enum'; enum: EnumDef };

// ---- Constraints ----

type Located<T> = T & { loc: SourceLocation };

export type Constraint = Located<
  | { kind: 'primary_key' }
  | { kind: 'unique' }
  | { kind: 'index' }
  | { kind: 'auto_increment' }
  | { kind: 'max_length'; length: number }
  | { kind: 'default'; value: Literal }
  | { kind: 'range'; min: Literal; max: Literal }
  | { kind: 'regex'; pattern: string }
  | { kind: 'foreign_key'; target: string[]; alias?: string }
>;

export type ConstraintKind = Constraint['kind'];

// ---- Annotations ----

export interface AnnotationArg {
  /** Undefined for positional arguments. */
  key?: string;
  value: Literal;
}

export interface Annotation {
  name: string;
  args: AnnotationArg[];
  loc: SourceLocation;
}

// ---- Definitions ----

export interface FieldDef {
  name: string;
  type: TypeExpr;
  cardinality: Cardinality;
  constraints: Constraint[];
  annotations: Annotation[];
  doc?: string;
  loc: SourceLocation;
}

export interface EnumVariant {
  name: string;
  /** Explicit value if written, otherwise previous + 1 starting at 0. */
  value: number;
  explicit: boolean;
  doc?: string;
  loc: SourceLocation;
}

export interface EnumDef {
  kind: 'enum';
  /** Undefined for an inline `enum { ... }` field type. */
  name?: string;
  variants: EnumVariant[];
  annotations: Annotation[];
  doc?: string;
  loc: SourceLocation;
}

export type NestedDef = EnumDef | EmbedDef;

export interface EmbedDef {
  kind: 'embed';
  /** Undefined for an inline `embed { ... }` field type. */
  name?: string;
  fields: FieldDef[];
  nested: NestedDef[];
  annotations: Annotation[];
  doc?: string;
  loc: SourceLocation;
}

export interface TableDef {
  kind: 'table';
  name: string;
  fields: FieldDef[];
  nested: NestedDef[];
  annotations: Annotation[];
  doc?: string;
  loc: SourceLocation;
}

export interface NamespaceImport {
  path: string[];
  /** `import a.b.*;` */
  wildcard: boolean;
  loc: SourceLocation;
}

export interface NamespaceDef {
  kind: 'namespace';
  path: string[];
  imports: NamespaceImport[];
  definitions: Definition[];
  annotations: Annotation[];
  doc?: string;
  loc: SourceLocation;
}

export type Definition = NamespaceDef | TableDef | EnumDef | EmbedDef;

/** A namespace-level type definition. */
export type TypeDefinition = TableDef | EnumDef | EmbedDef;

export interface FileImport {
  path: string;
  loc: SourceLocation;
}

export interface FileAst {
  path: string;
  imports: FileImport[];
  definitions: Definition[];
}

// ---- Merged AST ----

export interface MergedNamespace {
  fqn: string;
  path: string[];
  imports: NamespaceImport[];
  annotations: Annotation[];
  /** Members of every same-FQN namespace, in file-visitation then declaration order. */
  items: TypeDefinition[];
  locations: SourceLocation[];
}

export interface MergedAst {
  /** Files in visitation order. */
  files: string[];
  /** Namespaces in first-seen order; the root namespace has fqn ''. */
  namespaces: MergedNamespace[];
}
