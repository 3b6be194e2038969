/**
 * Intermediate Representation — the fully resolved model every generator
 * consumes. Tables live in an arena indexed by `TableHandle`; relationship
 * edges reference tables by handle, never by object.
 *
 * An Ir is deep-frozen once built. Rebuild it to reflect schema changes.
 */

import type { Annotation, Cardinality, Literal, PrimitiveType, SourceLocation } from '../ast/types.js';
import type { AnnotationEffect } from '../semantic/annotations.js';
import type { EmbedClassification } from '../semantic/scope.js';

export type { EmbedClassification } from '../semantic/scope.js';

export type TableHandle = number;

// ---- Types ----

export type IrTypeBase =
  | { readonly kind: 'primitive'; readonly name: PrimitiveType }
  | { readonly kind: 'enum'; readonly fqn: string }
  | { readonly kind: 'embed'; readonly fqn: string }
  | { readonly kind: 'table'; readonly handle: TableHandle };

export interface IrTypeRef {
  readonly base: IrTypeBase;
  readonly cardinality: Cardinality;
  /** Human-readable type, e.g. `u32?`, `game.Item[]`, `DropItems[]`. */
  readonly display: string;
}

// ---- Fields ----

export type IrConstraint =
  | { readonly kind: 'primary_key' }
  | { readonly kind: 'unique' }
  | { readonly kind: 'index' }
  | { readonly kind: 'auto_increment' }
  | { readonly kind: 'max_length'; readonly length: number }
  | { readonly kind: 'default'; readonly value: Literal }
  | { readonly kind: 'range'; readonly min: number | bigint; readonly max: number | bigint }
  | { readonly kind: 'regex'; readonly pattern: string }
  | { readonly kind: 'foreign_key'; readonly table: TableHandle; readonly field: string; readonly relationship: number };

export interface IrField {
  readonly name: string;
  readonly type: IrTypeRef;
  readonly constraints: readonly IrConstraint[];
  readonly primaryKey: boolean;
  readonly unique: boolean;
  readonly autoIncrement: boolean;
  readonly default?: Literal;
  readonly annotations: readonly Annotation[];
  readonly doc?: string;
}

// ---- Definitions ----

export interface IrEmbed {
  readonly fqn: string;
  /** Declared name, or PascalCase(field) for inline embeds. */
  readonly name: string;
  readonly classification: EmbedClassification;
  readonly namespace: string;
  /** FQN of the enclosing table or embed; absent for reusable embeds. */
  readonly owner?: string;
  readonly fields: readonly IrField[];
  /** FQNs of types declared inside this embed, in declaration order. */
  readonly nested: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly doc?: string;
}

export interface IrEnumVariant {
  readonly name: string;
  readonly value: number;
  readonly doc?: string;
}

export interface IrEnum {
  readonly fqn: string;
  readonly name: string;
  readonly classification: EmbedClassification;
  readonly namespace: string;
  readonly owner?: string;
  readonly variants: readonly IrEnumVariant[];
  readonly annotations: readonly Annotation[];
  readonly doc?: string;
}

export type IndexSource = 'primary_key' | 'unique' | 'index' | 'foreign_key' | 'annotation';

export interface IrIndex {
  readonly name: string;
  readonly fields: readonly string[];
  readonly unique: boolean;
  readonly source: IndexSource;
}

export interface IrTable {
  readonly handle: TableHandle;
  readonly fqn: string;
  readonly name: string;
  readonly namespace: string;
  readonly fields: readonly IrField[];
  /** Primary key field names in declaration order. */
  readonly primaryKey: readonly string[];
  readonly indexes: readonly IrIndex[];
  /** FQNs of types declared inside this table, in declaration order. */
  readonly nested: readonly string[];
  readonly effects: readonly AnnotationEffect[];
  readonly annotations: readonly Annotation[];
  /** Own `@datasource`, otherwise the nearest enclosing namespace's. */
  readonly datasource?: string;
  readonly isJunction: boolean;
  /** Relationship ids where this table is the source. */
  readonly outgoing: readonly number[];
  /** Relationship ids where this table is the target. */
  readonly incoming: readonly number[];
  readonly doc?: string;
  readonly loc: SourceLocation;
}

// ---- Relationships ----

export type ForwardCardinality = '1' | '0..1' | '*';
export type ReverseCardinality = '1' | '*';

export interface IrReverseEdge {
  readonly name: string;
  readonly cardinality: ReverseCardinality;
  /** True when the name came from `as`. */
  readonly explicit: boolean;
}

export interface IrRelationship {
  readonly id: number;
  readonly source: TableHandle;
  readonly field: string;
  readonly target: TableHandle;
  readonly targetField: string;
  readonly cardinality: ForwardCardinality;
  readonly reverse: IrReverseEdge;
}

export interface IrManyToManySide {
  readonly table: TableHandle;
  /** Junction field referencing `table`. */
  readonly via: string;
  readonly relationship: number;
}

export interface IrManyToMany {
  readonly junction: TableHandle;
  readonly left: IrManyToManySide;
  readonly right: IrManyToManySide;
}

// ---- Namespaces ----

export type IrItemRef =
  | { readonly kind: 'table'; readonly handle: TableHandle }
  | { readonly kind: 'embed'; readonly fqn: string }
  | { readonly kind: 'enum'; readonly fqn: string };

export interface IrNamespace {
  readonly fqn: string;
  readonly path: readonly string[];
  /** Namespace-level items in declaration order. */
  readonly items: readonly IrItemRef[];
  readonly datasource?: string;
  readonly annotations: readonly Annotation[];
}

export interface Ir {
  readonly namespaces: readonly IrNamespace[];
  readonly tables: readonly IrTable[];
  readonly embeds: Readonly<Record<string, IrEmbed>>;
  readonly enums: Readonly<Record<string, IrEnum>>;
  readonly relationships: readonly IrRelationship[];
  readonly manyToMany: readonly IrManyToMany[];
}
