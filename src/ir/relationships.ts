/**
 * Relationship inference — turns one-sided `foreign_key` declarations into
 * forward edges, reverse navigation edges and junction-table many-to-many pairs.
 */

import type { Cardinality } from '../ast/types.js';
import { defaultReverseName } from './names.js';
import type {
  ForwardCardinality,
  IrManyToMany,
  IrRelationship,
  ReverseCardinality,
  TableHandle,
} from './types.js';

/** One `foreign_key` constraint, already resolved to table handles. */
export interface ForeignKeyRef {
  source: TableHandle;
  /** Declared name of the source table. */
  sourceName: string;
  field: string;
  cardinality: Cardinality;
  /** Source field carries primary_key or unique. */
  keyLike: boolean;
  target: TableHandle;
  targetField: string;
  alias?: string;
}

export interface RelationshipGraph {
  /** Indexed by relationship id, in the order of `refs`. */
  relationships: IrRelationship[];
  manyToMany: IrManyToMany[];
  junctions: ReadonlySet<TableHandle>;
}

export function forwardCardinality(c: Cardinality): ForwardCardinality {
  switch (c) {
    case 'scalar': return '1';
    case 'optional': return '0..1';
    case 'array': return '*';
  }
}

/**
 * A junction is a table with exactly two foreign-key fields, both scalar,
 * referencing two different tables.
 */
export function detectJunctions(refs: readonly ForeignKeyRef[]): Map<TableHandle, [number, number]> {
  const bySource = new Map<TableHandle, number[]>();
  refs.forEach((ref, id) => {
    const list = bySource.get(ref.source);
    if (list) list.push(id);
    else bySource.set(ref.source, [id]);
  });

  const junctions = new Map<TableHandle, [number, number]>();
  for (const [source, ids] of bySource) {
    if (ids.length !== 2) continue;
    const [a, b] = ids;
    const left = refs[a];
    const right = refs[b];
    if (left.cardinality === 'scalar' && right.cardinality === 'scalar' && left.target !== right.target) {
      junctions.set(source, [a, b]);
    }
  }
  return junctions;
}

/**
 * Reverse names per target table: the explicit `as` name when given, otherwise
 * the pluralized source table name, suffixed with `_by_<field>` when that
 * default collides with another name on the same target.
 */
function reverseNames(refs: readonly ForeignKeyRef[]): string[] {
  const counts = new Map<string, number>();
  const key = (target: TableHandle, name: string) => `${target}\0${name}`;
  const proposed = refs.map(ref => ref.alias ?? defaultReverseName(ref.sourceName));
  proposed.forEach((name, i) => {
    const k = key(refs[i].target, name);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  });

  return refs.map((ref, i) => {
    const name = proposed[i];
    if (ref.alias !== undefined) return name;
    return (counts.get(key(ref.target, name)) ?? 0) > 1 ? `${name}_by_${ref.field}` : name;
  });
}

export function inferRelationships(refs: readonly ForeignKeyRef[]): RelationshipGraph {
  const junctionPairs = detectJunctions(refs);
  const names = reverseNames(refs);

  const relationships = refs.map((ref, id): IrRelationship => {
    const single = ref.cardinality !== 'array' && ref.keyLike && !junctionPairs.has(ref.source);
    const reverse: ReverseCardinality = single ? '1' : '*';
    return {
      id,
      source: ref.source,
      field: ref.field,
      target: ref.target,
      targetField: ref.targetField,
      cardinality: forwardCardinality(ref.cardinality),
      reverse: { name: names[id], cardinality: reverse, explicit: ref.alias !== undefined },
    };
  });

  const manyToMany: IrManyToMany[] = [];
  for (const [junction, [a, b]] of junctionPairs) {
    manyToMany.push({
      junction,
      left: { table: refs[a].target, via: refs[a].field, relationship: a },
      right: { table: refs[b].target, via: refs[b].field, relationship: b },
    });
  }

  return { relationships, manyToMany, junctions: new Set(junctionPairs.keys()) };
}
