import type { Ir, IrTable } from './types.js';

export { buildIr, IrBuildError, type IrBuildOptions } from './builder.js';
export { defaultReverseName, pascalCase, pluralize, snakeCase } from './names.js';
export type * from './types.js';

/**
 * Find a table by FQN, or by declared name when exactly one table carries it.
 */
export function findTable(ir: Ir, name: string): IrTable | undefined {
  const exact = ir.tables.find(t => t.fqn === name);
  if (exact) return exact;
  const byName = ir.tables.filter(t => t.name === name);
  return byName.length === 1 ? byName[0] : undefined;
}

export function tableAt(ir: Ir, handle: number): IrTable {
  const table = ir.tables[handle];
  if (!table) throw new Error(`No table with handle ${handle}`);
  return table;
}
