import type { Ir, IrTable } from '../ir/types.js';
import type { GeneratorTarget } from '../semantic/annotations.js';

export type { GeneratorTarget } from '../semantic/annotations.js';

export interface OutputFile {
  path: string;
  content: string;
}

/** A backend: reads the IR, never mutates it, returns rendered files. */
export interface Generator {
  target: GeneratorTarget;
  generate(ir: Ir): OutputFile[];
}

/** Tables without `@output` go to every target. */
export function emitsTo(table: IrTable, target: GeneratorTarget): boolean {
  for (const effect of table.effects) {
    if (effect.kind === 'output') return effect.targets.includes(target);
  }
  return true;
}
