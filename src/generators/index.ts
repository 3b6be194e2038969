/**
 * Generator registry. Each target renders independently from the same frozen
 * IR; the combined output is sorted by path so repeated runs are identical.
 */

import type { Ir } from '../ir/types.js';
import { GENERATOR_TARGETS } from '../semantic/annotations.js';
import { mermaidGenerator } from './mermaid.js';
import { typescriptGenerator } from './typescript.js';
import type { Generator, GeneratorTarget, OutputFile } from './types.js';

export const GENERATORS: Record<GeneratorTarget, Generator> = {
  typescript: typescriptGenerator,
  mermaid: mermaidGenerator,
};

export function generate(ir: Ir, targets: readonly GeneratorTarget[] = GENERATOR_TARGETS): OutputFile[] {
  const files: OutputFile[] = [];
  for (const target of new Set(targets)) {
    files.push(...GENERATORS[target].generate(ir));
  }
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export { emitsTo } from './types.js';
export type { Generator, GeneratorTarget, OutputFile } from './types.js';
export { buildMermaidModel, renderMermaid, mermaidId, mermaidGenerator } from './mermaid.js';
export type { MermaidModel, MermaidClass, MermaidEdge } from './mermaid.js';
export { buildTypeScriptModel, renderTypeScript, typescriptGenerator } from './typescript.js';
export type { TsModel, TsNamespace, TsInterface, TsEnum, TsField } from './typescript.js';
export { computeIncremental, writeOutput, loadManifest, hashContent } from './cache.js';
export type { CacheManifest, IncrementalResult, WriteSummary } from './cache.js';
