import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { join } from 'path';
import { compile } from '../src/pipeline.js';
import { createNodeHost } from '../src/resolver/index.js';
import { loadTableRows } from '../src/loader/index.js';
import type { Ir } from '../src/ir/types.js';

const gameDir = fileURLToPath(new URL('../examples/game/', import.meta.url));

function compileExample(): Ir {
  const { result, ir } = compile(join(gameDir, 'main.schema'), createNodeHost());
  expect(result.diagnostics).toEqual([]);
  if (!ir) throw new Error('example did not compile');
  return ir;
}

describe('examples/game', () => {
  it('should compile without diagnostics', () => {
    const { result, files } = compile(join(gameDir, 'main.schema'), createNodeHost());
    expect(result.valid).toBe(true);
    expect(files.map(f => f.path)).toEqual(['schema.mmd', 'schema.ts']);
  });

  it('should resolve the shared namespace and detect the inventory junction', () => {
    const ir = compileExample();
    expect(ir.tables.map(t => t.fqn)).toEqual(['game.Player', 'game.Item', 'game.InventorySlot']);
    expect(ir.manyToMany).toHaveLength(1);
    expect(Object.keys(ir.enums).sort()).toEqual(['game.Class', 'shared.Rarity']);
    expect(ir.enums['shared.Rarity'].variants.map(v => v.value)).toEqual([0, 1, 5, 6]);
  });

  it('should load the player data files in order', () => {
    const loaded = loadTableRows(compileExample(), 'game.Player', { rootDir: gameDir });
    expect(loaded.files).toEqual(['data/players/players_1.csv', 'data/players/players_2.csv']);
    expect(loaded.rows).toEqual([
      { id: 1, name: 'Ann', class: 'Mage', level: 12, gold: 1500n, spawn: { x: 1.5, y: -2 }, stats: { hp: 80, mp: 140 } },
      { id: 2, name: 'Bo', class: 'Warrior', level: 3, gold: 0n, spawn: null, stats: { hp: 120, mp: 10 } },
      { id: 10, name: 'Cy', class: 'Rogue', level: 40, gold: 9007199254740993n, spawn: null, stats: { hp: 95, mp: 35 } },
    ]);
  });
});
