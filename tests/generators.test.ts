import { describe, it, expect } from 'vitest';
import { createMemoryHost, resolveSchema } from '../src/resolver/index.js';
import { buildIr, type Ir } from '../src/ir/index.js';
import {
  buildMermaidModel,
  buildTypeScriptModel,
  generate,
  mermaidId,
  renderMermaid,
} from '../src/generators/index.js';

function compile(source: string): Ir {
  const result = resolveSchema('main.schema', createMemoryHost({ 'main.schema': source }));
  if (!result.ast) throw new Error(result.diagnostics.map(d => d.message).join('\n'));
  return buildIr(result.ast);
}

function lines(content: string): string[] {
  return content.split('\n');
}

const PLAYER_SKILLS = `
  table Player { id: u32 primary_key; name: string; }
  table Skill { id: u32 primary_key; }
  table PlayerSkill {
    player_id: u32 foreign_key(Player.id);
    skill_id: u32 foreign_key(Skill.id, as: users);
  }
`;

// ---- Registry ----

describe('generate', () => {
  it('should run every target and sort files by path', () => {
    const files = generate(compile(PLAYER_SKILLS));
    expect(files.map(f => f.path)).toEqual(['schema.mmd', 'schema.ts']);
  });

  it('should run only the requested targets once each', () => {
    const files = generate(compile(PLAYER_SKILLS), ['mermaid', 'mermaid']);
    expect(files.map(f => f.path)).toEqual(['schema.mmd']);
  });

  it('should produce identical output for identical input', () => {
    expect(generate(compile(PLAYER_SKILLS))).toEqual(generate(compile(PLAYER_SKILLS)));
  });
});

// ---- Mermaid ----

describe('mermaid generator', () => {
  it('should render tables, relationships and many-to-many links', () => {
    const content = renderMermaid(buildMermaidModel(compile(PLAYER_SKILLS)));
    expect(content).toBe([
      'classDiagram',
      '  %% namespace <root>',
      '  class Player {',
      '    +u32 id PK',
      '    +string name',
      '  }',
      '  class Skill {',
      '    +u32 id PK',
      '  }',
      '  class PlayerSkill {',
      '    +u32 player_id FK',
      '    +u32 skill_id FK',
      '  }',
      '',
      '  PlayerSkill "*" --> "1" Player : player_id / player_skills',
      '  PlayerSkill "*" --> "1" Skill : skill_id / users',
      '  Player "*" -- "*" Skill : via PlayerSkill',
      '',
    ].join('\n'));
  });

  it('should render enums and named embeds as classes and inline embeds as field types', () => {
    const content = renderMermaid(buildMermaidModel(compile(`
      enum Rarity { Common, Rare = 5 }
      embed Vec2 { x: f32; y: f32; }
      @taggable
      table Item {
        id: u32 primary_key auto_increment;
        rarity: Rarity;
        pos: Vec2?;
        stats: embed { hp: u32; };
      }
    `)));
    expect(content).toBe([
      'classDiagram',
      '  %% namespace <root>',
      '  class Rarity {',
      '    <<enumeration>>',
      '    Common = 0',
      '    Rare = 5',
      '  }',
      '  class Vec2 {',
      '    <<embed>>',
      '    +f32 x',
      '    +f32 y',
      '  }',
      '  class Item {',
      '    <<@taggable>>',
      '    +u32 id PK,AI',
      '    +Rarity rarity',
      '    +Vec2? pos',
      '    +Stats stats',
      '  }',
      '',
      '  Item ..> Rarity : rarity',
      '  Item *-- Vec2 : pos',
      '',
    ].join('\n'));
  });

  it('should group classes by namespace with sanitized ids', () => {
    const model = buildMermaidModel(compile(`
      namespace game.core { table Player { id: u32 primary_key; embed Stats { hp: u32; } s: Stats; } }
    `));
    expect(model.sections.map(s => [s.namespace, s.classes.map(c => c.id)])).toEqual([
      ['game.core', ['game_core_Player', 'game_core_Player_Stats']],
    ]);
    expect(model.edges).toEqual([{ from: 'game_core_Player', to: 'game_core_Player_Stats', arrow: '*--', label: 's' }]);
    expect(mermaidId('a.B::c')).toBe('a_B__c');
  });

  it('should leave out tables routed to other targets and their edges', () => {
    const model = buildMermaidModel(compile(`
      table Player { id: u32 primary_key; }
      @output(typescript)
      table Session { id: u32 primary_key; player: u32 foreign_key(Player.id); }
    `));
    expect(model.sections[0].classes.map(c => c.id)).toEqual(['Player']);
    expect(model.edges).toEqual([]);
  });
});

// ---- TypeScript ----

describe('typescript generator', () => {
  it('should render interfaces and codecs for a root table', () => {
    const [file] = generate(compile(`
      /// A player
      table Player {
        id: u32 primary_key;
        nick: string?;
        tags: string[];
        gold: u64;
      }
    `), ['typescript']);
    expect(file.path).toBe('schema.ts');
    expect(file.content).toBe([
      '// Generated by schemaforge. Do not edit; regenerate from the schema source.',
      '',
      "import { BinaryReader, BinaryWriter } from 'schemaforge/runtime';",
      '',
      '/** A player */',
      'export interface Player {',
      '  id: number;',
      '  nick?: string;',
      '  tags: string[];',
      '  gold: bigint;',
      '}',
      '',
      'export function writePlayer(w: BinaryWriter, v: Player): void {',
      '  w.writeU32(v.id);',
      '  w.writeOptional(v.nick, (x0) => w.writeString(x0));',
      '  w.writeArray(v.tags, (x0) => w.writeString(x0));',
      '  w.writeU64(v.gold);',
      '}',
      '',
      'export function readPlayer(r: BinaryReader): Player {',
      '  return {',
      '    id: r.readU32(),',
      '    nick: r.readOptional(() => r.readString()),',
      '    tags: r.readArray(() => r.readString()),',
      '    gold: r.readU64(),',
      '  };',
      '}',
      '',
    ].join('\n'));
  });

  it('should wrap namespaced items and inline embeds', () => {
    const [file] = generate(compile(`
      namespace game {
        enum Rarity { Common, Rare = 5 }
        table Item {
          id: u32 primary_key;
          rarity: Rarity;
          drops: embed { item_id: u32; chance: f32?; }[];
        }
        table Chest { id: u32 primary_key; item_id: u32 foreign_key(Item.id); }
      }
    `), ['typescript']);
    const out = lines(file.content);
    expect(out).toContain('export namespace game {');
    expect(out.slice(out.indexOf('  export enum Rarity {'), out.indexOf('  export enum Rarity {') + 4)).toEqual([
      '  export enum Rarity {',
      '    Common = 0,',
      '    Rare = 5,',
      '  }',
    ]);
    expect(out).toContain('    rarity: game.Rarity;');
    expect(out).toContain('    drops: Array<{ item_id: number; chance?: number }>;');
    expect(out).toContain('    w.writeEnum(v.rarity);');
    expect(out).toContain(
      '    w.writeArray(v.drops, (x0) => { w.writeU32(x0.item_id); w.writeOptional(x0.chance, (x2) => w.writeF32(x2)); });',
    );
    expect(out).toContain('      drops: r.readArray(() => ({ item_id: r.readU32(), chance: r.readOptional(() => r.readF32()) })),');
    expect(out).toContain("    /** References game.Item.id (1); reverse 'chests' (*) */");
    expect(out[out.length - 2]).toBe('}');
  });

  it('should name nested and inline types after their owner', () => {
    const model = buildTypeScriptModel(compile(`
      embed Vec2 { x: f32; y: f32; }
      table Player {
        embed Stats { hp: u32; }
        id: u32 primary_key;
        stats: Stats;
        pos: Vec2;
        mood: enum { Calm, Angry };
      }
    `));
    expect(model.namespaces).toHaveLength(1);
    const root = model.namespaces[0];
    expect(root.enums.map(e => e.name)).toEqual(['PlayerMood']);
    expect(root.interfaces.map(i => i.name)).toEqual(['Vec2', 'PlayerStats', 'Player']);
    const player = root.interfaces[2];
    expect(player.fields.map(f => [f.name, f.type, f.write, f.read])).toEqual([
      ['id', 'number', 'w.writeU32(v.id);', 'r.readU32()'],
      ['stats', 'PlayerStats', 'writePlayerStats(w, v.stats);', 'readPlayerStats(r)'],
      ['pos', 'Vec2', 'writeVec2(w, v.pos);', 'readVec2(r)'],
      ['mood', 'PlayerMood', 'w.writeEnum(v.mood);', 'r.readEnum()'],
    ]);
  });

  it('should still emit tables routed elsewhere when an emitted type references them', () => {
    const model = buildTypeScriptModel(compile(`
      @output(mermaid)
      table Item { id: u32 primary_key; }
      @output(mermaid)
      table Hidden { id: u32 primary_key; }
      embed Slot { item: Item; }
      table Bag { id: u32 primary_key; slot: Slot; }
    `));
    expect(model.namespaces[0].interfaces.map(i => i.name)).toEqual(['Item', 'Slot', 'Bag']);
    expect(model.namespaces[0].interfaces[1].fields.map(f => [f.name, f.type])).toEqual([['item', 'Item']]);
  });

  it('should map wide and temporal primitives', () => {
    const model = buildTypeScriptModel(compile('table T { a: i64; b: timestamp; c: bytes; d: bool; e: f64; }'));
    expect(model.namespaces[0].interfaces[0].fields.map(f => f.type)).toEqual(['bigint', 'Date', 'Uint8Array', 'boolean', 'number']);
  });
});
