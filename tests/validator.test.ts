import { describe, it, expect } from 'vitest';
import { createMemoryHost, resolveSchema } from '../src/resolver/index.js';
import { validate, type ValidateOptions } from '../src/validator/index.js';
import type { Diagnostic } from '../src/diagnostics.js';

function check(source: string, options?: ValidateOptions): Diagnostic[] {
  const result = resolveSchema('main.schema', createMemoryHost({ 'main.schema': source }));
  if (!result.ast) throw new Error(result.diagnostics.map(d => d.message).join('\n'));
  return validate(result.ast, options);
}

function messages(diagnostics: Diagnostic[]): string[] {
  return diagnostics.map(d => d.message);
}

// ---- Valid schemas ----

describe('valid schemas', () => {
  it('should accept a schema with references, constraints and annotations', () => {
    const diagnostics = check(`
      enum Rarity { Common, Rare }
      @load(type: "Map", path: "items/")
      @cache(full_load)
      table Item {
        id: u32 primary_key auto_increment;
        name: string max_length(32) regex("^[A-Za-z ]+$");
        rarity: Rarity default(Common);
        weight: f32 range(0, 99.5);
      }
      table Inventory {
        id: u64 primary_key;
        item_id: u32 foreign_key(Item.id);
        count: u16 default(1);
      }
    `);
    expect(diagnostics).toEqual([]);
  });

  it('should resolve names through enclosing namespaces and imports', () => {
    const diagnostics = check(`
      namespace shared { enum Kind { A } embed Vec2 { x: f32; y: f32; } }
      namespace game {
        enum Tier { Low }
        namespace item {
          import shared.*;
          table Sword { id: u32 primary_key; kind: Kind; tier: Tier; pos: Vec2; }
        }
      }
      namespace other {
        import shared.Kind;
        table T { id: u32 primary_key; kind: Kind; }
      }
    `);
    expect(diagnostics).toEqual([]);
  });

  it('should resolve types nested inside the owning table', () => {
    expect(check('table Player { enum Class { A } embed Stats { hp: u32; } id: u32 primary_key; c: Class; s: Stats; }'))
      .toEqual([]);
  });

  it('should leave unknown annotations alone', () => {
    expect(check('@custom_thing(x: 1)\ntable T { id: u32; }')).toEqual([]);
  });
});

// ---- Types ----

describe('type references', () => {
  it('should report an unknown type at the field', () => {
    const [d] = check('table T { x: Foo; }');
    expect(d).toMatchObject({
      kind: 'UnresolvedTypeError',
      code: 'SF-E002',
      message: "Unknown type 'Foo' for field 'x'",
      location: { file: 'main.schema', line: 1, col: 11 },
    });
  });

  it('should not see into sibling namespaces without an import', () => {
    const diagnostics = check('namespace shared { enum Kind { A } }\nnamespace game { table T { k: Kind; } }');
    expect(messages(diagnostics)).toEqual(["Unknown type 'Kind' for field 'k'"]);
  });

  it('should report every problem in one run', () => {
    const diagnostics = check('table T { a: Foo; b: Bar; c: string range(1, 2); }');
    expect(messages(diagnostics)).toEqual([
      "Unknown type 'Foo' for field 'a'",
      "Unknown type 'Bar' for field 'b'",
      "range requires a numeric field, 'c' is 'string'",
    ]);
  });
});

// ---- Duplicates ----

describe('duplicates', () => {
  it('should report duplicate fields with the first location', () => {
    const [d] = check('table T { a: u8; a: u16; }');
    expect(d.kind).toBe('DuplicateDefinitionError');
    expect(d.message).toBe("Duplicate field 'a' (first defined at main.schema:1:11)");
    expect(d.location).toEqual({ file: 'main.schema', line: 1, col: 18 });
  });

  it('should report duplicate enum variants', () => {
    expect(messages(check('enum E { A, B, A }'))).toEqual(["Duplicate enum variant 'A' (first defined at main.schema:1:10)"]);
  });

  it('should report a reverse relation name used twice on the same table', () => {
    const diagnostics = check([
      'table Skill { id: u32 primary_key; }',
      'table A { sid: u32 foreign_key(Skill.id, as: users); }',
      'table B { sid: u32 foreign_key(Skill.id, as: users); }',
    ].join('\n'));
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].message).toBe(
      "Duplicate reverse relation name on table 'Skill' 'users' (first defined at main.schema:2:20)",
    );
    expect(diagnostics[0].location).toEqual({ file: 'main.schema', line: 3, col: 20 });
  });
});

// ---- Constraints ----

describe('constraints', () => {
  it('should reject max_length on a non-string field', () => {
    const [d] = check('table T { x: u32 max_length(4); }');
    expect(d).toMatchObject({ kind: 'ConstraintTypeMismatchError', message: "max_length requires a string or bytes field, 'x' is 'u32'" });
  });

  it('should reject inverted ranges', () => {
    expect(messages(check('table T { lvl: u8 range(10, 1); }'))).toEqual(['range lower bound 10 exceeds upper bound 1']);
  });

  it('should reject float bounds on integer fields', () => {
    expect(messages(check('table T { lvl: u8 range(0.5, 2); }'))).toEqual(["range bounds on integer field 'lvl' must be integers"]);
  });

  it('should reject defaults that do not fit the field type', () => {
    expect(messages(check('table T { n: u8 default(-1); }'))).toEqual(["default -1 is not compatible with type 'u8' of field 'n'"]);
    expect(messages(check('table T { n: u8 default(256); }'))).toEqual(["default 256 is not compatible with type 'u8' of field 'n'"]);
  });

  it('should check integer defaults against the exact bounds of 64-bit types', () => {
    expect(check('table T { n: u64 default(18446744073709551615); m: i64 default(-9223372036854775808); }')).toEqual([]);
    expect(messages(check('table T { n: u64 default(18446744073709551616); }')))
      .toEqual(["default 18446744073709551616 is not compatible with type 'u64' of field 'n'"]);
  });

  it('should reject enum defaults that are not variants', () => {
    const [d] = check('enum Color { Red, Blue }\ntable T { c: Color default(Green); }');
    expect(d.message).toBe("default Green is not a variant of the enum type of 'c'");
    expect(d.fix).toEqual({ description: 'Use one of: Red, Blue' });
  });

  it('should reject auto_increment on non-integer fields', () => {
    expect(messages(check('table T { s: string auto_increment; }')))
      .toEqual(["auto_increment requires a scalar integer field, 's' is 'string'"]);
  });

  it('should reject an invalid regex', () => {
    const [d] = check('table T { s: string regex("(unclosed"); }');
    expect(d.kind).toBe('ConstraintTypeMismatchError');
    expect(d.message.startsWith('Invalid regex pattern: ')).toBe(true);
  });

  it('should warn about repeated and redundant constraints without failing', () => {
    const diagnostics = check('table T { id: u32 primary_key unique; x: u32 index index; }');
    expect(diagnostics.map(d => [d.severity, d.message])).toEqual([
      ['warning', "'unique' is redundant on primary key field 'id'"],
      ['warning', "Constraint 'index' is repeated on field 'x'"],
    ]);
  });
});

// ---- Primary keys ----

describe('primary keys', () => {
  it('should reject a second primary key unless composite keys are enabled', () => {
    const source = 'table T { a: u32 primary_key; b: u32 primary_key; }';
    const [d] = check(source);
    expect(d.kind).toBe('InvalidPrimaryKeyError');
    expect(d.message).toBe("Table 'T' declares more than one primary_key field ('a', 'b')");
    expect(d.location.col).toBe(31);
    expect(check(source, { compositePrimaryKeys: true })).toEqual([]);
  });

  it('should reject optional and embed keys', () => {
    expect(messages(check('table T { id: u32? primary_key; }'))).toEqual(["Primary key field 'id' cannot be optional"]);
    expect(messages(check('embed E { id: u32 primary_key; }'))).toEqual(["primary_key is not allowed on embed field 'id'"]);
  });

  it('should reject keys on arrays', () => {
    expect(messages(check('table T { ids: u32[] primary_key; }')))
      .toEqual(["'primary_key' cannot be applied to field 'ids', it is an array of u32"]);
  });
});

// ---- Foreign keys ----

describe('foreign keys', () => {
  const player = 'table Player { id: u32 primary_key; name: string; }\n';

  it('should report a missing target table', () => {
    const [d] = check('table S { pid: u32 foreign_key(Player.id); }');
    expect(d).toMatchObject({ kind: 'UnresolvedForeignKeyError', code: 'SF-E003', message: "foreign_key target table 'Player' not found" });
  });

  it('should report a missing target field', () => {
    expect(messages(check(`${player}table S { pid: u32 foreign_key(Player.uid); }`))).toEqual(["Table 'Player' has no field 'uid'"]);
  });

  it('should require the target to be a key', () => {
    expect(messages(check(`${player}table S { n: string foreign_key(Player.name); }`)))
      .toEqual(["foreign_key target 'Player.name' must be a primary_key or unique field"]);
  });

  it('should require matching types', () => {
    expect(messages(check(`${player}table S { pid: u16 foreign_key(Player.id); }`)))
      .toEqual(["foreign_key field 'pid' has type 'u16' but 'Player.id' is 'u32'"]);
  });

  it('should require a Table.field target', () => {
    expect(messages(check(`${player}table S { pid: u32 foreign_key(Player); }`)))
      .toEqual(["foreign_key target 'Player' must name a table field (Table.field)"]);
  });

  it('should reject enum targets', () => {
    expect(messages(check('enum K { A }\ntable T { k: u32 foreign_key(K.id); }')))
      .toEqual(["foreign_key target 'K' is an enum, not a table"]);
  });

  it('should reject foreign keys on embed fields', () => {
    expect(messages(check(`${player}embed E { pid: u32 foreign_key(Player.id); }`)))
      .toEqual(["foreign_key is only allowed on table fields, 'pid' belongs to an embed"]);
  });

  it('should resolve fully-qualified targets across namespaces', () => {
    const diagnostics = check([
      'namespace game.player { table Player { id: u32 primary_key; } }',
      'namespace game.guild { table Member { pid: u32 foreign_key(game.player.Player.id); } }',
    ].join('\n'));
    expect(diagnostics).toEqual([]);
  });
});

// ---- Annotations ----

describe('annotations', () => {
  it('should require a path for Map sources', () => {
    const [d] = check('@load(type: "Map")\ntable T { id: u32; }');
    expect(d).toMatchObject({
      kind: 'MissingAnnotationParameterError',
      message: "@load: type 'Map' requires a 'path' parameter",
      location: { file: 'main.schema', line: 1, col: 1 },
    });
  });

  it('should reject unknown cache strategies', () => {
    const [d] = check('@cache(sometimes)\ntable T { id: u32; }');
    expect(d.kind).toBe('InvalidAnnotationParameterError');
    expect(d.message).toBe("@cache: invalid strategy 'sometimes'");
    expect(d.fix?.description).toBe('Use one of: full_load, on_demand, write_through, write_back');
  });

  it('should check field references', () => {
    expect(messages(check('@soft_delete(deleted)\ntable T { id: u32; }')))
      .toEqual(["@soft_delete: parameter 'field' names unknown field 'deleted'"]);
    expect(check('@soft_delete(deleted)\ntable T { id: u32; deleted: bool; }')).toEqual([]);
  });

  it('should reject parameters on flag annotations', () => {
    expect(messages(check('@taggable(true)\ntable T { id: u32; }'))).toEqual(['@taggable: takes no parameters']);
  });

  it('should check index fields and the unique flag', () => {
    expect(messages(check('@index(name, unique: yes)\ntable T { name: string; }')))
      .toEqual(["@index: parameter 'unique' must be true or false"]);
    expect(messages(check('@index(nick)\ntable T { name: string; }')))
      .toEqual(["@index: unknown field 'nick'"]);
  });

  it('should require a name on namespace datasources', () => {
    expect(messages(check('@datasource\nnamespace game { table T { id: u32; } }')))
      .toEqual(["@datasource: missing required parameter 'name'"]);
  });
});
