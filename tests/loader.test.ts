import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { createMemoryHost, resolveSchema } from '../src/resolver/index.js';
import { buildIr, type Ir } from '../src/ir/index.js';
import {
  compareIgnoreCase,
  CsvParseError,
  DataLoadError,
  DuplicateKeyError,
  globToRegExp,
  loadTableRows,
  parseCsv,
  resolvePattern,
} from '../src/loader/index.js';

function compile(source: string): Ir {
  const result = resolveSchema('main.schema', createMemoryHost({ 'main.schema': source }));
  if (!result.ast) throw new Error(result.diagnostics.map(d => d.message).join('\n'));
  return buildIr(result.ast);
}

let root: string;

function write(path: string, content: string): void {
  const full = join(root, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'schemaforge-loader-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

// ---- CSV ----

describe('parseCsv', () => {
  it('should handle quotes, escapes, CRLF, blank lines and multi-line cells', () => {
    const records = parseCsv('a,"b ""q""",c\r\n\r\n1, 2 ,"x\ny"\n');
    expect(records).toEqual([
      { line: 1, cells: ['a', 'b "q"', 'c'] },
      { line: 3, cells: ['1', '2', 'x\ny'] },
    ]);
  });

  it('should keep whitespace inside quoted cells and strip a byte order mark', () => {
    expect(parseCsv('\uFEFFid," padded "')).toEqual([{ line: 1, cells: ['id', ' padded '] }]);
  });

  it('should report malformed quoting with the line', () => {
    expect(() => parseCsv('a"b')).toThrow('Line 1: Unexpected quote inside unquoted cell');
    expect(() => parseCsv('"a"b')).toThrow('Line 1: Unexpected character after closing quote');
    expect(() => parseCsv('x\n"open')).toThrow(CsvParseError);
    expect(() => parseCsv('x\n"open')).toThrow('Line 2: Unterminated quoted cell');
  });
});

// ---- Patterns ----

describe('resolvePattern', () => {
  it('should list a directory by extension, sorted case-insensitively', () => {
    write('data/b.csv', '');
    write('data/A.csv', '');
    write('data/c.txt', '');
    expect(resolvePattern(root, 'data/')).toEqual([join(root, 'data/A.csv'), join(root, 'data/b.csv')]);
    expect(resolvePattern(root, 'data')).toEqual([join(root, 'data/A.csv'), join(root, 'data/b.csv')]);
  });

  it('should match globs in the last segment', () => {
    write('players_1.csv', '');
    write('players_10.csv', '');
    write('other.csv', '');
    expect(resolvePattern(root, 'players_?.csv')).toEqual([join(root, 'players_1.csv')]);
    expect(resolvePattern(root, 'players_*.csv')).toEqual([join(root, 'players_1.csv'), join(root, 'players_10.csv')]);
  });

  it('should resolve a single file only when it exists', () => {
    write('one.csv', '');
    expect(resolvePattern(root, 'one.csv')).toEqual([join(root, 'one.csv')]);
    expect(resolvePattern(root, 'two.csv')).toEqual([]);
    expect(resolvePattern(root, '')).toEqual([]);
  });

  it('should escape regex characters in globs', () => {
    expect(globToRegExp('a.b*').test('a.bcd')).toBe(true);
    expect(globToRegExp('a.b*').test('axbcd')).toBe(false);
  });

  it('should order by uppercase first, then by raw value', () => {
    expect(['b', 'B', 'a'].sort(compareIgnoreCase)).toEqual(['a', 'B', 'b']);
  });
});

// ---- Loading ----

const PLAYER_SCHEMA = `
  enum Job { Warrior, Mage = 5 }
  @load(type: "Map", path: "players/")
  table Player {
    id: u32 primary_key;
    name: string;
    job: Job default(Warrior);
    gold: u64 default(0);
    nick: string?;
    tags: string[];
    stats: embed { hp: u32; mp: u32?; }?;
    joined: timestamp?;
    active: bool default(true);
  }
`;

describe('loadTableRows', () => {
  it('should convert cells by field type across files in order', () => {
    write('players/a.csv', [
      'id,name,job,tags,stats',
      '1,Ann,Mage,"[""a"",""b""]","{""hp"": 10}"',
      '2, Bob ,0,[],"{""hp"": 5, ""mp"": 3}"',
    ].join('\n'));
    write('players/b.csv', 'id,name,joined,active,gold,nick\n3,Cy,1700000000000,false,18446744073709551615,\n');

    const result = loadTableRows(compile(PLAYER_SCHEMA), 'Player', { rootDir: root });
    expect(result.table).toBe('Player');
    expect(result.files).toEqual(['players/a.csv', 'players/b.csv']);
    expect(result.rows).toHaveLength(3);

    expect(result.rows[0]).toEqual({
      id: 1, name: 'Ann', job: 'Mage', gold: 0n, nick: null, tags: ['a', 'b'],
      stats: { hp: 10, mp: null }, joined: null, active: true,
    });
    expect(result.rows[1]).toMatchObject({ id: 2, name: 'Bob', job: 'Warrior', tags: [], stats: { hp: 5, mp: 3 } });

    const cy = result.rows[2];
    expect(cy).toMatchObject({ id: 3, job: 'Warrior', gold: 18446744073709551615n, nick: null, active: false, tags: [], stats: null });
    expect(cy.joined).toBeInstanceOf(Date);
    expect(cy.joined instanceof Date ? cy.joined.toISOString() : '').toBe('2023-11-14T22:13:20.000Z');
  });

  it('should reject a key repeated across files', () => {
    const ir = compile('@load(type: "Map", path: "players_*.csv")\ntable Player { id: u32 primary_key; name: string; }');
    write('players_a.csv', 'id,name\n7,Ann\n');
    write('players_b.csv', 'id,name\n7,Bob\n');

    let caught: unknown;
    try {
      loadTableRows(ir, 'Player', { rootDir: root });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DuplicateKeyError);
    expect(caught).toMatchObject({
      key: '7',
      firstFile: 'players_a.csv',
      secondFile: 'players_b.csv',
      line: 2,
      message: "Duplicate key '7' found in files: 'players_a.csv' and 'players_b.csv'",
    });
    if (!(caught instanceof DuplicateKeyError)) return;
    expect(caught.toDiagnostic()).toMatchObject({
      code: 'SF-D001',
      category: 'data',
      location: { file: 'players_b.csv', line: 2, col: 1 },
    });
  });

  it('should accept rows from several files with distinct keys', () => {
    const ir = compile('@load(type: "Map", path: "players_*.csv")\ntable Player { id: u32 primary_key; name: string; }');
    write('players_a.csv', 'id,name\n7,Ann\n');
    write('players_b.csv', 'id,name\n8,Bob\n');
    expect(loadTableRows(ir, 'Player', { rootDir: root }).rows).toEqual([{ id: 7, name: 'Ann' }, { id: 8, name: 'Bob' }]);
  });

  describe('auto_increment keys', () => {
    const schema = '@load(type: "Map", path: "items/")\ntable Item { id: u32 primary_key auto_increment; name: string; }';

    it('should leave a single blank key unassigned', () => {
      write('items/a.csv', 'id,name\n,Sword\n');
      expect(loadTableRows(compile(schema), 'Item', { rootDir: root }).rows).toEqual([{ id: null, name: 'Sword' }]);
    });

    it('should not treat several blank keys as duplicates', () => {
      write('items/a.csv', 'id,name\n,Sword\n,Shield\n');
      write('items/b.csv', 'name\nBow\n');
      expect(loadTableRows(compile(schema), 'Item', { rootDir: root }).rows).toEqual([
        { id: null, name: 'Sword' },
        { id: null, name: 'Shield' },
        { id: null, name: 'Bow' },
      ]);
    });

    it('should still reject explicit keys that repeat', () => {
      write('items/a.csv', 'id,name\n,Sword\n4,Shield\n');
      write('items/b.csv', 'id,name\n4,Bow\n');
      expect(() => loadTableRows(compile(schema), 'Item', { rootDir: root }))
        .toThrow("Duplicate key '4' found in files: 'items/a.csv' and 'items/b.csv'");
    });
  });

  it('should keep 64-bit defaults beyond the safe integer range exact', () => {
    const ir = compile('@load(type: "Map", path: "w.csv")\ntable W { id: u32 primary_key; cap: u64 default(18446744073709551615); }');
    write('w.csv', 'id,cap\n1,\n');
    expect(loadTableRows(ir, 'W', { rootDir: root }).rows).toEqual([{ id: 1, cap: 18446744073709551615n }]);
  });

  describe('errors', () => {
    const schema = '@load(type: "Map", path: "p.csv")\ntable P { id: u8 primary_key; name: string; }\ntable Q { id: u32 primary_key; }';

    it('should report unknown tables and tables without a Map source', () => {
      const ir = compile(schema);
      expect(() => loadTableRows(ir, 'Nope', { rootDir: root })).toThrow("Unknown table 'Nope'");
      expect(() => loadTableRows(ir, 'Q', { rootDir: root })).toThrow(
        'Table \'Q\' has no @load(type: "Map", path: ...) source',
      );
    });

    it('should report a pattern that matches nothing', () => {
      expect(() => loadTableRows(compile(schema), 'P', { rootDir: root })).toThrow("No data files match 'p.csv' for table 'P'");
    });

    it('should report unknown and duplicate columns at the header', () => {
      write('p.csv', 'id,nmae\n1,x\n');
      expect(() => loadTableRows(compile(schema), 'P', { rootDir: root })).toThrow("p.csv:1: Unknown column 'nmae' for table 'P'");
      write('p.csv', 'id,id\n1,2\n');
      expect(() => loadTableRows(compile(schema), 'P', { rootDir: root })).toThrow("p.csv:1: Duplicate column 'id'");
    });

    it('should report bad cells with file, line and column', () => {
      const ir = compile(schema);
      write('p.csv', 'id,name\n1,a\nx,b\n');
      expect(() => loadTableRows(ir, 'P', { rootDir: root })).toThrow(DataLoadError);
      expect(() => loadTableRows(ir, 'P', { rootDir: root })).toThrow("p.csv:3: Column 'id': 'x' is not an integer");
      write('p.csv', 'id,name\n300,a\n');
      expect(() => loadTableRows(ir, 'P', { rootDir: root })).toThrow("p.csv:2: Column 'id': 300 is out of range for u8 (unsigned)");
      write('p.csv', 'id\n1\n');
      expect(() => loadTableRows(ir, 'P', { rootDir: root })).toThrow("p.csv:2: Column 'name': missing column");
      write('p.csv', 'id,name\n1,a,extra\n');
      expect(() => loadTableRows(ir, 'P', { rootDir: root })).toThrow('p.csv:2: Expected 2 cell(s), found 3');
    });

    it('should carry CSV syntax errors with the file name', () => {
      write('p.csv', 'id,name\n1,"open\n');
      expect(() => loadTableRows(compile(schema), 'P', { rootDir: root })).toThrow('p.csv:2: Unterminated quoted cell');
    });
  });
});
