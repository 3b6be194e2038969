import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { runCheck, runCompile, runIr, runLoad, toJson, type CliIO } from '../src/cli/commands.js';
import { createProgram } from '../src/cli/program.js';

interface FakeIO extends CliIO {
  logs: string[];
  errors: string[];
}

let cwd: string;
let io: FakeIO;

function write(path: string, content: string): void {
  const full = join(cwd, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

function parseLog(line: string | undefined): unknown {
  if (line === undefined) throw new Error('nothing logged');
  const value: unknown = JSON.parse(line);
  return value;
}

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), 'schemaforge-cli-'));
  const logs: string[] = [];
  const errors: string[] = [];
  io = { logs, errors, cwd, log: line => logs.push(line), error: line => errors.push(line) };
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
});

const GAME = `
@load(type: "Map", path: "players/")
table Player { id: u32 primary_key; name: string; gold: u64 default(0); }
`;

// ---- check ----

describe('check', () => {
  it('should confirm a valid schema', () => {
    write('game.schema', GAME);
    expect(runCheck(io, 'game.schema', {})).toBe(0);
    expect(io.logs).toEqual(['\n  ⚡ schemaforge Check\n', '  ✅ game.schema is valid\n']);
  });

  it('should print diagnostics with a source excerpt and a summary', () => {
    write('bad.schema', 'table T { x: Foo; }');
    expect(runCheck(io, 'bad.schema', {})).toBe(1);
    const file = join(cwd, 'bad.schema');
    expect(io.logs).toEqual([
      '\n  ⚡ schemaforge Check\n',
      [
        "  error[SF-E002]: Unknown type 'Foo' for field 'x'",
        `    --> ${file}:1:11`,
        '    |',
        '  1 | table T { x: Foo; }',
        `    | ${' '.repeat(10)}^`,
        '    = fix: Declare the type, import its namespace, or use its fully-qualified name',
      ].join('\n'),
      '',
      '  FAIL: 1 error(s), 0 warning(s)\n',
    ]);
  });

  it('should print the diagnostic result as JSON', () => {
    write('bad.schema', 'table T { x: Foo; }');
    expect(runCheck(io, 'bad.schema', { json: true })).toBe(1);
    expect(io.logs).toHaveLength(1);
    expect(parseLog(io.logs[0])).toMatchObject({
      valid: false,
      summary: { errors: 1, warnings: 0, info: 0 },
      diagnostics: [{ code: 'SF-E002', location: { line: 1, col: 11 } }],
    });
  });

  it('should require a schema from the arguments or the config file', () => {
    expect(runCheck(io, undefined, { quiet: true })).toBe(1);
    expect(io.errors).toEqual(['  ERROR: No schema file given (pass <entry> or set "schema" in schemaforge.config.json)\n']);
  });

  it('should report config errors', () => {
    write('schemaforge.config.json', JSON.stringify({ targets: ['rust'] }));
    expect(runCheck(io, 'game.schema', { quiet: true })).toBe(1);
    expect(io.errors).toHaveLength(1);
    expect(io.errors[0].startsWith(`  ERROR: ${join(cwd, 'schemaforge.config.json')}: targets.0: Invalid enum value`)).toBe(true);
  });
});

// ---- compile ----

describe('compile', () => {
  it('should write output and skip unchanged files on the next run', () => {
    write('game.schema', GAME);
    expect(runCompile(io, 'game.schema', {})).toBe(0);
    expect(io.logs).toEqual([
      '\n  ⚡ schemaforge Compile\n',
      '  ✅ Compiled game.schema → output/',
      '     → 2/2 files written (0 skipped)',
      '',
    ]);
    expect(readdirSync(join(cwd, 'output')).sort()).toEqual(['.schemaforge-cache', 'schema.mmd', 'schema.ts']);

    io.logs.length = 0;
    expect(runCompile(io, 'game.schema', {})).toBe(0);
    expect(io.logs[2]).toBe('     → 0/2 files written (2 skipped)');
  });

  it('should take the schema and output directory from the config file', () => {
    write('schemas/game.schema', GAME);
    write('schemaforge.config.json', JSON.stringify({ schema: 'schemas/game.schema', outDir: 'gen', targets: ['mermaid'] }));
    expect(runCompile(io, undefined, { quiet: true })).toBe(0);
    expect(io.logs).toEqual([]);
    expect(existsSync(join(cwd, 'gen', 'schema.mmd'))).toBe(true);
    expect(existsSync(join(cwd, 'gen', 'schema.ts'))).toBe(false);
  });

  it('should let flags override the config file', () => {
    write('game.schema', GAME);
    write('schemaforge.config.json', JSON.stringify({ outDir: 'gen' }));
    expect(runCompile(io, 'game.schema', { output: 'out2', targets: 'typescript', incremental: false, quiet: true })).toBe(0);
    expect(readdirSync(join(cwd, 'out2'))).toEqual(['schema.ts']);
    expect(existsSync(join(cwd, 'gen'))).toBe(false);
  });

  it('should write nothing when the schema has errors', () => {
    write('bad.schema', 'table T { a: u32 primary_key; b: u32 primary_key; }');
    expect(runCompile(io, 'bad.schema', { json: true })).toBe(1);
    expect(parseLog(io.logs[0])).toMatchObject({ valid: false, output: null });
    expect(existsSync(join(cwd, 'output'))).toBe(false);

    io.logs.length = 0;
    expect(runCompile(io, 'bad.schema', { json: true, compositeKeys: true })).toBe(0);
    expect(parseLog(io.logs[0])).toMatchObject({ valid: true, output: { written: ['schema.mmd', 'schema.ts'], skipped: 0 } });
  });
});

// ---- ir ----

describe('ir', () => {
  it('should print the IR as JSON', () => {
    write('game.schema', GAME);
    expect(runIr(io, 'game.schema', {})).toBe(0);
    expect(parseLog(io.logs[0])).toMatchObject({
      tables: [{ fqn: 'Player', primaryKey: ['id'], effects: [{ kind: 'load', source: { type: 'Map', path: 'players/' } }] }],
    });
  });
});

// ---- load ----

describe('load', () => {
  it('should print rows with 64-bit integers as strings', () => {
    write('game.schema', GAME);
    write('players/a.csv', 'id,name,gold\n1,Ann,9007199254740993\n2,Bob,\n');
    expect(runLoad(io, 'game.schema', 'Player', {})).toBe(0);
    expect(parseLog(io.logs[0])).toEqual([
      { id: 1, name: 'Ann', gold: '9007199254740993' },
      { id: 2, name: 'Bob', gold: '0' },
    ]);
  });

  it('should resolve data paths against --data-dir', () => {
    write('game.schema', GAME);
    write('data/players/a.csv', 'id,name\n1,Ann\n');
    expect(runLoad(io, 'game.schema', 'Player', { dataDir: 'data' })).toBe(0);
    expect(parseLog(io.logs[0])).toEqual([{ id: 1, name: 'Ann', gold: '0' }]);
  });

  it('should resolve data paths against the file declaring the table', () => {
    write('game.schema', 'import "defs/items.schema";');
    write('defs/items.schema', '@load(type: "Map", path: "items.csv")\ntable Item { id: u32 primary_key; name: string; }');
    write('defs/items.csv', 'id,name\n3,Sword\n');
    expect(runLoad(io, 'game.schema', 'Item', {})).toBe(0);
    expect(parseLog(io.logs[0])).toEqual([{ id: 3, name: 'Sword' }]);
  });

  it('should report duplicate keys as a diagnostic', () => {
    write('game.schema', GAME);
    write('players/a.csv', 'id,name\n7,Ann\n');
    write('players/b.csv', 'id,name\n7,Bob\n');
    expect(runLoad(io, 'game.schema', 'Player', { json: true })).toBe(1);
    expect(parseLog(io.logs[0])).toEqual({
      error: {
        name: 'DuplicateKeyError',
        message: "Duplicate key '7' found in files: 'players/a.csv' and 'players/b.csv'",
      },
      diagnostics: [
        {
          code: 'SF-D001',
          kind: 'DuplicateKeyError',
          severity: 'error',
          category: 'data',
          message: "Duplicate key '7' found in files: 'players/a.csv' and 'players/b.csv'",
          location: { file: 'players/b.csv', line: 2, col: 1 },
          fix: { description: "Remove one of the rows with key '7'" },
        },
      ],
    });
  });

  it('should report data errors', () => {
    write('game.schema', GAME);
    write('players/a.csv', 'id,name\nx,Ann\n');
    expect(runLoad(io, 'game.schema', 'Player', {})).toBe(1);
    expect(io.errors).toEqual(["  ERROR: players/a.csv:2: Column 'id': 'x' is not an integer\n"]);
  });
});

// ---- program ----

describe('createProgram', () => {
  it('should register every command', () => {
    expect(createProgram(io).commands.map(c => c.name())).toEqual(['compile', 'check', 'ir', 'load']);
  });

  it('should dispatch to the command and set the exit code', () => {
    write('game.schema', GAME);
    const previous = process.exitCode;
    try {
      createProgram(io).parse(['check', join(cwd, 'game.schema'), '--quiet'], { from: 'user' });
      expect(process.exitCode).toBe(0);
    } finally {
      process.exitCode = previous;
    }
  });
});

describe('toJson', () => {
  it('should encode bigint and bytes', () => {
    expect(toJson({ a: 1n, b: new Uint8Array([1, 2, 3]) })).toBe('{\n  "a": "1",\n  "b": "AQID"\n}');
  });
});
