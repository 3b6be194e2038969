/**
 * Data loading for tables declared with `@load(type: "Map", path: ...)`.
 *
 * Every file the path pattern resolves to is read as CSV (header row first),
 * cells are converted by field type, and rows are concatenated in file order.
 * A repeated primary key aborts the whole load.
 */

import { readFileSync } from 'fs';
import { relative } from 'path';
import type { Literal, PrimitiveType } from '../ast/types.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics.js';
import { findTable } from '../ir/index.js';
import type { Ir, IrField, IrTable, IrTypeBase } from '../ir/types.js';
import { BIGINT_TYPES, FLOAT_TYPES, INTEGER_BOUNDS, INTEGER_TYPES, UNSIGNED_TYPES } from '../semantic/primitives.js';
import { CsvParseError, parseCsv, type CsvRecord } from './csv.js';
import { resolvePattern } from './pattern.js';

export { resolvePattern, globToRegExp, compareIgnoreCase } from './pattern.js';
export { parseCsv, CsvParseError, type CsvRecord } from './csv.js';

export type CellValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | CellValue[]
  | { [field: string]: CellValue };

export type Row = Record<string, CellValue>;

export class DataLoadError extends Error {
  constructor(message: string, readonly file?: string, readonly line?: number) {
    super(file === undefined ? message : `${file}${line === undefined ? '' : `:${line}`}: ${message}`);
    this.name = 'DataLoadError';
  }
}

export class DuplicateKeyError extends Error {
  constructor(
    readonly key: string,
    readonly firstFile: string,
    readonly secondFile: string,
    /** Line of the repeated row in `secondFile`. */
    readonly line = 1,
  ) {
    super(`Duplicate key '${key}' found in files: '${firstFile}' and '${secondFile}'`);
    this.name = 'DuplicateKeyError';
  }

  toDiagnostic(): Diagnostic {
    return createDiagnostic('DuplicateKeyError', this.message, { file: this.secondFile, line: this.line, col: 1 }, {
      fix: { description: `Remove one of the rows with key '${this.key}'` },
    });
  }
}

export interface LoadOptions {
  /** Directory the `@load` path is resolved against. */
  rootDir: string;
}

export interface LoadResult {
  table: string;
  /** Resolved files relative to rootDir, in load order. */
  files: string[];
  rows: Row[];
}

/** Thrown inside conversion; rethrown as DataLoadError with file and line. */
class CellError extends Error {}

function toRelative(rootDir: string, file: string): string {
  return relative(rootDir, file).split('\\').join('/');
}

export function loadTableRows(ir: Ir, tableName: string, options: LoadOptions): LoadResult {
  const table = findTable(ir, tableName);
  if (!table) throw new DataLoadError(`Unknown table '${tableName}'`);

  const pattern = mapSourcePath(table);
  const files = resolvePattern(options.rootDir, pattern);
  if (files.length === 0) {
    throw new DataLoadError(`No data files match '${pattern}' for table '${table.fqn}'`);
  }

  const converter = new RowConverter(ir);
  const rows: Row[] = [];
  const keyToFile = new Map<string, string>();

  for (const file of files) {
    const rel = toRelative(options.rootDir, file);
    for (const { row, line } of readRows(converter, table, file, rel)) {
      // Blank auto_increment keys are assigned later and never collide.
      const keyCells = table.primaryKey.map(k => row[k]);
      if (keyCells.length > 0 && keyCells.every(v => v !== null && v !== undefined)) {
        const key = keyCells.map(cellKey).join(',');
        const first = keyToFile.get(key);
        if (first !== undefined) throw new DuplicateKeyError(key, first, rel, line);
        keyToFile.set(key, rel);
      }
      rows.push(row);
    }
  }

  return { table: table.fqn, files: files.map(f => toRelative(options.rootDir, f)), rows };
}

function mapSourcePath(table: IrTable): string {
  for (const effect of table.effects) {
    if (effect.kind === 'load' && effect.source.type === 'Map') return effect.source.path;
  }
  throw new DataLoadError(`Table '${table.fqn}' has no @load(type: "Map", path: ...) source`);
}

function readRows(converter: RowConverter, table: IrTable, file: string, rel: string): { row: Row; line: number }[] {
  let records: CsvRecord[];
  try {
    records = parseCsv(readFileSync(file, 'utf-8'));
  } catch (err) {
    if (err instanceof CsvParseError) throw new DataLoadError(err.message.replace(/^Line \d+: /, ''), rel, err.line);
    throw err;
  }
  if (records.length === 0) return [];

  const [header, ...body] = records;
  const columns = new Map<string, number>();
  header.cells.forEach((name, i) => {
    if (columns.has(name)) throw new DataLoadError(`Duplicate column '${name}'`, rel, header.line);
    if (!table.fields.some(f => f.name === name)) {
      throw new DataLoadError(`Unknown column '${name}' for table '${table.fqn}'`, rel, header.line);
    }
    columns.set(name, i);
  });

  return body.map(record => {
    if (record.cells.length > header.cells.length) {
      throw new DataLoadError(`Expected ${header.cells.length} cell(s), found ${record.cells.length}`, rel, record.line);
    }
    const row: Row = {};
    for (const field of table.fields) {
      const index = columns.get(field.name);
      const cell = index === undefined ? undefined : record.cells[index] ?? '';
      try {
        row[field.name] = converter.field(field, cell);
      } catch (err) {
        if (err instanceof CellError) throw new DataLoadError(`Column '${field.name}': ${err.message}`, rel, record.line);
        throw err;
      }
    }
    return { row, line: record.line };
  });
}

function cellKey(value: CellValue | undefined): string {
  if (value === undefined || value === null) return '(null)';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

// ---- Conversion ----

class RowConverter {
  constructor(private readonly ir: Ir) {}

  /** `cell` is undefined when the column is absent from the file. */
  field(field: IrField, cell: string | undefined): CellValue {
    const { cardinality } = field.type;
    if (cell === undefined || (cell === '' && !isStringLike(field.type.base, cardinality))) {
      if (field.default !== undefined) return this.literal(field.type.base, field.default);
      if (cardinality === 'optional') return null;
      if (cardinality === 'array') return [];
      if (field.autoIncrement) return null;
      throw new CellError(cell === undefined ? 'missing column' : 'value required');
    }

    if (cardinality === 'array') {
      return this.json(field.type.base, parseJson(cell), true);
    }
    return this.scalar(field.type.base, cell);
  }

  private scalar(base: IrTypeBase, cell: string): CellValue {
    switch (base.kind) {
      case 'primitive':
        return convertPrimitive(base.name, cell);
      case 'enum':
        return this.enumVariant(base.fqn, cell);
      case 'table': {
        const target = this.ir.tables[base.handle];
        const key = target.fields.find(f => f.primaryKey);
        if (!key) throw new CellError(`table '${target.fqn}' has no primary key to reference`);
        return this.scalar(key.type.base, cell);
      }
      case 'embed':
        return this.json(base, parseJson(cell), false);
    }
  }

  private enumVariant(fqn: string, cell: string): string {
    const en = this.ir.enums[fqn];
    const byName = en.variants.find(v => v.name === cell);
    if (byName) return byName.name;
    if (/^-?\d+$/.test(cell)) {
      const byValue = en.variants.find(v => v.value === Number(cell));
      if (byValue) return byValue.name;
    }
    throw new CellError(`'${cell}' is not a variant of ${en.name}`);
  }

  /** Convert a parsed JSON cell (arrays and embeds) by type. */
  private json(base: IrTypeBase, value: unknown, array: boolean): CellValue {
    if (array) {
      if (!Array.isArray(value)) throw new CellError('expected a JSON array');
      return value.map((item: unknown) => this.json(base, item, false));
    }
    if (base.kind === 'embed') {
      if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new CellError('expected a JSON object');
      }
      const embed = this.ir.embeds[base.fqn];
      const out: Row = {};
      for (const f of embed.fields) {
        const member: unknown = Object.getOwnPropertyDescriptor(value, f.name)?.value;
        if (member === undefined || member === null) {
          if (f.default !== undefined) out[f.name] = this.literal(f.type.base, f.default);
          else if (f.type.cardinality === 'optional') out[f.name] = null;
          else if (f.type.cardinality === 'array') out[f.name] = [];
          else throw new CellError(`missing member '${f.name}'`);
          continue;
        }
        out[f.name] = this.json(f.type.base, member, f.type.cardinality === 'array');
      }
      return out;
    }
    if (typeof value === 'string') return this.scalar(base, value);
    if (typeof value === 'number' || typeof value === 'boolean') return this.scalar(base, String(value));
    throw new CellError(`unexpected JSON value ${JSON.stringify(value)}`);
  }

  private literal(base: IrTypeBase, lit: Literal): CellValue {
    if (lit.kind === 'boolean') return lit.value;
    if (base.kind === 'enum') return this.enumVariant(base.fqn, String(lit.value));
    return this.scalar(base, String(lit.value));
  }
}

function isStringLike(base: IrTypeBase, cardinality: IrField['type']['cardinality']): boolean {
  return cardinality === 'scalar' && base.kind === 'primitive' && base.name === 'string';
}

function parseJson(cell: string): unknown {
  try {
    const value: unknown = JSON.parse(cell);
    return value;
  } catch (err) {
    if (err instanceof SyntaxError) throw new CellError(`invalid JSON: ${err.message}`);
    throw err;
  }
}

function convertPrimitive(type: PrimitiveType, cell: string): CellValue {
  if (INTEGER_TYPES.has(type)) {
    if (!/^[+-]?\d+$/.test(cell)) throw new CellError(`'${cell}' is not an integer`);
    const value = BigInt(cell);
    const [min, max] = INTEGER_BOUNDS[type];
    if (value < min || value > max) {
      throw new CellError(`${cell} is out of range for ${type}${UNSIGNED_TYPES.has(type) ? ' (unsigned)' : ''}`);
    }
    return BIGINT_TYPES.has(type) ? value : Number(value);
  }
  if (FLOAT_TYPES.has(type)) {
    const value = Number(cell);
    if (cell.trim() === '' || Number.isNaN(value)) throw new CellError(`'${cell}' is not a number`);
    return value;
  }
  switch (type) {
    case 'bool': {
      const lower = cell.toLowerCase();
      if (lower === 'true' || lower === '1') return true;
      if (lower === 'false' || lower === '0') return false;
      throw new CellError(`'${cell}' is not a boolean`);
    }
    case 'timestamp': {
      const date = /^-?\d+$/.test(cell) ? new Date(Number(cell)) : new Date(cell);
      if (Number.isNaN(date.getTime())) throw new CellError(`'${cell}' is not a timestamp`);
      return date;
    }
    case 'bytes':
      return new Uint8Array(Buffer.from(cell, 'base64'));
    default:
      return cell;
  }
}
