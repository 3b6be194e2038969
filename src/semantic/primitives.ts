import type { Literal, PrimitiveType } from '../ast/types.js';

export const INTEGER_TYPES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>([
  'i8', 'i16', 'i32', 'i64', 'u8', 'u16', 'u32', 'u64',
]);

export const UNSIGNED_TYPES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>([
  'u8', 'u16', 'u32', 'u64',
]);

export const FLOAT_TYPES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>(['f32', 'f64']);

/** Types carried as `bigint` in generated code and loaded rows. */
export const BIGINT_TYPES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>(['i64', 'u64']);

/** Inclusive bounds of each integer type. */
export const INTEGER_BOUNDS: Readonly<Record<string, readonly [bigint, bigint]>> = {
  i8: [-(2n ** 7n), 2n ** 7n - 1n],
  i16: [-(2n ** 15n), 2n ** 15n - 1n],
  i32: [-(2n ** 31n), 2n ** 31n - 1n],
  i64: [-(2n ** 63n), 2n ** 63n - 1n],
  u8: [0n, 2n ** 8n - 1n],
  u16: [0n, 2n ** 16n - 1n],
  u32: [0n, 2n ** 32n - 1n],
  u64: [0n, 2n ** 64n - 1n],
};

export function isInteger(t: PrimitiveType): boolean {
  return INTEGER_TYPES.has(t);
}

export function isNumeric(t: PrimitiveType): boolean {
  return INTEGER_TYPES.has(t) || FLOAT_TYPES.has(t);
}

export function literalToString(lit: Literal): string {
  return lit.kind === 'string' ? JSON.stringify(lit.value) : String(lit.value);
}

/** Whether a literal may stand for a value of the given primitive type. */
export function literalFits(lit: Literal, t: PrimitiveType): boolean {
  switch (t) {
    case 'string':
    case 'bytes':
      return lit.kind === 'string';
    case 'bool':
      return lit.kind === 'boolean';
    case 'timestamp':
      return lit.kind === 'integer' || lit.kind === 'string';
    case 'f32':
    case 'f64':
      return lit.kind === 'integer' || lit.kind === 'float';
    default: {
      const bounds = INTEGER_BOUNDS[t];
      if (lit.kind !== 'integer' || bounds === undefined) return false;
      const value = BigInt(lit.value);
      return value >= bounds[0] && value <= bounds[1];
    }
  }
}
