/**
 * Annotation semantics — the closed set of recognized annotations, their
 * parameter rules, and the effect each one carries into the IR.
 *
 * The validator uses the diagnostics, the IR builder the effects; both go
 * through `interpretAnnotation` so the rules live in one place.
 */

import type { Annotation, AnnotationArg, Literal } from '../ast/types.js';
import { createDiagnostic, type Diagnostic, type DiagnosticKind } from '../diagnostics.js';

// ---- Effects ----

export type DataSource =
  | { type: 'DB' }
  | { type: 'Map'; path: string }
  | { type: 'Memory' };

export const CACHE_STRATEGIES = ['full_load', 'on_demand', 'write_through', 'write_back'] as const;
export type CacheStrategy = (typeof CACHE_STRATEGIES)[number];

export const GENERATOR_TARGETS = ['typescript', 'mermaid'] as const;
export type GeneratorTarget = (typeof GENERATOR_TARGETS)[number];

export type AnnotationEffect =
  | { kind: 'taggable' }
  | { kind: 'readonly' }
  | { kind: 'link_rows'; partitionBy: string; linkWith: string }
  | { kind: 'load'; source: DataSource }
  | { kind: 'save'; source: DataSource }
  | { kind: 'cache'; strategy: CacheStrategy }
  | { kind: 'soft_delete'; field: string }
  | { kind: 'renamed_from'; from: string }
  | { kind: 'datasource'; name: string }
  | { kind: 'index'; fields: string[]; unique: boolean }
  | { kind: 'output'; targets: GeneratorTarget[] }
  | { kind: 'opaque'; name: string; args: AnnotationArg[] };

export interface AnnotationContext {
  site: 'table' | 'namespace';
  /** Field names of the annotated table; empty for namespaces. */
  fields: ReadonlySet<string>;
}

export interface AnnotationResult {
  /** Undefined when the annotation has error diagnostics. */
  effect?: AnnotationEffect;
  diagnostics: Diagnostic[];
}

// ---- Helpers ----

function literalText(lit: Literal): string | undefined {
  return lit.kind === 'string' || lit.kind === 'identifier' ? lit.value : undefined;
}

function isOneOf<T extends string>(values: readonly T[], v: string): v is T {
  return values.some(x => x === v);
}

class Checker {
  readonly diagnostics: Diagnostic[] = [];
  private readonly positional: AnnotationArg[];

  constructor(readonly a: Annotation, readonly ctx: AnnotationContext) {
    this.positional = a.args.filter(arg => arg.key === undefined);
  }

  report(kind: DiagnosticKind, message: string, hint: string): void {
    this.diagnostics.push(createDiagnostic(kind, `@${this.a.name}: ${message}`, this.a.loc, {
      fix: { description: hint },
    }));
  }

  /** Reject keyed arguments outside `allowed` and more positionals than `maxPositional`. */
  allow(allowed: readonly string[], maxPositional: number): void {
    for (const arg of this.a.args) {
      if (arg.key !== undefined && !allowed.includes(arg.key)) {
        this.report('InvalidAnnotationParameterError', `unknown parameter '${arg.key}'`,
          allowed.length > 0 ? `Allowed parameters: ${allowed.join(', ')}` : 'Remove the parameter');
      }
    }
    if (this.positional.length > maxPositional) {
      this.report('InvalidAnnotationParameterError',
        maxPositional === 0 ? 'takes no positional parameters' : `takes at most ${maxPositional} positional parameter(s)`,
        'Remove the extra parameters');
    }
  }

  /** Keyed argument, falling back to the first positional when `positional` is set. */
  get(key: string, positional = false): Literal | undefined {
    const keyed = this.a.args.find(arg => arg.key === key);
    if (keyed) return keyed.value;
    return positional ? this.positional[0]?.value : undefined;
  }

  positionals(): Literal[] {
    return this.positional.map(arg => arg.value);
  }

  requireText(key: string, positional = false): string | undefined {
    const lit = this.get(key, positional);
    if (!lit) {
      this.report('MissingAnnotationParameterError', `missing required parameter '${key}'`,
        `Add '${key}: <value>'`);
      return undefined;
    }
    const text = literalText(lit);
    if (text === undefined) {
      this.report('InvalidAnnotationParameterError', `parameter '${key}' must be a name or string`,
        `Use '${key}: "value"'`);
    }
    return text;
  }

  requireField(key: string, positional = false): string | undefined {
    const name = this.requireText(key, positional);
    if (name !== undefined && !this.ctx.fields.has(name)) {
      this.report('InvalidAnnotationParameterError', `parameter '${key}' names unknown field '${name}'`,
        'Use the name of a field declared on this table');
      return undefined;
    }
    return name;
  }

  requireOneOf<T extends string>(key: string, values: readonly T[], positional = false): T | undefined {
    const text = this.requireText(key, positional);
    if (text === undefined) return undefined;
    if (!isOneOf(values, text)) {
      this.report('InvalidAnnotationParameterError', `invalid ${key} '${text}'`,
        `Use one of: ${values.join(', ')}`);
      return undefined;
    }
    return text;
  }

  finish(effect: AnnotationEffect | undefined): AnnotationResult {
    const failed = this.diagnostics.some(d => d.severity === 'error');
    return failed || !effect ? { diagnostics: this.diagnostics } : { effect, diagnostics: this.diagnostics };
  }
}

// ---- Interpretation ----

const DATA_SOURCE_TYPES = ['DB', 'Map', 'Memory'] as const;

export function interpretAnnotation(a: Annotation, ctx: AnnotationContext): AnnotationResult {
  const c = new Checker(a, ctx);
  const opaque: AnnotationEffect = { kind: 'opaque', name: a.name, args: a.args };

  if (ctx.site === 'namespace') {
    if (a.name !== 'datasource') return { effect: opaque, diagnostics: [] };
    c.allow(['name'], 1);
    const name = c.requireText('name', true);
    return c.finish(name !== undefined ? { kind: 'datasource', name } : undefined);
  }

  switch (a.name) {
    case 'taggable':
    case 'readonly':
      if (a.args.length > 0) {
        c.report('InvalidAnnotationParameterError', 'takes no parameters', `Write '@${a.name}'`);
      }
      return c.finish(a.name === 'taggable' ? { kind: 'taggable' } : { kind: 'readonly' });

    case 'link_rows': {
      c.allow(['partition_by', 'link_with'], 0);
      const partitionBy = c.requireField('partition_by');
      const linkWith = c.requireField('link_with');
      return c.finish(partitionBy !== undefined && linkWith !== undefined
        ? { kind: 'link_rows', partitionBy, linkWith }
        : undefined);
    }

    case 'load':
    case 'save': {
      c.allow(['type', 'path'], 0);
      const source = interpretDataSource(c);
      if (!source) return c.finish(undefined);
      return c.finish(a.name === 'load' ? { kind: 'load', source } : { kind: 'save', source });
    }

    case 'cache': {
      c.allow(['strategy'], 1);
      const strategy = c.requireOneOf('strategy', CACHE_STRATEGIES, true);
      return c.finish(strategy !== undefined ? { kind: 'cache', strategy } : undefined);
    }

    case 'soft_delete': {
      c.allow(['field'], 1);
      const field = c.requireField('field', true);
      return c.finish(field !== undefined ? { kind: 'soft_delete', field } : undefined);
    }

    case 'renamed_from': {
      c.allow(['from'], 1);
      const from = c.requireText('from', true);
      return c.finish(from !== undefined ? { kind: 'renamed_from', from } : undefined);
    }

    case 'datasource': {
      c.allow(['name'], 1);
      const name = c.requireText('name', true);
      return c.finish(name !== undefined ? { kind: 'datasource', name } : undefined);
    }

    case 'index': {
      c.allow(['unique'], Number.POSITIVE_INFINITY);
      const fields = interpretIndexFields(c);
      const uniqueLit = c.get('unique');
      let unique = false;
      if (uniqueLit) {
        if (uniqueLit.kind === 'boolean') unique = uniqueLit.value;
        else c.report('InvalidAnnotationParameterError', "parameter 'unique' must be true or false", "Write 'unique: true'");
      }
      return c.finish(fields ? { kind: 'index', fields, unique } : undefined);
    }

    case 'output': {
      c.allow([], Number.POSITIVE_INFINITY);
      const targets = interpretOutputTargets(c);
      return c.finish(targets ? { kind: 'output', targets } : undefined);
    }

    default:
      return { effect: opaque, diagnostics: [] };
  }
}

function interpretDataSource(c: Checker): DataSource | undefined {
  const type = c.requireOneOf('type', DATA_SOURCE_TYPES);
  switch (type) {
    case undefined:
      return undefined;
    case 'DB':
      return { type: 'DB' };
    case 'Memory':
      return { type: 'Memory' };
    case 'Map': {
      const path = c.get('path');
      if (!path) {
        c.report('MissingAnnotationParameterError', "type 'Map' requires a 'path' parameter",
          "Add 'path: \"<file, directory or pattern>\"'");
        return undefined;
      }
      if (path.kind !== 'string') {
        c.report('InvalidAnnotationParameterError', "parameter 'path' must be a string", 'Quote the path');
        return undefined;
      }
      return { type: 'Map', path: path.value };
    }
  }
}

function interpretIndexFields(c: Checker): string[] | undefined {
  const values = c.positionals();
  if (values.length === 0) {
    c.report('MissingAnnotationParameterError', 'requires at least one field name', 'Write @index(field_a, field_b)');
    return undefined;
  }
  const fields: string[] = [];
  for (const lit of values) {
    const name = literalText(lit);
    if (name === undefined || !c.ctx.fields.has(name)) {
      c.report('InvalidAnnotationParameterError', `unknown field '${name ?? String(lit.value)}'`,
        'Use the names of fields declared on this table');
      continue;
    }
    fields.push(name);
  }
  return fields.length === values.length ? fields : undefined;
}

function interpretOutputTargets(c: Checker): GeneratorTarget[] | undefined {
  const values = c.positionals();
  if (values.length === 0) {
    c.report('MissingAnnotationParameterError', 'requires at least one generator target',
      `Use one or more of: ${GENERATOR_TARGETS.join(', ')}`);
    return undefined;
  }
  const targets: GeneratorTarget[] = [];
  for (const lit of values) {
    const name = literalText(lit) ?? String(lit.value);
    if (!isOneOf(GENERATOR_TARGETS, name)) {
      c.report('InvalidAnnotationParameterError', `unknown generator target '${name}'`,
        `Use one or more of: ${GENERATOR_TARGETS.join(', ')}`);
      continue;
    }
    if (!targets.includes(name)) targets.push(name);
  }
  return targets.length > 0 && c.diagnostics.length === 0 ? targets : undefined;
}
