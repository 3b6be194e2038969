/**
 * TypeScript Generator
 *
 * Emits schema.ts: one TypeScript namespace per schema namespace, enums,
 * interfaces for tables and named embeds (inline embeds stay inline object
 * types), and a write<Name>/read<Name> binary codec pair per interface built
 * on `schemaforge/runtime`.
 */

import type { PrimitiveType } from '../ast/types.js';
import type { Ir, IrEmbed, IrEnum, IrField, IrRelationship, IrTable, IrTypeBase, TableHandle } from '../ir/types.js';
import { pascalCase } from '../ir/names.js';
import { emitsTo, type Generator, type OutputFile } from './types.js';

// ---- Model ----

export interface TsField {
  name: string;
  type: string;
  optional: boolean;
  /** Statement writing `v.<name>` with writer `w`. */
  write: string;
  /** Expression reading the value with reader `r`. */
  read: string;
  doc: string[];
}

export interface TsInterface {
  name: string;
  fields: TsField[];
  doc: string[];
}

export interface TsEnum {
  name: string;
  variants: { name: string; value: number }[];
  doc: string[];
}

export interface TsNamespace {
  /** Empty for the root namespace. */
  path: string[];
  enums: TsEnum[];
  interfaces: TsInterface[];
}

export interface TsModel {
  namespaces: TsNamespace[];
}

const PRIMITIVE_TS: Record<PrimitiveType, string> = {
  string: 'string',
  bool: 'boolean',
  bytes: 'Uint8Array',
  timestamp: 'Date',
  i8: 'number', i16: 'number', i32: 'number', i64: 'bigint',
  u8: 'number', u16: 'number', u32: 'number', u64: 'bigint',
  f32: 'number', f64: 'number',
};

const PRIMITIVE_CODEC: Record<PrimitiveType, string> = {
  string: 'String',
  bool: 'Bool',
  bytes: 'Bytes',
  timestamp: 'Timestamp',
  i8: 'I8', i16: 'I16', i32: 'I32', i64: 'I64',
  u8: 'U8', u16: 'U16', u32: 'U32', u64: 'U64',
  f32: 'F32', f64: 'F64',
};

class TsModelBuilder {
  /** FQN of a table, embed or enum → generated local name */
  private readonly names = new Map<string, string>();
  private readonly byNamespace = new Map<string, TsNamespace>();

  constructor(private readonly ir: Ir) {}

  build(): TsModel {
    for (const table of this.ir.tables) this.names.set(table.fqn, table.name);
    for (const embed of Object.values(this.ir.embeds)) this.names.set(embed.fqn, this.localName(embed));
    for (const en of Object.values(this.ir.enums)) this.names.set(en.fqn, this.localName(en));

    const emitted = this.emittedTables();
    for (const ns of this.ir.namespaces) {
      const target = this.namespace(ns.fqn);
      for (const item of ns.items) {
        if (item.kind === 'table') {
          const table = this.ir.tables[item.handle];
          if (!emitted.has(table.handle)) continue;
          this.addNested(table.nested, target);
          this.addInlineEnums(table.fields, target);
          target.interfaces.push(this.tableInterface(table));
        } else {
          this.addNested([item.fqn], target);
        }
      }
    }

    return { namespaces: [...this.byNamespace.values()].filter(ns => ns.enums.length + ns.interfaces.length > 0) };
  }

  /**
   * Tables routed to this target by `@output`, plus every table their fields
   * reference, so the emitted types never name a missing interface.
   */
  private emittedTables(): Set<TableHandle> {
    const emitted = new Set<TableHandle>();
    const seenEmbeds = new Set<string>();
    const visitFields = (fields: readonly IrField[]): void => {
      for (const f of fields) {
        const base = f.type.base;
        if (base.kind === 'table') visitTable(base.handle);
        else if (base.kind === 'embed' && !seenEmbeds.has(base.fqn)) {
          seenEmbeds.add(base.fqn);
          visitFields(this.ir.embeds[base.fqn].fields);
        }
      }
    };
    const visitTable = (handle: TableHandle): void => {
      if (emitted.has(handle)) return;
      emitted.add(handle);
      visitFields(this.ir.tables[handle].fields);
    };
    for (const table of this.ir.tables) {
      if (emitsTo(table, 'typescript')) visitTable(table.handle);
    }
    return emitted;
  }

  private namespace(fqn: string): TsNamespace {
    let ns = this.byNamespace.get(fqn);
    if (!ns) {
      ns = { path: fqn === '' ? [] : fqn.split('.'), enums: [], interfaces: [] };
      this.byNamespace.set(fqn, ns);
    }
    return ns;
  }

  /** Owner name + type name for nested types, owner name + PascalCase(field) for inline ones. */
  private localName(def: IrEmbed | IrEnum): string {
    if (def.owner === undefined) return def.name;
    return `${this.names.get(def.owner) ?? pascalCase(def.owner.replace(/.*[.:]/, ''))}${def.name}`;
  }

  private qualified(fqn: string, namespace: string): string {
    const local = this.names.get(fqn) ?? fqn;
    return namespace === '' ? local : `${namespace}.${local}`;
  }

  private addNested(fqns: readonly string[], target: TsNamespace): void {
    for (const fqn of fqns) {
      const embed = this.ir.embeds[fqn];
      if (embed) {
        this.addNested(embed.nested, target);
        this.addInlineEnums(embed.fields, target);
        target.interfaces.push(this.interfaceFor(this.names.get(fqn) ?? embed.name, embed.fields, docLines(embed.doc)));
        continue;
      }
      const en = this.ir.enums[fqn];
      if (en) target.enums.push(this.enumFor(en));
    }
  }

  /** Inline enums need a named TypeScript enum; inline embeds do not. */
  private addInlineEnums(fields: readonly IrField[], target: TsNamespace): void {
    for (const f of fields) {
      const base = f.type.base;
      if (base.kind === 'enum' && this.ir.enums[base.fqn]?.classification === 'inline') {
        target.enums.push(this.enumFor(this.ir.enums[base.fqn]));
      } else if (base.kind === 'embed' && this.ir.embeds[base.fqn]?.classification === 'inline') {
        const inline = this.ir.embeds[base.fqn];
        this.addNested(inline.nested, target);
        this.addInlineEnums(inline.fields, target);
      }
    }
  }

  private enumFor(en: IrEnum): TsEnum {
    return {
      name: this.names.get(en.fqn) ?? en.name,
      variants: en.variants.map(v => ({ name: v.name, value: v.value })),
      doc: docLines(en.doc),
    };
  }

  private tableInterface(table: IrTable): TsInterface {
    const iface = this.interfaceFor(table.name, table.fields, docLines(table.doc));
    for (const id of table.outgoing) {
      const rel = this.ir.relationships[id];
      const field = iface.fields.find(f => f.name === rel.field);
      if (field) field.doc.push(this.relationshipDoc(rel));
    }
    return iface;
  }

  private relationshipDoc(rel: IrRelationship): string {
    const target = this.ir.tables[rel.target];
    return `References ${target.fqn}.${rel.targetField} (${rel.cardinality}); reverse '${rel.reverse.name}' (${rel.reverse.cardinality})`;
  }

  private interfaceFor(name: string, fields: readonly IrField[], doc: string[]): TsInterface {
    return { name, fields: fields.map(f => this.field(f)), doc };
  }

  private field(f: IrField): TsField {
    const access = `v.${f.name}`;
    const elem = this.baseType(f.type.base);
    let type = elem;
    let write: string;
    let read: string;

    switch (f.type.cardinality) {
      case 'scalar':
        write = this.writeValue(f.type.base, access, 0);
        read = this.readValue(f.type.base, 0);
        break;
      case 'optional':
        write = `w.writeOptional(${access}, (x0) => ${this.writeValue(f.type.base, 'x0', 1)});`;
        read = `r.readOptional(() => ${this.readValue(f.type.base, 1)})`;
        break;
      case 'array':
        type = elem.startsWith('{') ? `Array<${elem}>` : `${elem}[]`;
        write = `w.writeArray(${access}, (x0) => ${this.writeValue(f.type.base, 'x0', 1)});`;
        read = `r.readArray(() => ${this.readValue(f.type.base, 1)})`;
        break;
    }

    return {
      name: f.name,
      type,
      optional: f.type.cardinality === 'optional',
      write: write.endsWith(';') || write.endsWith('}') ? write : `${write};`,
      read,
      doc: docLines(f.doc),
    };
  }

  private baseType(base: IrTypeBase): string {
    switch (base.kind) {
      case 'primitive':
        return PRIMITIVE_TS[base.name];
      case 'table':
        return this.qualified(this.ir.tables[base.handle].fqn, this.ir.tables[base.handle].namespace);
      case 'enum':
        return this.qualified(base.fqn, this.ir.enums[base.fqn].namespace);
      case 'embed': {
        const embed = this.ir.embeds[base.fqn];
        if (embed.classification !== 'inline') return this.qualified(base.fqn, embed.namespace);
        const members = embed.fields.map(f => {
          const t = this.baseType(f.type.base);
          if (f.type.cardinality === 'optional') return `${f.name}?: ${t}`;
          if (f.type.cardinality === 'array') return `${f.name}: ${t.startsWith('{') ? `Array<${t}>` : `${t}[]`}`;
          return `${f.name}: ${t}`;
        });
        return `{ ${members.join('; ')} }`;
      }
    }
  }

  /** Expression writing `value`; depth keeps nested lambda parameters distinct. */
  private writeValue(base: IrTypeBase, value: string, depth: number): string {
    switch (base.kind) {
      case 'primitive':
        return `w.write${PRIMITIVE_CODEC[base.name]}(${value})`;
      case 'enum':
        return `w.writeEnum(${value})`;
      case 'table': {
        const t = this.ir.tables[base.handle];
        return `${this.codecName('write', t.fqn, t.namespace)}(w, ${value})`;
      }
      case 'embed': {
        const embed = this.ir.embeds[base.fqn];
        if (embed.classification !== 'inline') return `${this.codecName('write', base.fqn, embed.namespace)}(w, ${value})`;
        const stmts = embed.fields.map(f => this.writeMember(f, `${value}.${f.name}`, depth + 1));
        return `{ ${stmts.join(' ')} }`;
      }
    }
  }

  private writeMember(f: IrField, access: string, depth: number): string {
    const x = `x${depth}`;
    switch (f.type.cardinality) {
      case 'scalar': {
        const expr = this.writeValue(f.type.base, access, depth);
        return expr.startsWith('{') ? expr : `${expr};`;
      }
      case 'optional':
        return `w.writeOptional(${access}, (${x}) => ${this.writeValue(f.type.base, x, depth + 1)});`;
      case 'array':
        return `w.writeArray(${access}, (${x}) => ${this.writeValue(f.type.base, x, depth + 1)});`;
    }
  }

  private readValue(base: IrTypeBase, depth: number): string {
    switch (base.kind) {
      case 'primitive':
        return `r.read${PRIMITIVE_CODEC[base.name]}()`;
      case 'enum':
        return `r.readEnum()`;
      case 'table': {
        const t = this.ir.tables[base.handle];
        return `${this.codecName('read', t.fqn, t.namespace)}(r)`;
      }
      case 'embed': {
        const embed = this.ir.embeds[base.fqn];
        if (embed.classification !== 'inline') return `${this.codecName('read', base.fqn, embed.namespace)}(r)`;
        const members = embed.fields.map(f => `${f.name}: ${this.readMember(f, depth + 1)}`);
        return `({ ${members.join(', ')} })`;
      }
    }
  }

  private readMember(f: IrField, depth: number): string {
    switch (f.type.cardinality) {
      case 'scalar': return this.readValue(f.type.base, depth);
      case 'optional': return `r.readOptional(() => ${this.readValue(f.type.base, depth + 1)})`;
      case 'array': return `r.readArray(() => ${this.readValue(f.type.base, depth + 1)})`;
    }
  }

  private codecName(kind: 'write' | 'read', fqn: string, namespace: string): string {
    const local = `${kind}${this.names.get(fqn) ?? fqn}`;
    return namespace === '' ? local : `${namespace}.${local}`;
  }
}

function docLines(doc: string | undefined): string[] {
  return doc === undefined ? [] : doc.split('\n');
}

export function buildTypeScriptModel(ir: Ir): TsModel {
  return new TsModelBuilder(ir).build();
}

// ---- Render ----

function renderDoc(doc: string[], indent: string, lines: string[]): void {
  if (doc.length === 0) return;
  if (doc.length === 1) {
    lines.push(`${indent}/** ${doc[0]} */`);
    return;
  }
  lines.push(`${indent}/**`);
  for (const d of doc) lines.push(`${indent} * ${d}`);
  lines.push(`${indent} */`);
}

export function renderTypeScript(model: TsModel): string {
  const lines: string[] = [];
  lines.push('// Generated by schemaforge. Do not edit; regenerate from the schema source.');
  lines.push('');
  lines.push("import { BinaryReader, BinaryWriter } from 'schemaforge/runtime';");

  for (const ns of model.namespaces) {
    lines.push('');
    const inNamespace = ns.path.length > 0;
    const indent = inNamespace ? '  ' : '';
    if (inNamespace) lines.push(`export namespace ${ns.path.join('.')} {`);

    const blocks: string[][] = [];
    for (const en of ns.enums) {
      const block: string[] = [];
      renderDoc(en.doc, indent, block);
      block.push(`${indent}export enum ${en.name} {`);
      for (const v of en.variants) block.push(`${indent}  ${v.name} = ${v.value},`);
      block.push(`${indent}}`);
      blocks.push(block);
    }

    for (const iface of ns.interfaces) {
      const block: string[] = [];
      renderDoc(iface.doc, indent, block);
      block.push(`${indent}export interface ${iface.name} {`);
      for (const f of iface.fields) {
        renderDoc(f.doc, `${indent}  `, block);
        block.push(`${indent}  ${f.name}${f.optional ? '?' : ''}: ${f.type};`);
      }
      block.push(`${indent}}`);
      block.push('');
      block.push(`${indent}export function write${iface.name}(w: BinaryWriter, v: ${iface.name}): void {`);
      for (const f of iface.fields) block.push(`${indent}  ${f.write}`);
      block.push(`${indent}}`);
      block.push('');
      block.push(`${indent}export function read${iface.name}(r: BinaryReader): ${iface.name} {`);
      if (iface.fields.length === 0) {
        block.push(`${indent}  return {};`);
      } else {
        block.push(`${indent}  return {`);
        for (const f of iface.fields) block.push(`${indent}    ${f.name}: ${f.read},`);
        block.push(`${indent}  };`);
      }
      block.push(`${indent}}`);
      blocks.push(block);
    }

    blocks.forEach((block, i) => {
      if (i > 0) lines.push('');
      lines.push(...block);
    });

    if (inNamespace) lines.push('}');
  }

  lines.push('');
  return lines.join('\n');
}

export const typescriptGenerator: Generator = {
  target: 'typescript',
  generate(ir: Ir): OutputFile[] {
    return [{ path: 'schema.ts', content: renderTypeScript(buildTypeScriptModel(ir)) }];
  },
};
