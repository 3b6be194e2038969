/**
 * Mermaid Generator
 *
 * Builds a class-diagram model from the IR, then renders it to schema.mmd.
 * Tables, reusable and nested embeds, and enums become classes; inline embeds
 * appear only as the type of the field that declares them.
 */

import type { Ir, IrField, IrTable } from '../ir/types.js';
import { emitsTo, type Generator, type OutputFile } from './types.js';

// ---- Model ----

export interface MermaidClass {
  id: string;
  fqn: string;
  stereotype?: string;
  members: string[];
}

export interface MermaidEdge {
  from: string;
  to: string;
  arrow: '-->' | '--' | '*--' | '..>';
  fromLabel?: string;
  toLabel?: string;
  label: string;
}

export interface MermaidModel {
  sections: { namespace: string; classes: MermaidClass[] }[];
  edges: MermaidEdge[];
}

export function mermaidId(fqn: string): string {
  return fqn.replace(/::/g, '__').replace(/[^A-Za-z0-9_]/g, '_');
}

const CONSTRAINT_MARKERS: Partial<Record<string, string>> = {
  primary_key: 'PK',
  unique: 'UK',
  index: 'IDX',
  foreign_key: 'FK',
  auto_increment: 'AI',
};

function member(field: IrField): string {
  const markers = field.constraints
    .map(c => CONSTRAINT_MARKERS[c.kind])
    .filter((m): m is string => m !== undefined);
  const suffix = markers.length > 0 ? ` ${markers.join(',')}` : '';
  return `+${field.type.display} ${field.name}${suffix}`;
}

export function buildMermaidModel(ir: Ir): MermaidModel {
  const included = new Set(ir.tables.filter(t => emitsTo(t, 'mermaid')).map(t => t.handle));
  const edges: MermaidEdge[] = [];
  const sections: MermaidModel['sections'] = [];

  const typeEdges = (ownerFqn: string, fields: readonly IrField[]) => {
    for (const f of fields) {
      const base = f.type.base;
      if (base.kind === 'embed' && ir.embeds[base.fqn]?.classification !== 'inline') {
        edges.push({ from: mermaidId(ownerFqn), to: mermaidId(base.fqn), arrow: '*--', label: f.name });
      } else if (base.kind === 'enum' && ir.enums[base.fqn]?.classification !== 'inline') {
        edges.push({ from: mermaidId(ownerFqn), to: mermaidId(base.fqn), arrow: '..>', label: f.name });
      }
    }
  };

  const nestedClasses = (fqns: readonly string[], out: MermaidClass[]) => {
    for (const fqn of fqns) {
      const embed = ir.embeds[fqn];
      if (embed) {
        out.push({ id: mermaidId(fqn), fqn, stereotype: 'embed', members: embed.fields.map(member) });
        typeEdges(fqn, embed.fields);
        nestedClasses(embed.nested, out);
        continue;
      }
      const en = ir.enums[fqn];
      if (en) {
        out.push({ id: mermaidId(fqn), fqn, stereotype: 'enumeration', members: en.variants.map(v => `${v.name} = ${v.value}`) });
      }
    }
  };

  for (const ns of ir.namespaces) {
    const classes: MermaidClass[] = [];
    for (const item of ns.items) {
      if (item.kind === 'table') {
        const table = ir.tables[item.handle];
        if (!included.has(table.handle)) continue;
        classes.push(tableClass(table));
        typeEdges(table.fqn, table.fields);
        nestedClasses(table.nested, classes);
      } else {
        nestedClasses([item.fqn], classes);
      }
    }
    if (classes.length > 0) sections.push({ namespace: ns.fqn, classes });
  }

  for (const rel of ir.relationships) {
    if (!included.has(rel.source) || !included.has(rel.target)) continue;
    edges.push({
      from: mermaidId(ir.tables[rel.source].fqn),
      to: mermaidId(ir.tables[rel.target].fqn),
      arrow: '-->',
      fromLabel: rel.reverse.cardinality,
      toLabel: rel.cardinality,
      label: `${rel.field} / ${rel.reverse.name}`,
    });
  }

  for (const m2m of ir.manyToMany) {
    if (![m2m.junction, m2m.left.table, m2m.right.table].every(h => included.has(h))) continue;
    edges.push({
      from: mermaidId(ir.tables[m2m.left.table].fqn),
      to: mermaidId(ir.tables[m2m.right.table].fqn),
      arrow: '--',
      fromLabel: '*',
      toLabel: '*',
      label: `via ${ir.tables[m2m.junction].name}`,
    });
  }

  return { sections, edges };
}

function tableClass(table: IrTable): MermaidClass {
  const cls: MermaidClass = { id: mermaidId(table.fqn), fqn: table.fqn, members: table.fields.map(member) };
  if (table.annotations.length > 0) {
    cls.stereotype = table.annotations.map(a => `@${a.name}`).join(' ');
  }
  return cls;
}

// ---- Render ----

export function renderMermaid(model: MermaidModel): string {
  const lines: string[] = [];
  lines.push('classDiagram');

  for (const section of model.sections) {
    lines.push(`  %% namespace ${section.namespace === '' ? '<root>' : section.namespace}`);
    for (const cls of section.classes) {
      lines.push(`  class ${cls.id} {`);
      if (cls.stereotype) lines.push(`    <<${cls.stereotype}>>`);
      for (const m of cls.members) lines.push(`    ${m}`);
      lines.push('  }');
    }
  }

  if (model.edges.length > 0) lines.push('');
  for (const e of model.edges) {
    const from = e.fromLabel !== undefined ? `${e.from} "${e.fromLabel}"` : e.from;
    const to = e.toLabel !== undefined ? `"${e.toLabel}" ${e.to}` : e.to;
    lines.push(`  ${from} ${e.arrow} ${to} : ${e.label}`);
  }

  lines.push('');
  return lines.join('\n');
}

export const mermaidGenerator: Generator = {
  target: 'mermaid',
  generate(ir: Ir): OutputFile[] {
    return [{ path: 'schema.mmd', content: renderMermaid(buildMermaidModel(ir)) }];
  },
};
