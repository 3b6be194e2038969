/**
 * Generic parse tree produced by the grammar.
 *
 * Nodes carry the grammar rule that produced them and, for leaves, the token
 * text. The AST builder turns this into typed definitions.
 */

export type GrammarRule =
  // structural rules
  | 'schema'
  | 'file_import'
  | 'namespace'
  | 'namespace_import'
  | 'table'
  | 'embed'
  | 'enum'
  | 'variant'
  | 'field'
  | 'field_type'
  | 'inline_embed'
  | 'inline_enum'
  | 'constraint'
  | 'annotation'
  | 'argument'
  | 'path'
  // leaves
  | 'name'
  | 'primitive'
  | 'cardinality'
  | 'wildcard'
  | 'alias'
  | 'doc_comment'
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'identifier';

export interface ParseNode {
  rule: GrammarRule;
  /** Token text for leaves, keyword/constraint name for some structural nodes. */
  value?: string;
  line: number;
  col: number;
  children: ParseNode[];
}

export type ParseTree = ParseNode & { rule: 'schema' };

export const LITERAL_RULES: ReadonlySet<GrammarRule> = new Set<GrammarRule>([
  'string', 'integer', 'float', 'boolean', 'identifier',
]);
