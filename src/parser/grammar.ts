/**
 * Schema Grammar — recursive-descent rules producing a generic parse tree.
 *
 * Each rule consumes tokens from a TokenStream and returns a ParseNode.
 * The first structural error throws a SchemaSyntaxError carrying the exact
 * position and what was expected there. Nesting is bounded by MAX_DEPTH.
 */

import type { Token, TokenKind } from './lexer.js';
import { SchemaSyntaxError } from './errors.js';
import type { GrammarRule, ParseNode, ParseTree } from './types.js';

const MAX_DEPTH = 500;

export const CONSTRAINT_NAMES = new Set([
  'primary_key', 'unique', 'index', 'auto_increment',
  'max_length', 'default', 'range', 'regex', 'foreign_key',
]);

// ---- Token Stream ----

export class TokenStream {
  private tokens: Token[];
  private pos = 0;
  depth = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  peek(offset = 0): Token {
    const idx = this.pos + offset;
    if (idx >= this.tokens.length) return this.tokens[this.tokens.length - 1];
    return this.tokens[idx];
  }

  current(): Token {
    return this.peek();
  }

  advance(): Token {
    const t = this.tokens[this.pos];
    if (this.pos < this.tokens.length - 1) this.pos++;
    return t;
  }

  expect(kind: TokenKind, value?: string, expected?: string): Token {
    const t = this.current();
    if (t.kind !== kind || (value !== undefined && t.value !== value)) {
      throw this.error(expected ?? (value !== undefined ? `'${value}'` : describeKind(kind)));
    }
    return this.advance();
  }

  match(kind: TokenKind, value?: string): boolean {
    if (this.is(kind, value)) {
      this.advance();
      return true;
    }
    return false;
  }

  is(kind: TokenKind, value?: string): boolean {
    const t = this.current();
    return t.kind === kind && (value === undefined || t.value === value);
  }

  isEof(): boolean {
    return this.current().kind === 'eof';
  }

  error(expected: string): SchemaSyntaxError {
    const t = this.current();
    const found = t.kind === 'eof' ? 'end of file' : t.value;
    return new SchemaSyntaxError(`Expected ${expected}, got ${describeKind(t.kind)}`, {
      line: t.line,
      col: t.col,
      expected,
      found,
    });
  }

  enter(): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw this.error(`nesting depth below ${MAX_DEPTH}`);
    }
  }

  leave(): void {
    this.depth--;
  }
}

function describeKind(kind: TokenKind): string {
  switch (kind) {
    case 'open_brace': return "'{'";
    case 'close_brace': return "'}'";
    case 'open_paren': return "'('";
    case 'close_paren': return "')'";
    case 'open_bracket': return "'['";
    case 'close_bracket': return "']'";
    case 'colon': return "':'";
    case 'semicolon': return "';'";
    case 'comma': return "','";
    case 'dot': return "'.'";
    case 'question': return "'?'";
    case 'equals': return "'='";
    case 'star': return "'*'";
    case 'eof': return 'end of file';
    case 'doc_comment': return 'doc comment';
    default: return kind;
  }
}

// ---- Node helpers ----

function node(rule: GrammarRule, at: Token, children: ParseNode[] = [], value?: string): ParseNode {
  const n: ParseNode = { rule, line: at.line, col: at.col, children };
  if (value !== undefined) n.value = value;
  return n;
}

function leaf(rule: GrammarRule, t: Token): ParseNode {
  return node(rule, t, [], t.value);
}

// ---- Top level ----

export function parseSchemaRule(s: TokenStream): ParseTree {
  const start = s.current();
  const children: ParseNode[] = [];

  while (!s.isEof()) {
    if (s.is('keyword', 'import')) {
      children.push(parseFileImport(s));
      continue;
    }
    children.push(parseDefinition(s));
  }

  return { rule: 'schema', line: start.line, col: start.col, children };
}

function parseFileImport(s: TokenStream): ParseNode {
  const kw = s.expect('keyword', 'import');
  const path = s.expect('string', undefined, 'import path string');
  s.expect('semicolon');
  return node('file_import', kw, [], path.value);
}

function parseMetadata(s: TokenStream): ParseNode[] {
  const metadata: ParseNode[] = [];
  for (;;) {
    if (s.is('doc_comment')) {
      metadata.push(leaf('doc_comment', s.advance()));
    } else if (s.is('annotation')) {
      metadata.push(parseAnnotation(s));
    } else {
      return metadata;
    }
  }
}

function parseDefinition(s: TokenStream): ParseNode {
  const metadata = parseMetadata(s);
  const t = s.current();
  if (t.kind === 'keyword') {
    switch (t.value) {
      case 'namespace': return parseNamespace(s, metadata);
      case 'table': return parseStructured(s, 'table', metadata);
      case 'embed': return parseStructured(s, 'embed', metadata);
      case 'enum': return parseEnum(s, metadata);
    }
  }
  throw s.error("'namespace', 'table', 'enum' or 'embed'");
}

// ---- Namespaces ----

function parseNamespace(s: TokenStream, metadata: ParseNode[]): ParseNode {
  const kw = s.expect('keyword', 'namespace');
  s.enter();
  const children = [...metadata, parsePath(s)];
  s.expect('open_brace');

  while (!s.is('close_brace')) {
    if (s.isEof()) throw s.error("'}'");
    if (s.is('keyword', 'import')) {
      children.push(s.peek(1).kind === 'string' ? parseFileImport(s) : parseNamespaceImport(s));
      continue;
    }
    children.push(parseDefinition(s));
  }
  s.expect('close_brace');
  s.leave();
  return node('namespace', kw, children);
}

function parseNamespaceImport(s: TokenStream): ParseNode {
  const kw = s.expect('keyword', 'import');
  const first = s.expect('identifier', undefined, 'namespace path or import string');
  const segments = [leaf('name', first)];
  let wildcard: ParseNode | undefined;
  while (s.match('dot')) {
    if (s.is('star')) {
      wildcard = leaf('wildcard', s.advance());
      break;
    }
    segments.push(leaf('name', s.expect('identifier')));
  }
  s.expect('semicolon');
  const path = node('path', first, segments, segments.map(seg => seg.value).join('.'));
  return node('namespace_import', kw, wildcard ? [path, wildcard] : [path]);
}

function parsePath(s: TokenStream): ParseNode {
  const first = s.expect('identifier', undefined, 'name');
  const segments = [leaf('name', first)];
  while (s.is('dot') && s.peek(1).kind === 'identifier') {
    s.advance();
    segments.push(leaf('name', s.advance()));
  }
  return node('path', first, segments, segments.map(seg => seg.value).join('.'));
}

// ---- Tables and embeds ----

function parseStructured(s: TokenStream, rule: 'table' | 'embed', metadata: ParseNode[]): ParseNode {
  const kw = s.expect('keyword', rule);
  const name = leaf('name', s.expect('identifier', undefined, `${rule} name`));
  s.enter();
  const members = parseMemberBlock(s);
  s.leave();
  return node(rule, kw, [...metadata, name, ...members]);
}

function parseMemberBlock(s: TokenStream): ParseNode[] {
  s.expect('open_brace');
  const members: ParseNode[] = [];
  while (!s.is('close_brace')) {
    if (s.isEof()) throw s.error("'}'");
    members.push(parseMember(s));
  }
  s.expect('close_brace');
  return members;
}

function parseMember(s: TokenStream): ParseNode {
  const metadata = parseMetadata(s);
  const t = s.current();

  if (t.kind === 'keyword' && t.value === 'embed' && s.peek(1).kind === 'identifier') {
    return parseStructured(s, 'embed', metadata);
  }
  if (t.kind === 'keyword' && t.value === 'enum' && s.peek(1).kind === 'identifier') {
    return parseEnum(s, metadata);
  }
  if (t.kind === 'identifier') {
    return parseField(s, metadata);
  }
  throw s.error("field name, 'embed' or 'enum'");
}

function parseField(s: TokenStream, metadata: ParseNode[]): ParseNode {
  const nameTok = s.expect('identifier', undefined, 'field name');
  s.expect('colon');
  const type = parseFieldType(s);
  const constraints: ParseNode[] = [];
  while (!s.is('semicolon')) {
    constraints.push(parseConstraint(s));
  }
  s.expect('semicolon');
  return node('field', nameTok, [...metadata, leaf('name', nameTok), type, ...constraints]);
}

function parseFieldType(s: TokenStream): ParseNode {
  const start = s.current();
  let base: ParseNode;

  if (start.kind === 'primitive') {
    base = leaf('primitive', s.advance());
  } else if (start.kind === 'identifier') {
    base = parsePath(s);
  } else if (start.kind === 'keyword' && start.value === 'embed' && s.peek(1).kind === 'open_brace') {
    s.advance();
    s.enter();
    base = node('inline_embed', start, parseMemberBlock(s));
    s.leave();
  } else if (start.kind === 'keyword' && start.value === 'enum' && s.peek(1).kind === 'open_brace') {
    s.advance();
    base = node('inline_enum', start, parseVariantBlock(s));
  } else {
    throw s.error("type name, 'embed { ... }' or 'enum { ... }'");
  }

  const children = [base];
  if (s.is('question')) {
    children.push(leaf('cardinality', s.advance()));
  } else if (s.is('open_bracket')) {
    const open = s.advance();
    s.expect('close_bracket');
    children.push(node('cardinality', open, [], '[]'));
  }
  return node('field_type', start, children);
}

// ---- Constraints ----

function parseConstraint(s: TokenStream): ParseNode {
  const t = s.current();
  if (t.kind !== 'identifier' || !CONSTRAINT_NAMES.has(t.value)) {
    throw s.error("constraint or ';'");
  }
  s.advance();

  switch (t.value) {
    case 'max_length': {
      s.expect('open_paren');
      const n = leaf('integer', s.expect('integer', undefined, 'integer length'));
      s.expect('close_paren');
      return node('constraint', t, [n], t.value);
    }
    case 'default': {
      s.expect('open_paren');
      const lit = parseLiteral(s);
      s.expect('close_paren');
      return node('constraint', t, [lit], t.value);
    }
    case 'range': {
      s.expect('open_paren');
      const lo = parseLiteral(s);
      s.expect('comma');
      const hi = parseLiteral(s);
      s.expect('close_paren');
      return node('constraint', t, [lo, hi], t.value);
    }
    case 'regex': {
      s.expect('open_paren');
      const pattern = leaf('string', s.expect('string', undefined, 'regex pattern string'));
      s.expect('close_paren');
      return node('constraint', t, [pattern], t.value);
    }
    case 'foreign_key':
      return parseForeignKey(s, t);
    default:
      return node('constraint', t, [], t.value);
  }
}

function parseForeignKey(s: TokenStream, t: Token): ParseNode {
  s.expect('open_paren');
  if (s.is('identifier', 'target') && s.peek(1).kind === 'colon') {
    s.advance();
    s.advance();
  }
  const children = [parsePath(s)];
  if (s.match('comma')) {
    s.expect('identifier', 'as', "'as'");
    s.expect('colon');
    const alias = s.current();
    if (alias.kind !== 'string' && alias.kind !== 'identifier') {
      throw s.error('relation name');
    }
    children.push(leaf('alias', s.advance()));
  }
  s.expect('close_paren');
  if (s.is('identifier', 'as')) {
    s.advance();
    children.push(leaf('alias', s.expect('identifier', undefined, 'relation name')));
  }
  return node('constraint', t, children, t.value);
}

// ---- Enums ----

function parseEnum(s: TokenStream, metadata: ParseNode[]): ParseNode {
  const kw = s.expect('keyword', 'enum');
  const name = leaf('name', s.expect('identifier', undefined, 'enum name'));
  return node('enum', kw, [...metadata, name, ...parseVariantBlock(s)]);
}

function parseVariantBlock(s: TokenStream): ParseNode[] {
  s.expect('open_brace');
  const variants: ParseNode[] = [];
  while (!s.is('close_brace')) {
    if (s.isEof()) throw s.error("'}'");
    const metadata = parseMetadata(s);
    const nameTok = s.expect('identifier', undefined, 'enum variant name');
    const children = [...metadata, leaf('name', nameTok)];
    if (s.match('equals')) {
      children.push(leaf('integer', s.expect('integer', undefined, 'integer variant value')));
    }
    if (!s.match('semicolon')) s.match('comma');
    variants.push(node('variant', nameTok, children));
  }
  s.expect('close_brace');
  return variants;
}

// ---- Annotations and literals ----

function parseAnnotation(s: TokenStream): ParseNode {
  const t = s.expect('annotation');
  const args: ParseNode[] = [];
  if (s.match('open_paren')) {
    while (!s.is('close_paren')) {
      args.push(parseArgument(s));
      if (!s.match('comma')) break;
    }
    s.expect('close_paren', undefined, "',' or ')'");
  }
  return node('annotation', t, args, t.value);
}

function parseArgument(s: TokenStream): ParseNode {
  const start = s.current();
  if (start.kind === 'identifier' && s.peek(1).kind === 'colon') {
    const key = leaf('name', s.advance());
    s.advance(); // :
    return node('argument', start, [key, parseLiteral(s)]);
  }
  return node('argument', start, [parseLiteral(s)]);
}

function parseLiteral(s: TokenStream): ParseNode {
  const t = s.current();
  switch (t.kind) {
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
    case 'identifier':
      s.advance();
      return leaf(t.kind, t);
    default:
      throw s.error('literal value');
  }
}
