/**
 * Schema Lexer — tokenizes schema source text into a token stream.
 *
 * `//` and `/* *\/` comments are dropped; `///` doc comments survive as tokens
 * so they can be attached to the definition that follows.
 *
 * Permissive: unknown characters emit a 'symbol' token rather than throwing,
 * the parser reports them with a position.
 */

import { SchemaLexError } from './errors.js';

export type TokenKind =
  | 'keyword'        // namespace, table, enum, embed, import
  | 'identifier'     // names, constraint names, enum variants
  | 'primitive'      // string, bool, u32, f64, ...
  | 'annotation'     // @load, @taggable, ...
  | 'doc_comment'    // /// text
  | 'string'         // "..."
  | 'integer'        // 42, -7
  | 'float'          // 0.5, -1.25
  | 'boolean'        // true, false
  | 'open_brace'     // {
  | 'close_brace'    // }
  | 'open_paren'     // (
  | 'close_paren'    // )
  | 'open_bracket'   // [
  | 'close_bracket'  // ]
  | 'colon'          // :
  | 'semicolon'      // ;
  | 'comma'          // ,
  | 'dot'            // .
  | 'question'       // ?
  | 'equals'         // =
  | 'star'           // *
  | 'symbol'         // generic fallback for unexpected chars
  | 'eof';

export interface Token {
  kind: TokenKind;
  value: string;
  line: number;
  col: number;
}

export const KEYWORDS = new Set(['namespace', 'table', 'enum', 'embed', 'import']);

export const PRIMITIVE_TYPES = new Set([
  'string', 'bool', 'bytes', 'timestamp',
  'i8', 'i16', 'i32', 'i64',
  'u8', 'u16', 'u32', 'u64',
  'f32', 'f64',
]);

const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
  '{': 'open_brace',
  '}': 'close_brace',
  '(': 'open_paren',
  ')': 'close_paren',
  '[': 'open_bracket',
  ']': 'close_bracket',
  ':': 'colon',
  ';': 'semicolon',
  ',': 'comma',
  '.': 'dot',
  '?': 'question',
  '=': 'equals',
  '*': 'star',
};

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\' };

export class Lexer {
  private src: string;
  private pos = 0;
  private line = 1;
  private col = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.src = source;
  }

  tokenize(): Token[] {
    while (this.pos < this.src.length) {
      this.skipWhitespace();
      if (this.pos >= this.src.length) break;

      const ch = this.src[this.pos];
      const next = this.src[this.pos + 1];

      // Comments
      if (ch === '/' && next === '/') {
        if (this.src[this.pos + 2] === '/' && this.src[this.pos + 3] !== '/') {
          this.readDocComment();
        } else {
          this.skipLineComment();
        }
        continue;
      }
      if (ch === '/' && next === '*') {
        this.skipBlockComment();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (ch === '@') {
        this.readAnnotation();
        continue;
      }

      // Number, including a leading minus for range/default literals
      if (this.isDigit(ch) || (ch === '-' && next !== undefined && this.isDigit(next))) {
        this.readNumber();
        continue;
      }

      if (ch in SINGLE_CHAR_TOKENS) {
        this.push(SINGLE_CHAR_TOKENS[ch], ch);
        this.advance();
        continue;
      }

      if (this.isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      this.push('symbol', ch);
      this.advance();
    }

    this.tokens.push({ kind: 'eof', value: '', line: this.line, col: this.col });
    return this.tokens;
  }

  // ---- Helpers ----

  private push(kind: TokenKind, value: string, line = this.line, col = this.col) {
    this.tokens.push({ kind, value, line, col });
  }

  private advance(): string {
    const ch = this.src[this.pos];
    this.pos++;
    if (ch === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }

  private skipWhitespace() {
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\uFEFF') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private skipLineComment() {
    while (this.pos < this.src.length && this.src[this.pos] !== '\n') {
      this.advance();
    }
  }

  private skipBlockComment() {
    const startLine = this.line;
    const startCol = this.col;
    this.advance(); // /
    this.advance(); // *
    while (this.pos < this.src.length) {
      if (this.src[this.pos] === '*' && this.src[this.pos + 1] === '/') {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }
    throw new SchemaLexError('Unterminated block comment', startLine, startCol);
  }

  private readDocComment() {
    const startLine = this.line;
    const startCol = this.col;
    this.advance();
    this.advance();
    this.advance(); // ///
    let text = '';
    while (this.pos < this.src.length && this.src[this.pos] !== '\n') {
      text += this.advance();
    }
    this.push('doc_comment', text.trim(), startLine, startCol);
  }

  private readString() {
    const startLine = this.line;
    const startCol = this.col;
    this.advance(); // opening "
    let value = '';
    while (this.pos < this.src.length && this.src[this.pos] !== '"') {
      if (this.src[this.pos] === '\n') break;
      if (this.src[this.pos] === '\\' && this.pos + 1 < this.src.length) {
        this.advance();
        const esc = this.advance();
        value += ESCAPES[esc] ?? esc;
      } else {
        value += this.advance();
      }
    }
    if (this.pos >= this.src.length || this.src[this.pos] !== '"') {
      throw new SchemaLexError('Unterminated string literal', startLine, startCol);
    }
    this.advance(); // closing "
    this.push('string', value, startLine, startCol);
  }

  private readAnnotation() {
    const startCol = this.col;
    this.advance(); // @
    let name = '';
    while (this.pos < this.src.length && this.isIdentChar(this.src[this.pos])) {
      name += this.advance();
    }
    if (!name) {
      throw new SchemaLexError("Expected annotation name after '@'", this.line, startCol);
    }
    this.push('annotation', name, this.line, startCol);
  }

  private readNumber() {
    const startCol = this.col;
    let num = '';
    if (this.src[this.pos] === '-') num += this.advance();
    while (this.pos < this.src.length && this.isDigit(this.src[this.pos])) {
      num += this.advance();
    }
    let kind: TokenKind = 'integer';
    if (this.src[this.pos] === '.' && this.isDigit(this.src[this.pos + 1] ?? '')) {
      kind = 'float';
      num += this.advance(); // .
      while (this.pos < this.src.length && this.isDigit(this.src[this.pos])) {
        num += this.advance();
      }
    }
    this.push(kind, num, this.line, startCol);
  }

  private readIdentifier() {
    const startCol = this.col;
    let id = '';
    while (this.pos < this.src.length && this.isIdentChar(this.src[this.pos])) {
      id += this.advance();
    }
    if (id === 'true' || id === 'false') {
      this.push('boolean', id, this.line, startCol);
    } else if (KEYWORDS.has(id)) {
      this.push('keyword', id, this.line, startCol);
    } else if (PRIMITIVE_TYPES.has(id)) {
      this.push('primitive', id, this.line, startCol);
    } else {
      this.push('identifier', id, this.line, startCol);
    }
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isIdentStart(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isIdentChar(ch: string): boolean {
    return this.isIdentStart(ch) || this.isDigit(ch);
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
