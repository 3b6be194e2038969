/**
 * Schema Parser
 *
 * Parses schema source text into a generic parse tree.
 * Architecture: Tokenizer → Token Stream → Recursive Descent → ParseTree
 */

import { tokenize } from './lexer.js';
import { TokenStream, parseSchemaRule } from './grammar.js';
import type { ParseTree } from './types.js';

export function parse(source: string): ParseTree {
  const tokens = tokenize(source);
  return parseSchemaRule(new TokenStream(tokens));
}

export { tokenize } from './lexer.js';
export { SchemaSyntaxError, SchemaLexError } from './errors.js';
export type { ParseNode, ParseTree, GrammarRule } from './types.js';
