/**
 * schemaforge — schema compiler
 *
 * Parses schema files (tables, embeds, enums, namespaces, imports), resolves
 * and validates them, builds a relationship-aware IR, and generates
 * TypeScript and Mermaid output.
 */

export { parse, tokenize, SchemaSyntaxError, SchemaLexError } from './parser/index.js';
export { buildAst, AstBuildError } from './ast/builder.js';
export type * from './ast/types.js';
export {
  resolveSchema,
  parseFile,
  mergeFiles,
  createNodeHost,
  createMemoryHost,
  type SourceHost,
  type ResolveResult,
} from './resolver/index.js';
export { SymbolTable, type SymbolEntry, type Scope, type EmbedClassification } from './semantic/scope.js';
export { interpretAnnotation, type AnnotationEffect, type DataSource, type GeneratorTarget } from './semantic/annotations.js';
export { validate, type ValidateOptions } from './validator/index.js';
export { buildIr, IrBuildError, findTable, tableAt, type IrBuildOptions } from './ir/index.js';
export type {
  Ir,
  IrTable,
  IrField,
  IrEmbed,
  IrEnum,
  IrRelationship,
  IrManyToMany,
  IrNamespace,
  IrTypeRef,
  TableHandle,
} from './ir/types.js';
export { generate, GENERATORS, writeOutput, computeIncremental, type OutputFile, type Generator } from './generators/index.js';
export { loadTableRows, resolvePattern, DataLoadError, DuplicateKeyError, type Row, type CellValue } from './loader/index.js';
export { loadConfig, parseConfig, ConfigError, type SchemaforgeConfig } from './config/loader.js';
export { compile, type CompileOptions, type CompileResult } from './pipeline.js';
export type { Diagnostic, DiagnosticResult, DiagnosticKind, DiagnosticSeverity } from './diagnostics.js';
export {
  createDiagnostic,
  buildResult,
  hashSource,
  wrapSyntaxError,
  sortDiagnostics,
  formatDiagnosticCLI,
  SCHEMA_VERSION,
  COMPILER_VERSION,
} from './diagnostics.js';
