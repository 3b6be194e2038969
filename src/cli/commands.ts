/**
 * CLI command implementations. Each returns the process exit code and writes
 * through `CliIO`, so the commands run the same under the binary and in tests.
 */

import { dirname, resolve } from 'path';
import { ConfigError, loadConfig, type ConfigOverrides, type SchemaforgeConfig } from '../config/loader.js';
import { formatDiagnosticCLI, type DiagnosticResult } from '../diagnostics.js';
import { writeOutput } from '../generators/cache.js';
import { findTable } from '../ir/index.js';
import { DataLoadError, DuplicateKeyError, loadTableRows } from '../loader/index.js';
import { compile, type CompileResult } from '../pipeline.js';
import { createNodeHost } from '../resolver/host.js';

export interface CliIO {
  log(line: string): void;
  error(line: string): void;
  cwd: string;
}

export const consoleIO: CliIO = {
  log: line => console.log(line),
  error: line => console.error(line),
  get cwd() {
    return process.cwd();
  },
};

export interface CommonOptions {
  config?: string;
  json?: boolean;
  quiet?: boolean;
  compositeKeys?: boolean;
}

export interface CompileCommandOptions extends CommonOptions {
  output?: string;
  targets?: string;
  incremental?: boolean;
}

export interface LoadCommandOptions extends CommonOptions {
  dataDir?: string;
}

/** JSON with bigint as decimal strings and byte arrays as base64. */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => {
      if (typeof v === 'bigint') return v.toString();
      if (v instanceof Uint8Array) return Buffer.from(v).toString('base64');
      return v;
    },
    2,
  );
}

function banner(io: CliIO, options: CommonOptions, command: string): void {
  if (!options.json && !options.quiet) io.log(`\n  ⚡ schemaforge ${command}\n`);
}

function indent(text: string): string {
  return text.split('\n').map(l => (l === '' ? l : `  ${l}`)).join('\n');
}

function settings(io: CliIO, entry: string | undefined, options: CommonOptions, extra: ConfigOverrides = {}): SchemaforgeConfig {
  const overrides: ConfigOverrides = {
    ...extra,
    schema: entry,
    compositePrimaryKeys: options.compositeKeys ? true : undefined,
  };
  return loadConfig({ cwd: io.cwd, file: options.config, overrides });
}

function runCompilePipeline(io: CliIO, config: SchemaforgeConfig, checkOnly: boolean): CompileResult | undefined {
  if (config.schema === undefined) {
    io.error('  ERROR: No schema file given (pass <entry> or set "schema" in schemaforge.config.json)\n');
    return undefined;
  }
  return compile(resolve(io.cwd, config.schema), createNodeHost(), {
    targets: config.targets,
    compositePrimaryKeys: config.compositePrimaryKeys,
    checkOnly,
  });
}

function reportDiagnostics(io: CliIO, result: DiagnosticResult): void {
  for (const d of result.diagnostics) {
    io.log(indent(formatDiagnosticCLI(d)));
    io.log('');
  }
  const { errors, warnings } = result.summary;
  if (errors > 0) io.log(`  FAIL: ${errors} error(s), ${warnings} warning(s)\n`);
  else if (warnings > 0) io.log(`  ⚠  ${warnings} warning(s)\n`);
}

function withConfig(io: CliIO, options: CommonOptions, run: () => number): number {
  try {
    return run();
  } catch (err) {
    if (err instanceof DuplicateKeyError) {
      const diagnostic = err.toDiagnostic();
      if (options.json) io.log(toJson({ error: { name: err.name, message: err.message }, diagnostics: [diagnostic] }));
      else io.error(`${indent(formatDiagnosticCLI(diagnostic))}\n`);
      return 1;
    }
    if (err instanceof ConfigError || err instanceof DataLoadError) {
      if (options.json) io.log(toJson({ error: { name: err.name, message: err.message } }));
      else io.error(`  ERROR: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

// ---- schemaforge compile ----

export function runCompile(io: CliIO, entry: string | undefined, options: CompileCommandOptions): number {
  banner(io, options, 'Compile');
  return withConfig(io, options, () => {
    const config = settings(io, entry, options, {
      outDir: options.output,
      targets: options.targets?.split(',').map(t => t.trim()).filter(t => t !== ''),
      incremental: options.incremental === false ? false : undefined,
    });
    const compiled = runCompilePipeline(io, config, false);
    if (!compiled) return 1;

    const outDir = resolve(io.cwd, config.outDir);
    const summary = compiled.ir
      ? writeOutput(compiled.files, outDir, { sourceHash: compiled.result.source_hash, incremental: config.incremental })
      : undefined;

    if (options.json) {
      io.log(toJson({ ...compiled.result, output: summary ?? null }));
      return compiled.result.valid ? 0 : 1;
    }

    if (!options.quiet) reportDiagnostics(io, compiled.result);
    if (!compiled.result.valid || !summary) return 1;

    if (!options.quiet) {
      io.log(`  ✅ Compiled ${config.schema} → ${config.outDir}/`);
      io.log(`     → ${summary.written.length}/${compiled.files.length} files written (${summary.skipped} skipped)`);
      if (summary.removed.length > 0) io.log(`     → ${summary.removed.length} stale file(s) removed`);
      io.log('');
    }
    return 0;
  });
}

// ---- schemaforge check ----

export function runCheck(io: CliIO, entry: string | undefined, options: CommonOptions): number {
  banner(io, options, 'Check');
  return withConfig(io, options, () => {
    const config = settings(io, entry, options);
    const compiled = runCompilePipeline(io, config, true);
    if (!compiled) return 1;

    if (options.json) {
      io.log(toJson(compiled.result));
    } else if (!options.quiet) {
      reportDiagnostics(io, compiled.result);
      if (compiled.result.valid) io.log(`  ✅ ${config.schema} is valid\n`);
    }
    return compiled.result.valid ? 0 : 1;
  });
}

// ---- schemaforge ir ----

export function runIr(io: CliIO, entry: string | undefined, options: CommonOptions): number {
  return withConfig(io, options, () => {
    const config = settings(io, entry, options);
    const compiled = runCompilePipeline(io, { ...config, targets: [] }, false);
    if (!compiled) return 1;

    if (!compiled.ir) {
      if (options.json) io.log(toJson(compiled.result));
      else reportDiagnostics(io, compiled.result);
      return 1;
    }
    io.log(toJson(compiled.ir));
    return 0;
  });
}

// ---- schemaforge load ----

export function runLoad(io: CliIO, entry: string | undefined, table: string, options: LoadCommandOptions): number {
  return withConfig(io, options, () => {
    const config = settings(io, entry, options, { dataDir: options.dataDir });
    const compiled = runCompilePipeline(io, { ...config, targets: [] }, false);
    if (!compiled) return 1;

    if (!compiled.ir) {
      if (options.json) io.log(toJson(compiled.result));
      else reportDiagnostics(io, compiled.result);
      return 1;
    }

    // @load paths are relative to the file declaring the table unless --data-dir is given.
    const declared = findTable(compiled.ir, table);
    const rootDir = config.dataDir !== undefined
      ? resolve(io.cwd, config.dataDir)
      : dirname(declared ? declared.loc.file : resolve(io.cwd, config.schema ?? '.'));
    const loaded = loadTableRows(compiled.ir, table, { rootDir });
    io.log(toJson(loaded.rows));
    return 0;
  });
}
