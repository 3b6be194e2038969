import { Command } from 'commander';
import { COMPILER_VERSION } from '../diagnostics.js';
import { consoleIO, runCheck, runCompile, runIr, runLoad, type CliIO } from './commands.js';

/** Builds the command tree; actions set `process.exitCode` instead of exiting. */
export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('schemaforge')
    .description('Schema compiler for table, embed and enum definitions')
    .version(COMPILER_VERSION);

  program
    .command('compile')
    .description('Validate a schema and generate TypeScript and Mermaid output')
    .argument('[entry]', 'Entry schema file (defaults to "schema" in the config file)')
    .option('-o, --output <dir>', 'Output directory (default: output)')
    .option('-t, --targets <list>', 'Comma-separated generators: typescript, mermaid')
    .option('--no-incremental', 'Rewrite every output file')
    .option('--composite-keys', 'Allow several primary_key fields per table')
    .option('-c, --config <file>', 'Config file (default: schemaforge.config.json)')
    .option('--json', 'Print the diagnostic result as JSON')
    .option('-q, --quiet', 'Only set the exit code')
    .action((entry: string | undefined, options: Record<string, unknown>) => {
      process.exitCode = runCompile(io, entry, {
        output: stringOption(options.output),
        targets: stringOption(options.targets),
        incremental: options.incremental !== false,
        compositeKeys: options.compositeKeys === true,
        config: stringOption(options.config),
        json: options.json === true,
        quiet: options.quiet === true,
      });
    });

  program
    .command('check')
    .description('Report diagnostics without generating output')
    .argument('[entry]', 'Entry schema file')
    .option('--composite-keys', 'Allow several primary_key fields per table')
    .option('-c, --config <file>', 'Config file (default: schemaforge.config.json)')
    .option('--json', 'Print the diagnostic result as JSON')
    .option('-q, --quiet', 'Only set the exit code')
    .action((entry: string | undefined, options: Record<string, unknown>) => {
      process.exitCode = runCheck(io, entry, common(options));
    });

  program
    .command('ir')
    .description('Print the resolved intermediate representation as JSON')
    .argument('[entry]', 'Entry schema file')
    .option('--composite-keys', 'Allow several primary_key fields per table')
    .option('-c, --config <file>', 'Config file (default: schemaforge.config.json)')
    .option('--json', 'Print diagnostics as JSON on failure')
    .action((entry: string | undefined, options: Record<string, unknown>) => {
      process.exitCode = runIr(io, entry, common(options));
    });

  program
    .command('load')
    .description('Load the data files of a @load(type: "Map") table and print the rows as JSON')
    .argument('<entry>', 'Entry schema file')
    .argument('<table>', 'Table name or fully qualified name')
    .option('-d, --data-dir <dir>', 'Directory data paths are resolved against (default: the schema directory)')
    .option('--composite-keys', 'Allow several primary_key fields per table')
    .option('-c, --config <file>', 'Config file (default: schemaforge.config.json)')
    .option('--json', 'Print errors as JSON')
    .action((entry: string, table: string, options: Record<string, unknown>) => {
      process.exitCode = runLoad(io, entry, table, { ...common(options), dataDir: stringOption(options.dataDir) });
    });

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function common(options: Record<string, unknown>) {
  return {
    compositeKeys: options.compositeKeys === true,
    config: stringOption(options.config),
    json: options.json === true,
    quiet: options.quiet === true,
  };
}
