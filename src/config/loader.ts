/**
 * Project configuration: `schemaforge.config.json` in the working directory,
 * or the file given with `--config`. CLI flags override file values.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { GENERATOR_TARGETS } from '../semantic/annotations.js';

export const CONFIG_FILE = 'schemaforge.config.json';

export const configSchema = z
  .object({
    schema: z.string().min(1).optional(),
    outDir: z.string().min(1).default('output'),
    targets: z.array(z.enum(GENERATOR_TARGETS)).min(1).default([...GENERATOR_TARGETS]),
    compositePrimaryKeys: z.boolean().default(false),
    incremental: z.boolean().default(true),
    dataDir: z.string().min(1).optional(),
  })
  .strict();

export type SchemaforgeConfig = z.infer<typeof configSchema>;
/** CLI-supplied values; validated together with the file. */
export type ConfigOverrides = { [K in keyof SchemaforgeConfig]?: unknown };

export class ConfigError extends Error {
  constructor(message: string, readonly file?: string) {
    super(file === undefined ? message : `${file}: ${message}`);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseConfig(raw: unknown, file?: string): SchemaforgeConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error), file);
  return parsed.data;
}

/**
 * Load the explicit config file (which must exist) or the default one in `cwd`
 * (which may not), then apply overrides that are not undefined.
 */
export function loadConfig(options: { cwd?: string; file?: string; overrides?: ConfigOverrides } = {}): SchemaforgeConfig {
  const cwd = options.cwd ?? process.cwd();
  const path = resolve(cwd, options.file ?? CONFIG_FILE);

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      if (err instanceof SyntaxError) throw new ConfigError(`Invalid JSON: ${err.message}`, path);
      throw err;
    }
  } else if (options.file !== undefined) {
    throw new ConfigError('Config file not found', path);
  }

  const base = parseConfig(raw, existsSync(path) ? path : undefined);
  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, v]) => v !== undefined),
  );
  return parseConfig({ ...base, ...overrides });
}
