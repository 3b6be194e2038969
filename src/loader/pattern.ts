/**
 * Resolves a data-file pattern to concrete files:
 *   - directory (`data/players/` or an existing directory): every file with `extension`
 *   - glob (`data/players_*.csv`): `*` and `?` in the last path segment
 *   - anything else: that single file, when it exists
 *
 * Results are absolute paths sorted case-insensitively.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { basename, dirname, isAbsolute, join, resolve } from 'path';

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const ch of glob) {
    if (ch === '*') source += '[^/\\\\]*';
    else if (ch === '?') source += '[^/\\\\]';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export function compareIgnoreCase(a: string, b: string): number {
  const ua = a.toUpperCase();
  const ub = b.toUpperCase();
  if (ua !== ub) return ua < ub ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function filesIn(dir: string, accept: (name: string) => boolean): string[] {
  if (!isDirectory(dir)) return [];
  return readdirSync(dir)
    .filter(name => accept(name) && isFile(join(dir, name)))
    .map(name => join(dir, name));
}

export function resolvePattern(rootDir: string, pattern: string, extension = '.csv'): string[] {
  if (pattern === '') return [];

  const normalized = pattern.replace(/\\/g, '/');
  const full = isAbsolute(normalized) ? normalized : resolve(rootDir, normalized);

  let files: string[];
  if (normalized.endsWith('/') || (isDirectory(full) && !isFile(full))) {
    files = filesIn(full, name => name.toLowerCase().endsWith(extension.toLowerCase()));
  } else if (normalized.includes('*') || normalized.includes('?')) {
    const matcher = globToRegExp(basename(full));
    files = filesIn(dirname(full), name => matcher.test(name));
  } else {
    files = isFile(full) ? [full] : [];
  }

  return files.sort(compareIgnoreCase);
}
