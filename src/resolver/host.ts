/**
 * Source hosts — where the resolver reads schema text from.
 *
 * The pipeline never touches the file system directly; the CLI hands it a
 * Node host, tests and embedders hand it an in-memory one.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, resolve, posix } from 'path';

export interface SourceHost {
  /** Returns undefined when the file does not exist. */
  readFile(path: string): string | undefined;
  /** Turns an import specifier into a host path, relative to the importing file. */
  resolveImport(from: string, specifier: string): string;
  /** Canonical form of a path, so one file is never visited under two names. */
  normalize(path: string): string;
}

export function createNodeHost(): SourceHost {
  return {
    readFile(path) {
      if (!existsSync(path) || !statSync(path).isFile()) return undefined;
      return readFileSync(path, 'utf-8');
    },
    resolveImport(from, specifier) {
      return resolve(dirname(from), specifier);
    },
    normalize(path) {
      return resolve(path);
    },
  };
}

export function createMemoryHost(files: Record<string, string>): SourceHost {
  const store = new Map<string, string>();
  for (const [path, text] of Object.entries(files)) {
    store.set(posix.normalize(path), text);
  }
  return {
    readFile(path) {
      return store.get(posix.normalize(path));
    },
    resolveImport(from, specifier) {
      return posix.normalize(posix.join(posix.dirname(from), specifier));
    },
    normalize(path) {
      return posix.normalize(path);
    },
  };
}
