/**
 * Incremental Output Cache
 *
 * Computes file-level diffs between compile runs to skip unchanged files.
 * Uses SHA-256 (Node built-in crypto) for content hashing.
 */

import { createHash } from 'crypto';
import { readFileSync, writeFileSync, mkdirSync, existsSync, unlinkSync } from 'fs';
import { join, dirname } from 'path';
import { z } from 'zod';
import type { OutputFile } from './types.js';

// ---- Hashing ----

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

// ---- Manifest ----

const manifestSchema = z.object({
  version: z.literal(1),
  sourceHash: z.string(),
  files: z.record(z.string()), // path → content hash
  timestamp: z.number(),
});

export type CacheManifest = z.infer<typeof manifestSchema>;

export const MANIFEST_DIR = '.schemaforge-cache';
const MANIFEST_FILE = 'manifest.json';

/** Previous manifest, or null when absent, unreadable or from another format version. */
export function loadManifest(outDir: string): CacheManifest | null {
  const manifestPath = join(outDir, MANIFEST_DIR, MANIFEST_FILE);
  if (!existsSync(manifestPath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  const parsed = manifestSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function saveManifest(outDir: string, manifest: CacheManifest): void {
  const dir = join(outDir, MANIFEST_DIR);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
}

// ---- Incremental Diff ----

export interface IncrementalResult {
  changedFiles: OutputFile[];
  removedPaths: string[];
  skipped: number;
}

/**
 * Diff `files` against the manifest in `outDir` and save the new manifest.
 * A file is unchanged when its hash matches and it still exists on disk.
 */
export function computeIncremental(
  sourceHash: string,
  files: readonly OutputFile[],
  outDir: string,
): IncrementalResult {
  const prev = loadManifest(outDir);

  const newFileHashes: Record<string, string> = {};
  for (const f of files) newFileHashes[f.path] = hashContent(f.content);

  const changedFiles: OutputFile[] = [];
  let skipped = 0;
  for (const f of files) {
    if (prev && prev.files[f.path] === newFileHashes[f.path] && existsSync(join(outDir, f.path))) {
      skipped++;
    } else {
      changedFiles.push(f);
    }
  }

  const newPaths = new Set(files.map(f => f.path));
  const removedPaths = prev ? Object.keys(prev.files).filter(p => !newPaths.has(p)).sort() : [];

  saveManifest(outDir, { version: 1, sourceHash, files: newFileHashes, timestamp: Date.now() });

  return { changedFiles, removedPaths, skipped };
}

// ---- Writing ----

export interface WriteSummary {
  written: string[];
  removed: string[];
  skipped: number;
}

/** Write generated files into `outDir`, incrementally unless `incremental` is false. */
export function writeOutput(
  files: readonly OutputFile[],
  outDir: string,
  options: { sourceHash: string; incremental: boolean },
): WriteSummary {
  const plan: IncrementalResult = options.incremental
    ? computeIncremental(options.sourceHash, files, outDir)
    : { changedFiles: [...files], removedPaths: [], skipped: 0 };

  for (const f of plan.changedFiles) {
    const fullPath = join(outDir, f.path);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, f.content);
  }

  const removed: string[] = [];
  for (const p of plan.removedPaths) {
    const fullPath = join(outDir, p);
    if (existsSync(fullPath)) {
      unlinkSync(fullPath);
      removed.push(p);
    }
  }

  return { written: plan.changedFiles.map(f => f.path), removed, skipped: plan.skipped };
}
