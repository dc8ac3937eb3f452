/**
 * Input discovery
 */

import fs from 'fs/promises';
import path from 'path';
import { extensionOf } from '@docnamer/shared';

export const DEFAULT_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg', '.tiff', '.bmp', '.gif', '.txt'];

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function normalizeExtensions(extensions: readonly string[]): Set<string> {
  return new Set(extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()));
}

/**
 * Every document under `dir` (recursive) with one of the extensions, in a
 * stable sorted order. Hidden entries and `skipDirs` are not entered.
 * A .txt that is the sidecar of another document is not a document itself.
 */
export async function listDocuments(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS,
  skipDirs: readonly string[] = []
): Promise<string[]> {
  const wanted = normalizeExtensions(extensions);
  const skipped = new Set(skipDirs.map((d) => path.resolve(d)));
  const found: string[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (!skipped.has(path.resolve(full))) await walk(full);
      } else if (entry.isFile() && wanted.has(extensionOf(entry.name))) {
        found.push(full);
      }
    }
  }

  await walk(dir);

  const stems = new Set(
    found.filter((f) => extensionOf(f) !== '.txt').map((f) => path.join(path.dirname(f), path.parse(f).name))
  );
  return found
    .filter((f) => extensionOf(f) !== '.txt' || !stems.has(path.join(path.dirname(f), path.parse(f).name)))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * File names directly inside `dir`; empty when it does not exist yet.
 */
export async function listFileNames(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name);
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}
