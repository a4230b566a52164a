import { readdirSync, statSync } from "node:fs";
import { extname, join } from "node:path";

export const IMAGE_EXTENSIONS: readonly string[] = ["jpg", "jpeg", "png", "tif", "tiff"];

export function isDirectory(path: string): boolean {
  if (path.length === 0) return false;
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

export function isFile(path: string): boolean {
  if (path.length === 0) return false;
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * List the regular files directly inside `dir` whose extension is one of
 * `extensions`. Matching ignores case and a leading dot on either side.
 * Symlinks are followed. A missing directory yields an empty list.
 * Results are sorted by file name.
 */
export function listMatchingFiles(dir: string, extensions: readonly string[]): string[] {
  if (!isDirectory(dir)) return [];

  const wanted = new Set(extensions.map(normalizeExtension));
  const results: string[] = [];

  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const ext = normalizeExtension(extname(entry.name));
    if (ext.length === 0 || !wanted.has(ext)) continue;

    const fullPath = join(dir, entry.name);
    if (entry.isFile()) {
      results.push(fullPath);
    } else if (entry.isSymbolicLink() && isFile(fullPath)) {
      results.push(fullPath);
    }
  }

  results.sort((a, b) => a.localeCompare(b));
  return results;
}

export function countMatchingFiles(dir: string, extensions: readonly string[]): number {
  return listMatchingFiles(dir, extensions).length;
}

export function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, "").toLowerCase();
}
