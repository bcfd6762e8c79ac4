import { readdirSync, statSync, existsSync, lstatSync } from 'fs';
import { join, relative } from 'path';

export const HEADER_EXTENSIONS = ['.h', '.hh', '.hpp', '.hxx'];

const SKIPPED_DIRS = new Set(['node_modules', 'build', 'dist']);

export function isHeaderFile(filePath: string): boolean {
  return HEADER_EXTENSIONS.some(ext => filePath.endsWith(ext));
}

/**
 * List the C++ headers under `rootDir`, relative to it and sorted.
 */
export function scanHeaders(
  rootDir: string,
  baseDir: string = rootDir
): string[] {
  const files: string[] = [];

  try {
    const entries = readdirSync(baseDir);

    for (const entry of entries) {
      const fullPath = join(baseDir, entry);

      if (entry.startsWith('.') || SKIPPED_DIRS.has(entry)) {
        continue;
      }

      // Skip symlinks
      try {
        if (lstatSync(fullPath).isSymbolicLink()) {
          continue;
        }
      } catch {
        continue;
      }

      const stats = statSync(fullPath);

      if (stats.isDirectory()) {
        files.push(...scanHeaders(rootDir, fullPath));
      } else if (stats.isFile() && isHeaderFile(entry)) {
        files.push(relative(rootDir, fullPath));
      }
    }
  } catch (err) {
    console.error(`Error scanning directory ${baseDir}:`, err);
  }

  return baseDir === rootDir ? files.sort() : files;
}

export function fileExists(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}
