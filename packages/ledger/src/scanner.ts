import { readdirSync, statSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import path from 'node:path';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function isDirectory(targetPath: string): boolean {
  try {
    return statSync(targetPath).isDirectory();
  } catch {
    return false;
  }
}

function isRegularFile(targetPath: string, entry: Dirent): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return statSync(targetPath).isFile();
  } catch {
    return false;
  }
}

function readEntries(dir: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch {
    // unreadable subdirectories contribute nothing
    return [];
  }
}

function collect(dir: string, out: string[]): void {
  for (const entry of readEntries(dir)) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      collect(fullPath, out);
      continue;
    }
    if (isRegularFile(fullPath, entry) && YAML_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      out.push(fullPath);
    }
  }
}

/**
 * Every `.yaml`/`.yml` file below `baseDir`, at any depth, sorted by full path.
 * Symlinked files count; symlinked directories are skipped. A missing base directory
 * yields an empty list.
 */
export function scanYamlFiles(baseDir: string): string[] {
  if (!isDirectory(baseDir)) {
    return [];
  }
  const files: string[] = [];
  collect(baseDir, files);
  return files.sort(compareCodeUnits);
}

export function hasPathSegment(filePath: string, segment: string): boolean {
  return filePath.split(/[\\/]+/).includes(segment);
}
