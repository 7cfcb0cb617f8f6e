import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join, relative } from 'node:path';
import type { DirectoryLister, Entry, EntryKind } from '../types/index.js';
import type { Logger } from '../output/logger.js';

function classify(dirent: Dirent, absPath: string): EntryKind | null {
  if (dirent.isDirectory()) return 'directory';
  if (dirent.isFile()) return 'file';
  if (!dirent.isSymbolicLink()) return null;

  // Links are shown as whatever they point at; dangling ones are dropped
  try {
    const stat = statSync(absPath);
    if (stat.isDirectory()) return 'directory';
    if (stat.isFile()) return 'file';
  } catch {
    return null;
  }
  return null;
}

export class FsDirectoryLister implements DirectoryLister {
  constructor(private logger?: Logger) {}

  list(dirPath: string): Entry[] {
    let dirents: Dirent[];
    try {
      dirents = readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      this.logger?.debug(`Cannot list '${dirPath}': ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }

    const entries: Entry[] = [];
    for (const dirent of dirents) {
      const path = join(dirPath, dirent.name);
      const kind = classify(dirent, path);
      if (kind) {
        entries.push({ path, name: dirent.name, kind, isSymbolicLink: dirent.isSymbolicLink() });
      }
    }
    return entries;
  }
}

/** Path of `absPath` below `rootDir` with forward slashes; '' for the root itself. */
export function getRelativePath(absPath: string, rootDir: string): string {
  return toPosixPath(relative(rootDir, absPath));
}

export function toPosixPath(path: string): string {
  return path.split('\\').join('/');
}

export function compareNames(a: string, b: string): number {
  // UTF-8 byte order, like `sort` under the C locale
  return Buffer.compare(Buffer.from(a), Buffer.from(b));
}
