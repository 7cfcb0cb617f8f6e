import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import type { FlagLookup } from '../types/index.js';
import { FlagsFileNotFoundError } from './errors.js';
import { getRelativePath } from './scanner.js';

export class FlagRegistry implements FlagLookup {
  private entries = new Map<string, string>();

  register(key: string, flagString: string): void {
    this.entries.set(key, flagString);
  }

  lookup(normalizedRelPath: string, baseName: string): string | undefined {
    // An empty flag string counts as no entry
    return this.entries.get(normalizedRelPath) || this.entries.get(baseName) || undefined;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

export interface DirectoryFlagToken {
  dir: string;
  flags: string;
}

/** Splits `dir:flags` at the first colon; null when there is none. */
export function splitDirectoryFlag(token: string): DirectoryFlagToken | null {
  const colon = token.indexOf(':');
  if (colon === -1) return null;

  return {
    dir: token.slice(0, colon),
    flags: token.slice(colon + 1).trimStart(),
  };
}

/**
 * Stores flags for `dir`. An existing directory is keyed by its path
 * relative to the invocation root as well as by the literal text.
 */
export function registerDirectoryFlag(
  registry: FlagRegistry,
  dir: string,
  flags: string,
  invocationRoot: string
): void {
  const absPath = resolve(invocationRoot, dir);
  if (existsSync(absPath)) {
    registry.register(getRelativePath(absPath, invocationRoot), flags);
  }
  registry.register(dir, flags);
}

export function loadFlagsFile(registry: FlagRegistry, file: string, invocationRoot: string): number {
  const absPath = resolve(invocationRoot, file);
  if (!existsSync(absPath) || !statSync(absPath).isFile()) {
    throw new FlagsFileNotFoundError(file);
  }

  const content = readFileSync(absPath, 'utf-8');
  let loaded = 0;

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const parsed = splitDirectoryFlag(line);
    if (!parsed) continue;

    registerDirectoryFlag(registry, parsed.dir, parsed.flags, invocationRoot);
    loaded++;
  }

  return loaded;
}
