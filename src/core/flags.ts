import type { DirectoryFlags } from '../types/index.js';
import { FlagTokens } from '../constants/defaults.js';

export const DEFAULT_FLAGS: DirectoryFlags = Object.freeze({ structureOnly: false });

function matches(token: string, names: readonly string[]): boolean {
  return names.includes(token);
}

function toLevel(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * Parses a per-directory flag string such as `-d 1 -s`.
 *
 * Unknown tokens are skipped. A value flag at the end of the string
 * leaves its field unset; a repeated flag keeps its last value.
 */
export function parseFlags(flagString?: string): DirectoryFlags {
  if (!flagString) return DEFAULT_FLAGS;

  const tokens = flagString.trim().split(/\s+/).filter(Boolean);
  let maxDepth: number | undefined;
  let structureOnly = false;
  let filesOnlyAtLevel: number | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]!;

    if (matches(token, FlagTokens.DEPTH)) {
      i++;
      if (i < tokens.length) {
        maxDepth = toLevel(tokens[i]);
      }
    } else if (matches(token, FlagTokens.STRUCTURE_ONLY)) {
      structureOnly = true;
    } else if (matches(token, FlagTokens.FILES_ONLY_AT_LEVEL)) {
      i++;
      if (i < tokens.length) {
        filesOnlyAtLevel = toLevel(tokens[i]);
      }
    }
  }

  return Object.freeze({ maxDepth, structureOnly, filesOnlyAtLevel });
}
