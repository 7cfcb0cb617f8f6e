import { existsSync, statSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { RootStep } from '../types/index.js';
import { Defaults } from '../constants/defaults.js';
import { type FlagRegistry, registerDirectoryFlag, splitDirectoryFlag } from './registry.js';

function isDirectory(absPath: string): boolean {
  try {
    return existsSync(absPath) && statSync(absPath).isDirectory();
  } catch {
    return false;
  }
}

function stripTrailingSlashes(path: string): string {
  const stripped = path.replace(/\/+$/, '');
  return stripped || path;
}

/**
 * Turns positional arguments into root walks. `dir:flags` tokens are
 * registered first; an existing `dir` also becomes a target.
 */
export function planRoots(args: string[], registry: FlagRegistry, invocationRoot: string): RootStep[] {
  const targets: string[] = [];
  let dotRequested = false;

  for (const arg of args) {
    if (arg === Defaults.DOT) {
      dotRequested = true;
      continue;
    }

    const dirFlag = splitDirectoryFlag(arg);
    if (dirFlag) {
      registerDirectoryFlag(registry, dirFlag.dir, dirFlag.flags, invocationRoot);
      if (isDirectory(resolve(invocationRoot, dirFlag.dir))) {
        targets.push(dirFlag.dir);
      }
      continue;
    }

    targets.push(arg);
  }

  if (targets.length === 0) {
    return [{ kind: 'walk', path: invocationRoot, header: Defaults.ROOT_HEADER, prioritizedNames: [] }];
  }

  if (dotRequested) {
    return [
      {
        kind: 'walk',
        path: invocationRoot,
        header: Defaults.ROOT_HEADER,
        prioritizedNames: targets.map((target) => basename(stripTrailingSlashes(target))),
      },
    ];
  }

  return targets.map((target): RootStep => {
    const absPath = resolve(invocationRoot, target);
    return isDirectory(absPath)
      ? { kind: 'walk', path: absPath, header: `${target}/`, prioritizedNames: [] }
      : { kind: 'skip', target };
  });
}
