import { execFileSync } from 'node:child_process';
import type { IgnoreOracle } from '../types/index.js';

export function findRepoRoot(cwd: string): string | null {
  try {
    const output = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd,
      encoding: 'utf-8',
      stdio: 'pipe',
    });
    const root = output.trim();
    return root || null;
  } catch {
    return null;
  }
}

function exitStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : null;
  }
  return null;
}

/** Asks `git check-ignore`, one process per path. */
export class GitCheckIgnoreOracle implements IgnoreOracle {
  isIgnored(repoRoot: string, relativePath: string): boolean {
    try {
      execFileSync('git', ['-C', repoRoot, 'check-ignore', '-q', '--', relativePath], {
        stdio: 'ignore',
      });
      return true;
    } catch (error) {
      // Exit 1 means "not ignored"; anything else is a failure of git itself
      if (exitStatus(error) === 1) return false;
      throw error;
    }
  }
}
