import { basename, relative } from 'node:path';
import type { IgnoreOracle } from '../types/index.js';
import type { Logger } from '../output/logger.js';
import { AlwaysIgnore } from '../constants/defaults.js';
import { toPosixPath } from './scanner.js';

export interface FilterResult {
  passes: boolean;
  reason: string;
}

export interface FilterRule {
  check(absPath: string): FilterResult;
}

const PASS: FilterResult = { passes: true, reason: '' };

class AlwaysIgnoreRule implements FilterRule {
  check(absPath: string): FilterResult {
    const name = basename(absPath);
    if (AlwaysIgnore.has(name)) {
      return { passes: false, reason: `In ignore list: ${name}` };
    }
    return PASS;
  }
}

class GitignoreRule implements FilterRule {
  constructor(
    private repoRoot: string,
    private oracle: IgnoreOracle,
    private logger?: Logger
  ) {}

  check(absPath: string): FilterResult {
    const relPath = toPosixPath(relative(this.repoRoot, absPath));
    try {
      if (this.oracle.isIgnored(this.repoRoot, relPath)) {
        return { passes: false, reason: 'Matched .gitignore' };
      }
    } catch (error) {
      // The walk goes on without this answer
      this.logger?.debug(`Ignore check failed for '${relPath}': ${error instanceof Error ? error.message : String(error)}`);
    }
    return PASS;
  }
}

export interface IgnoreFilterOptions {
  /** Absolute repository root; null skips the oracle. */
  repoRoot: string | null;
  oracle: IgnoreOracle;
  logger?: Logger | undefined;
}

export class IgnoreFilter {
  private rules: FilterRule[];

  constructor(options: IgnoreFilterOptions) {
    this.rules = [new AlwaysIgnoreRule()];
    if (options.repoRoot) {
      this.rules.push(new GitignoreRule(options.repoRoot, options.oracle, options.logger));
    }
  }

  check(absPath: string): FilterResult {
    for (const rule of this.rules) {
      const result = rule.check(absPath);
      if (!result.passes) {
        return result;
      }
    }
    return PASS;
  }

  isIgnored(absPath: string): boolean {
    return !this.check(absPath).passes;
  }
}
