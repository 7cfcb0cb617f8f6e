import { basename } from 'node:path';
import type {
  DirectoryFlags,
  DirectoryLister,
  Entry,
  FlagLookup,
  LineSink,
  WalkContext,
} from '../types/index.js';
import type { Logger } from '../output/logger.js';
import type { IgnoreFilter } from './filter.js';
import { parseFlags } from './flags.js';
import { compareNames, getRelativePath } from './scanner.js';
import { Defaults, FOLDER_MARKER, GLYPH_CHILD, GLYPH_LAST, GLYPH_PIPE, GLYPH_SPACE } from '../constants/defaults.js';

export interface TreeWalkerOptions {
  /** Directory that relative flag keys are resolved against. */
  invocationRoot: string;
  registry: FlagLookup;
  filter: IgnoreFilter;
  lister: DirectoryLister;
  write: LineSink;
  logger?: Logger | undefined;
}

interface EffectiveFlags extends DirectoryFlags {
  depthSinceFlagOrigin: number;
}

function byName(a: Entry, b: Entry): number {
  return compareNames(a.name, b.name);
}

export function rootContext(path: string, prioritizedNames: readonly string[] = []): WalkContext {
  return {
    path,
    indent: '',
    prioritizedNames,
    maxDepth: undefined,
    absoluteDepth: 0,
    structureOnly: false,
    filesOnlyAtLevel: undefined,
    depthSinceFlagOrigin: 0,
  };
}

export class TreeWalker {
  constructor(private options: TreeWalkerOptions) {}

  walk(context: WalkContext): void {
    const flags = this.resolveFlags(context);
    const { dirs, files } = this.select(this.listVisible(context.path), context, flags);
    const entries = [...dirs, ...files];

    entries.forEach((entry, index) => {
      const isLast = index === entries.length - 1;
      const connector = isLast ? GLYPH_LAST : GLYPH_CHILD;

      if (entry.kind === 'file') {
        this.options.write(`${context.indent}${connector}${entry.name}`);
        return;
      }

      this.options.write(`${context.indent}${connector}${FOLDER_MARKER}${entry.name}`);

      if (entry.isSymbolicLink) {
        this.options.logger?.debug(`Not descending into '${entry.path}': symbolic link`);
        return;
      }

      // Without a limit the counter stays 0 until some descendant sets one
      const childDepthSinceOrigin = flags.maxDepth !== undefined ? flags.depthSinceFlagOrigin + 1 : 0;
      if (flags.maxDepth !== undefined && childDepthSinceOrigin >= flags.maxDepth) {
        this.options.logger?.debug(`Not descending into '${entry.path}': depth limit ${flags.maxDepth} reached`);
        return;
      }

      this.walk({
        path: entry.path,
        indent: context.indent + (isLast ? GLYPH_SPACE : GLYPH_PIPE),
        prioritizedNames: [],
        maxDepth: flags.maxDepth,
        absoluteDepth: context.absoluteDepth + 1,
        structureOnly: flags.structureOnly,
        filesOnlyAtLevel: flags.filesOnlyAtLevel,
        depthSinceFlagOrigin: childDepthSinceOrigin,
      });
    });
  }

  private resolveFlags(context: WalkContext): EffectiveFlags {
    const relPath = getRelativePath(context.path, this.options.invocationRoot);
    const name = relPath === '' ? Defaults.DOT : basename(context.path);
    const raw = this.options.registry.lookup(relPath, name);

    if (raw !== undefined) {
      // Own flags replace inherited ones; this directory becomes the depth origin
      const parsed = parseFlags(raw);
      this.options.logger?.debug(`Applying flags '${raw}' to '${relPath || name}'`);
      return { ...parsed, depthSinceFlagOrigin: 0 };
    }

    return {
      maxDepth: context.maxDepth,
      structureOnly: context.structureOnly,
      filesOnlyAtLevel: context.filesOnlyAtLevel,
      depthSinceFlagOrigin: context.depthSinceFlagOrigin,
    };
  }

  private listVisible(dirPath: string): Entry[] {
    return this.options.lister.list(dirPath).filter((entry) => {
      const result = this.options.filter.check(entry.path);
      if (!result.passes) {
        this.options.logger?.debug(`Skipping '${entry.path}': ${result.reason}`);
      }
      return result.passes;
    });
  }

  private select(
    children: Entry[],
    context: WalkContext,
    flags: EffectiveFlags
  ): { dirs: Entry[]; files: Entry[] } {
    const dirs = children.filter((entry) => entry.kind === 'directory').sort(byName);
    const files = children.filter((entry) => entry.kind === 'file').sort(byName);

    if (flags.filesOnlyAtLevel !== undefined) {
      return context.absoluteDepth + 1 === flags.filesOnlyAtLevel
        ? { dirs: [], files }
        : { dirs, files: [] };
    }

    const shownFiles = flags.structureOnly ? [] : files;

    if (context.prioritizedNames.length > 0) {
      const wanted = new Set(context.prioritizedNames);
      const first = dirs.filter((entry) => wanted.has(entry.name));
      const rest = dirs.filter((entry) => !wanted.has(entry.name));
      return { dirs: [...first, ...rest], files: shownFiles };
    }

    return { dirs, files: shownFiles };
  }
}
