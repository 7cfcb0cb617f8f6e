import type { DirectoryLister, IgnoreOracle, LineSink, TreeConfig } from '../types/index.js';
import type { Logger } from '../output/logger.js';
import { FlagsFileNotFoundError } from './errors.js';
import { IgnoreFilter } from './filter.js';
import { FlagRegistry, loadFlagsFile } from './registry.js';
import { planRoots } from './targets.js';
import { TreeWalker, rootContext } from './walker.js';

export interface TreeDependencies {
  lister: DirectoryLister;
  oracle: IgnoreOracle;
  findRepoRoot: (cwd: string) => string | null;
  write: LineSink;
  logger: Logger;
}

export function buildRegistry(config: TreeConfig, logger: Logger): FlagRegistry {
  const registry = new FlagRegistry();
  if (!config.flagsFile) {
    return registry;
  }

  try {
    const loaded = loadFlagsFile(registry, config.flagsFile, config.invocationRoot);
    logger.info(`Loaded ${loaded} entries from flags file '${config.flagsFile}'`);
  } catch (error) {
    if (error instanceof FlagsFileNotFoundError) {
      logger.warn(error.message);
    } else {
      throw error;
    }
  }
  return registry;
}

/** Prints one tree per planned root. Missing targets are reported and skipped. */
export function printTrees(config: TreeConfig, deps: TreeDependencies): void {
  const { logger } = deps;

  const repoRoot = deps.findRepoRoot(config.invocationRoot);
  if (!repoRoot) {
    logger.warn('Not in a Git repository. .gitignore rules will not be applied.');
  }

  // File entries go in first so command-line tokens override them
  const registry = buildRegistry(config, logger);
  const steps = planRoots(config.targets, registry, config.invocationRoot);
  logger.debug(`Registered flag keys: ${registry.keys().map((key) => `'${key}'`).join(', ') || '(none)'}`);

  const walker = new TreeWalker({
    invocationRoot: config.invocationRoot,
    registry,
    filter: new IgnoreFilter({ repoRoot, oracle: deps.oracle, logger }),
    lister: deps.lister,
    write: deps.write,
    logger,
  });

  for (const step of steps) {
    if (step.kind === 'skip') {
      logger.error(`Path '${step.target}' does not exist or is not a directory. Skipping.`);
      continue;
    }

    deps.write(step.header);
    walker.walk(rootContext(step.path, step.prioritizedNames));
  }
}
