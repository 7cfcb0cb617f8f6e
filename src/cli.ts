#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';

import type { CLIOptions } from './types/index.js';
import { buildConfig, extractFlagsFile, getDefaultOptions } from './config/builder.js';
import { FsDirectoryLister } from './core/scanner.js';
import { GitCheckIgnoreOracle, findRepoRoot } from './core/git.js';
import { printTrees } from './core/tree.js';
import { Logger } from './output/logger.js';
import { stdoutSink } from './output/writer.js';
import { AlwaysIgnore, FlagTokens } from './constants/defaults.js';

const HELP_AFTER = `
Options handled before parsing:
  ${FlagTokens.FLAGS_FILE} <file>         Load directory-specific flags from a file

Per-directory flags (as "directory:flags", quoted):
  -d, --depth <n>                 Maximum recursion depth below that directory
  -s, --structure-only            Show directories only, no files
  -f, --files-only-at-level <n>   Show files only at depth n, directories elsewhere

Flags file format:
  One "directory:flags" pair per line; blank lines and lines starting with # are skipped.
    pg_data:-d 1 -s
    logs:-f 2
    tmp:-d 0

Behavior:
  - No arguments, or only ".": show the current directory
  - "." with other directories: show the current directory, those directories first
  - Only directories: show each directory's tree in turn
  - Per-directory flags apply when the walk reaches a matching directory

Examples:
  $ lstree src lib
  $ lstree . src lib
  $ lstree src "pg_data:-d 1 -s" "logs:-f 2"
  $ lstree . "./data:-d 1 -s"
  $ lstree -ff flags.txt src

Always ignored: ${[...AlwaysIgnore].join(', ')}
Inside a Git repository, entries matched by .gitignore are left out.
Set LSTREE_LOG_LEVEL (debug, info, warn, error, silent) or LSTREE_DEBUG=1 for diagnostics.
`;

const rawArgs = process.argv.slice(2);
const wantsHelp = rawArgs.some((arg) => arg === '-h' || arg === '--help');
// Help pre-empts everything, -ff included; commander then skips it as an unknown option
const { flagsFile, rest } = wantsHelp ? { flagsFile: undefined, rest: rawArgs } : extractFlagsFile(rawArgs);

const program = new Command();

program
  .name('lstree')
  .description('Print a directory tree with connectors, honoring .gitignore and per-directory flags')
  .argument('[targets...]', 'Directories, "." and "directory:flags" tokens')
  .helpOption('-h, --help', 'Show this help message')
  .allowUnknownOption()
  .addHelpText('after', HELP_AFTER)
  .action((targets: string[]) => {
    try {
      run(targets);
    } catch (error) {
      console.error(chalk.red(`❌ Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });

function run(targets: string[]): void {
  const options: CLIOptions = {
    ...getDefaultOptions(),
    flagsFile,
    targets,
  };

  const config = buildConfig(options, process.cwd());
  const logger = new Logger(config.logLevel);

  printTrees(config, {
    lister: new FsDirectoryLister(logger),
    oracle: new GitCheckIgnoreOracle(),
    findRepoRoot,
    write: stdoutSink(),
    logger,
  });
}

program.parse(rest, { from: 'user' });
