import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import type { IgnoreOracle, LogLevel, TreeConfig } from '../types/index.js';
import { FsDirectoryLister } from '../core/scanner.js';
import { printTrees } from '../core/tree.js';
import { Logger } from '../output/logger.js';
import { bufferSink, makeTempDir, removeTempDir, writeLayout } from './helpers.js';

const NO_REPO_WARNING = 'Warning: Not in a Git repository. .gitignore rules will not be applied.';

interface RunOptions {
  repoRoot?: string | null;
  oracle?: IgnoreOracle;
  level?: LogLevel;
}

function run(config: TreeConfig, options: RunOptions = {}): { lines: string[]; diagnostics: string[] } {
  const { sink, lines } = bufferSink();
  const diagnostics: string[] = [];
  printTrees(config, {
    lister: new FsDirectoryLister(),
    oracle: options.oracle ?? { isIgnored: () => false },
    findRepoRoot: () => options.repoRoot ?? null,
    write: sink,
    logger: new Logger(options.level ?? 'warn', (message) => diagnostics.push(message)),
  });
  return { lines, diagnostics };
}

describe('printTrees', () => {
  let root: string;

  const configFor = (targets: string[], flagsFile?: string): TreeConfig => ({
    invocationRoot: root,
    flagsFile,
    targets,
    logLevel: 'warn',
  });

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    root = makeTempDir('lstree-run-');
    writeLayout(root, {
      api: { 'a.ts': '' },
      logs: { 'app.log': '' },
      'README.md': '',
    });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('prints the invocation root under "./"', () => {
    const { lines, diagnostics } = run(configFor([]));

    expect(lines).toEqual([
      './',
      '├── 📁 api',
      '│   └── a.ts',
      '├── 📁 logs',
      '│   └── app.log',
      '└── README.md',
    ]);
    expect(diagnostics).toEqual([NO_REPO_WARNING]);
  });

  it('lists an explicit target first when combined with "."', () => {
    const { lines } = run(configFor(['.', 'logs']));

    expect(lines).toEqual([
      './',
      '├── 📁 logs',
      '│   └── app.log',
      '├── 📁 api',
      '│   └── a.ts',
      '└── README.md',
    ]);
  });

  it('prints each explicit target with its own header and reports missing ones', () => {
    const { lines, diagnostics } = run(configFor(['logs', 'nope', 'api']));

    expect(lines).toEqual(['logs/', '└── app.log', 'api/', '└── a.ts']);
    expect(diagnostics).toEqual([
      NO_REPO_WARNING,
      "Error: Path 'nope' does not exist or is not a directory. Skipping.",
    ]);
  });

  it('warns about a missing flags file and carries on', () => {
    const { lines, diagnostics } = run(configFor(['api'], 'missing.txt'));

    expect(lines).toEqual(['api/', '└── a.ts']);
    expect(diagnostics).toEqual([NO_REPO_WARNING, "Warning: Flags file 'missing.txt' not found. Ignoring."]);
  });

  it('applies flags from the flags file', () => {
    writeFileSync(join(root, 'flags.txt'), '# quiet logs\nlogs:-s\n');

    const { lines } = run(configFor(['.'], 'flags.txt'));

    expect(lines).toEqual([
      './',
      '├── 📁 api',
      '│   └── a.ts',
      '├── 📁 logs',
      '├── README.md',
      '└── flags.txt',
    ]);
  });

  it('reports how many flags-file entries were loaded at info level', () => {
    writeFileSync(join(root, 'flags.txt'), '# quiet logs\nlogs:-s\napi:-d 0\n');

    const { diagnostics } = run(configFor(['api'], 'flags.txt'), { repoRoot: root, level: 'info' });

    expect(diagnostics).toEqual(["INFO: Loaded 2 entries from flags file 'flags.txt'"]);
  });

  it('lets a command-line token override the flags file', () => {
    writeFileSync(join(root, 'flags.txt'), 'logs:-s\n');

    const { lines } = run(configFor(['.', 'logs:-d 0'], 'flags.txt'));

    expect(lines).toEqual([
      './',
      '├── 📁 logs',
      '│   └── app.log',
      '├── 📁 api',
      '│   └── a.ts',
      '├── README.md',
      '└── flags.txt',
    ]);
  });

  it('skips the advisory and filters through the oracle inside a repository', () => {
    const oracle: IgnoreOracle = { isIgnored: (_repoRoot, relativePath) => relativePath === 'logs' };

    const { lines, diagnostics } = run(configFor([]), { repoRoot: root, oracle });

    expect(lines).toEqual(['./', '├── 📁 api', '│   └── a.ts', '└── README.md']);
    expect(diagnostics).toEqual([]);
  });
});
