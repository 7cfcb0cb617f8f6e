export const Defaults = {
  LOG_LEVEL: 'warn',
  ROOT_HEADER: './',
  DOT: '.',
} as const;

export const EnvVars = {
  LOG_LEVEL: 'LSTREE_LOG_LEVEL',
  DEBUG: 'LSTREE_DEBUG',
} as const;

// Matched against the exact basename, at any depth
export const AlwaysIgnore = new Set([
  'node_modules', '.next', '.github', '.venv', '__ARCHIVE__', '.cursor', '.vscode',
  '.git',
]);

export const FlagTokens = {
  DEPTH: ['-d', '--depth'],
  STRUCTURE_ONLY: ['-s', '--structure-only'],
  FILES_ONLY_AT_LEVEL: ['-f', '--files-only-at-level'],
  FLAGS_FILE: '-ff',
} as const;

export const GLYPH_CHILD = '├── ';
export const GLYPH_LAST = '└── ';
export const GLYPH_PIPE = '│   ';
export const GLYPH_SPACE = '    ';
export const FOLDER_MARKER = '📁 ';
