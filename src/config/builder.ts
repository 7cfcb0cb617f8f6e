import type { CLIOptions, LogLevel, TreeConfig } from '../types/index.js';
import { Defaults, EnvVars, FlagTokens } from '../constants/defaults.js';
import { isLogLevel } from '../output/logger.js';

type Env = Record<string, string | undefined>;

function isTruthy(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function resolveLogLevel(env: Env): LogLevel {
  if (isTruthy(env[EnvVars.DEBUG])) {
    return 'debug';
  }

  const raw = env[EnvVars.LOG_LEVEL]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return Defaults.LOG_LEVEL;
}

/**
 * Pulls `-ff <file>` out of argv. Commander only takes one-letter short
 * flags, so this runs before it; the last occurrence wins.
 */
export function extractFlagsFile(argv: string[]): { flagsFile?: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let flagsFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;
    if (arg === FlagTokens.FLAGS_FILE) {
      flagsFile = argv[i + 1];
      i++;
      continue;
    }
    rest.push(arg);
  }

  return { flagsFile, rest };
}

export function buildConfig(options: CLIOptions, invocationRoot: string, env: Env = process.env): TreeConfig {
  return {
    invocationRoot,
    flagsFile: options.flagsFile || undefined,
    targets: [...options.targets],
    logLevel: resolveLogLevel(env),
  };
}

export function getDefaultOptions(): CLIOptions {
  return {
    targets: [],
  };
}
