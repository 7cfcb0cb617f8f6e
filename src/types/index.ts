export type EntryKind = 'directory' | 'file';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface DirectoryFlags {
  readonly maxDepth?: number | undefined;
  readonly structureOnly: boolean;
  readonly filesOnlyAtLevel?: number | undefined;
}

export interface Entry {
  path: string;
  name: string;
  kind: EntryKind;
  /** Shown by its target's kind, never descended into. */
  isSymbolicLink: boolean;
}

export interface WalkContext {
  path: string;
  indent: string;
  prioritizedNames: readonly string[];
  maxDepth?: number | undefined;
  absoluteDepth: number;
  structureOnly: boolean;
  filesOnlyAtLevel?: number | undefined;
  depthSinceFlagOrigin: number;
}

export interface DirectoryLister {
  list(dirPath: string): Entry[];
}

export interface IgnoreOracle {
  /** Throws when the underlying tool is unavailable. */
  isIgnored(repoRoot: string, relativePath: string): boolean;
}

export interface FlagLookup {
  lookup(normalizedRelPath: string, baseName: string): string | undefined;
}

export type LineSink = (line: string) => void;

export interface TreeConfig {
  invocationRoot: string;
  flagsFile?: string | undefined;
  targets: string[];
  logLevel: LogLevel;
}

export interface CLIOptions {
  flagsFile?: string | undefined;
  targets: string[];
}

export interface RootWalk {
  kind: 'walk';
  /** Absolute directory handed to the walker. */
  path: string;
  header: string;
  prioritizedNames: string[];
}

/** An explicit target that is missing or not a directory. */
export interface SkippedTarget {
  kind: 'skip';
  target: string;
}

export type RootStep = RootWalk | SkippedTarget;
