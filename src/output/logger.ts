import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export type DiagnosticSink = (message: string) => void;

// Diagnostics go to stderr so stdout carries only the tree
const stderrSink: DiagnosticSink = (message) => {
  console.error(message);
};

export class Logger {
  constructor(
    private level: LogLevel,
    private sink: DiagnosticSink = stderrSink
  ) {}

  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      this.sink(chalk.dim(`DEBUG: ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      this.sink(`INFO: ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      this.sink(chalk.yellow(`Warning: ${message}`));
    }
  }

  error(message: string): void {
    if (this.enabled('error')) {
      this.sink(chalk.red(`Error: ${message}`));
    }
  }
}
