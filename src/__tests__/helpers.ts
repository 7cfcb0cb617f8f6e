import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LineSink } from '../types/index.js';

export interface Layout {
  [name: string]: string | Layout;
}

export function makeTempDir(prefix = 'lstree-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dirPath: string | null): void {
  if (dirPath) {
    rmSync(dirPath, { recursive: true, force: true });
  }
}

/** Strings become files with that content, objects become directories. */
export function writeLayout(root: string, layout: Layout): void {
  for (const [name, value] of Object.entries(layout)) {
    const target = join(root, name);
    if (typeof value === 'string') {
      writeFileSync(target, value);
    } else {
      mkdirSync(target, { recursive: true });
      writeLayout(target, value);
    }
  }
}

/** Collects the walker's output lines in memory. */
export function bufferSink(): { sink: LineSink; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    sink: (line) => {
      lines.push(line);
    },
  };
}
