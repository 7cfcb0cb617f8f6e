import type { LineSink } from '../types/index.js';

export function stdoutSink(): LineSink {
  return (line) => {
    console.log(line);
  };
}

