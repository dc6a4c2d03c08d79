import fs from 'node:fs';

/**
 * A destination for text output. Writes are synchronous and ordered.
 */
export interface Writer {
  write: (chunk: string) => void;
}

/**
 * Forward every write to each sink, in the order given.
 */
export function createTeeWriter(sinks: Writer[]): Writer {
  const targets = [...sinks];
  return {
    write: (chunk) => {
      for (const sink of targets) sink.write(chunk);
    }
  };
}

/**
 * File-backed sink. With `fresh`, a file already at `filePath` is removed first
 * so every run starts a new log. The file is appended to and never closed.
 */
export function createFileSink(filePath: string, opts: { fresh?: boolean } = {}): Writer {
  if (opts.fresh && fs.existsSync(filePath)) {
    fs.rmSync(filePath);
  }
  const fd = fs.openSync(filePath, 'a');
  return {
    write: (chunk) => {
      fs.writeSync(fd, chunk);
    }
  };
}

export function createStreamSink(stream: NodeJS.WritableStream): Writer {
  return {
    write: (chunk) => {
      stream.write(chunk);
    }
  };
}

/**
 * In-memory sink, mostly useful for tests and for capturing command output.
 */
export function createMemorySink(): Writer & { text: () => string } {
  const chunks: string[] = [];
  return {
    write: (chunk) => {
      chunks.push(chunk);
    },
    text: () => chunks.join('')
  };
}
