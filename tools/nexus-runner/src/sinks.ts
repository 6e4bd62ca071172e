import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Destination for one child output stream.
 */
export interface OutputSink {
  write(data: string | Buffer): void;
}

/**
 * stdout/stderr destinations shared by every stage of a run.
 * `close()` must be called once the run ends, whatever its outcome.
 */
export interface OutputSinks {
  stdout: OutputSink;
  stderr: OutputSink;
  close(): Promise<void>;
  /** Buffered stderr, for sinks that keep output in memory. */
  stderrText?(): string;
}

export interface LogSinks extends OutputSinks {
  stdoutPath: string;
  stderrPath: string;
}

export interface CaptureSinks extends OutputSinks {
  stdoutText(): string;
  stderrText(): string;
}

/**
 * Minimal writable stream interface for dependency injection.
 */
export interface WritableLike {
  write(chunk: string | Buffer): boolean;
  end(cb: () => void): void;
  once(event: 'open', listener: () => void): void;
  once(event: 'error', listener: (err: Error) => void): void;
  readonly errored: Error | null;
}

/**
 * Injectable dependencies for openLogSinks.
 * Defaults to real implementations; tests can override.
 */
export interface SinkDeps {
  createWriteStream: (filePath: string) => WritableLike;
}

const defaultDeps: SinkDeps = {
  createWriteStream: (filePath: string) => fs.createWriteStream(filePath, { flags: 'w' }),
};

/**
 * Log file names for a case: `<case>.o.log` and `<case>.e.log`.
 */
export function logFileNames(inputCase: string): { stdout: string; stderr: string } {
  return {
    stdout: `${inputCase}.o.log`,
    stderr: `${inputCase}.e.log`,
  };
}

/**
 * Resolve once the file behind `stream` is open. The error listener stays
 * attached afterwards; later write errors are reported by endStream.
 */
function waitForOpen(stream: WritableLike, filePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.once('open', () => resolve());
    stream.once('error', (err: Error) => {
      reject(new Error(`Cannot open log file ${filePath}: ${err.message}`));
    });
  });
}

function endStream(stream: WritableLike): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.errored) {
      reject(stream.errored);
      return;
    }
    stream.once('error', reject);
    stream.end(() => {
      if (stream.errored) reject(stream.errored);
      else resolve();
    });
  });
}

/**
 * Open the two log files for a case inside `dir`, truncating any previous run.
 * Rejects when either file cannot be opened; a file that did open is closed again.
 */
export async function openLogSinks(inputCase: string, dir: string, deps: Partial<SinkDeps> = {}): Promise<LogSinks> {
  const { createWriteStream } = { ...defaultDeps, ...deps };
  const names = logFileNames(inputCase);
  const stdoutPath = path.join(dir, names.stdout);
  const stderrPath = path.join(dir, names.stderr);

  const out = createWriteStream(stdoutPath);
  const err = createWriteStream(stderrPath);

  const opened = await Promise.allSettled([waitForOpen(out, stdoutPath), waitForOpen(err, stderrPath)]);
  const failure = opened.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) {
    const openStreams = [out, err].filter((_, i) => opened[i]?.status === 'fulfilled');
    await Promise.allSettled(openStreams.map(endStream));
    throw failure.reason instanceof Error ? failure.reason : new Error(String(failure.reason));
  }

  let closing: Promise<void> | undefined;

  return {
    stdoutPath,
    stderrPath,
    stdout: {
      write(data: string | Buffer): void {
        out.write(data);
      },
    },
    stderr: {
      write(data: string | Buffer): void {
        err.write(data);
      },
    },
    close(): Promise<void> {
      if (!closing) {
        closing = Promise.all([endStream(out), endStream(err)]).then(() => undefined);
      }
      return closing;
    },
  };
}

/**
 * In-memory sinks used when no log files were requested.
 * Bytes are kept as received and decoded once, so multibyte characters
 * split across pipe chunks survive.
 */
export function createCaptureSinks(): CaptureSinks {
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  let closed = false;

  const toBuffer = (data: string | Buffer): Buffer => (typeof data === 'string' ? Buffer.from(data) : data);

  return {
    stdout: {
      write(data: string | Buffer): void {
        if (!closed) stdoutChunks.push(toBuffer(data));
      },
    },
    stderr: {
      write(data: string | Buffer): void {
        if (!closed) stderrChunks.push(toBuffer(data));
      },
    },
    stdoutText: () => Buffer.concat(stdoutChunks).toString('utf-8'),
    stderrText: () => Buffer.concat(stderrChunks).toString('utf-8'),
    close(): Promise<void> {
      closed = true;
      return Promise.resolve();
    },
  };
}
