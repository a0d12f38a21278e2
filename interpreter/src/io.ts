/**
 * Console I/O used by the builtins and the runner.
 *
 * `print` and `input` never touch `process` directly; they go through a
 * ConsoleIO so that one process can host several interpreters and tests
 * can capture output in memory.
 */

import * as fs from 'fs';

export interface ConsoleIO {
  /** Write to standard output. */
  write(text: string): void;
  /** Write to standard error. */
  writeError(text: string): void;
  /** Read one line (without its newline) or null at end of input. */
  readLine(): string | null;
}

const STDIN_FD = 0;
const CHUNK_SIZE = 4096;

/**
 * Blocking line reader over a file descriptor. Bytes past the first
 * newline of a chunk are kept for the next call.
 */
export class SyncLineReader {
  private pending = '';
  private eof = false;
  private readonly fd: number;

  constructor(fd: number = STDIN_FD) {
    this.fd = fd;
  }

  readLine(): string | null {
    for (;;) {
      const nl = this.pending.indexOf('\n');
      if (nl !== -1) {
        const line = this.pending.slice(0, nl);
        this.pending = this.pending.slice(nl + 1);
        return stripCarriageReturn(line);
      }
      if (this.eof) {
        if (this.pending === '') return null;
        const rest = this.pending;
        this.pending = '';
        return stripCarriageReturn(rest);
      }
      this.fill();
    }
  }

  private fill(): void {
    const buf = Buffer.alloc(CHUNK_SIZE);
    let bytesRead: number;
    try {
      bytesRead = fs.readSync(this.fd, buf, 0, buf.length, null);
    } catch (e) {
      // A non-blocking stdin reports EAGAIN until data arrives.
      if (isErrnoException(e) && e.code === 'EAGAIN') return;
      if (isErrnoException(e) && e.code === 'EOF') {
        this.eof = true;
        return;
      }
      throw e;
    }
    if (bytesRead === 0) {
      this.eof = true;
      return;
    }
    this.pending += buf.toString('utf-8', 0, bytesRead);
  }
}

/**
 * ConsoleIO backed by the current process's standard streams.
 */
export function createProcessIO(): ConsoleIO {
  const reader = new SyncLineReader();
  return {
    write: (text) => { process.stdout.write(text); },
    writeError: (text) => { process.stderr.write(text); },
    readLine: () => reader.readLine(),
  };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}
