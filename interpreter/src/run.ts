/**
 * Source-to-exit-status entry points shared by the CLI and tests.
 */

import { parseSource } from './parser';
import { Interpreter } from './interpreter';
import { KuzurError } from './errors';
import { ConsoleIO, createProcessIO } from './io';
import { DEFAULT_MAX_CALL_DEPTH } from './config';

export interface RunOptions {
  io?: ConsoleIO;
  /** Shown before error messages, e.g. the script path. */
  filename?: string;
  maxCallDepth?: number;
}

/**
 * Lex, parse and run `source` with a fresh interpreter.
 *
 * Returns 0 on normal completion and 1 if a KuzurError aborted the run;
 * the error is reported once on the io's error stream. Anything that is
 * not a KuzurError is an interpreter bug and is rethrown.
 */
export function runSource(source: string, options: RunOptions = {}): number {
  const io = options.io ?? createProcessIO();
  try {
    const program = parseSource(source);
    const interpreter = new Interpreter({
      io,
      maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
    });
    return interpreter.run(program);
  } catch (e) {
    if (e instanceof KuzurError) {
      io.writeError(formatError(e, options.filename) + '\n');
      return 1;
    }
    throw e;
  }
}

/**
 * Lex and parse only. Returns the first error, or null if the source is
 * well-formed.
 */
export function checkSource(source: string): KuzurError | null {
  try {
    parseSource(source);
    return null;
  } catch (e) {
    if (e instanceof KuzurError) return e;
    throw e;
  }
}

export function formatError(err: KuzurError, filename?: string): string {
  return filename !== undefined ? `${filename}: ${err.message}` : err.message;
}
