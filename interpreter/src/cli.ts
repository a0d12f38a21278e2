/**
 * Command-line handling for the `kuzur` binary.
 *
 * Usage: kuzur <file.kz>
 *        kuzur run <file.kz>
 *        kuzur check <file.kz> [...]
 *        kuzur repl
 *        kuzur --eval "<code>"
 *        kuzur --version
 */

import * as fs from 'fs';
import * as path from 'path';
import { runSource, checkSource } from './run';
import { ConsoleIO } from './io';
import { loadConfig, ConfigError, KuzurConfig, DEFAULT_MAX_CALL_DEPTH } from './config';

export const NAME = 'Kuzur';
export const VERSION = '1.0.0';

/** Exit status for bad invocations (usage errors, missing files, bad config). */
export const EXIT_USAGE = 2;

/**
 * Run the CLI for everything except `repl`, which needs the event loop.
 * Returns the process exit status.
 */
export function runCli(args: string[], io: ConsoleIO, env: NodeJS.ProcessEnv = process.env): number {
  let config: KuzurConfig;
  try {
    config = loadConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) {
      io.writeError(e.message + '\n');
      return EXIT_USAGE;
    }
    throw e;
  }

  try {
    return dispatch(args, io, config);
  } catch (e) {
    const err = e instanceof Error ? e : new Error(String(e));
    io.writeError(`Internal error: ${err.message}\n`);
    if (config.stackTrace && err.stack !== undefined) {
      io.writeError(err.stack + '\n');
    }
    return 1;
  }
}

function dispatch(args: string[], io: ConsoleIO, config: KuzurConfig): number {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    io.write(usage());
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-V') {
    io.write(`${NAME} ${VERSION}\n`);
    return 0;
  }

  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      io.writeError('Error: check requires at least one file argument\n');
      return EXIT_USAGE;
    }
    return runCheck(files, io);
  }

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      io.writeError('Error: --eval requires a code argument\n');
      return EXIT_USAGE;
    }
    return runSource(args[1], { io, maxCallDepth: config.maxCallDepth });
  }

  // `kuzur run <file.kz>` or the shorthand `kuzur <file.kz>`
  const filename = args[0] === 'run' ? args[1] : args[0];
  if (filename === undefined || filename.startsWith('-') || !filename.endsWith('.kz')) {
    if (filename !== undefined && filename.startsWith('-')) {
      io.writeError(`Unknown option: ${filename}\n`);
    }
    io.write(usage());
    return EXIT_USAGE;
  }

  const source = readSource(filename, io);
  if (source === null) return EXIT_USAGE;
  return runSource(source, { io, filename, maxCallDepth: config.maxCallDepth });
}

/**
 * Parse-only validation of one or more files.
 * Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[], io: ConsoleIO): number {
  let hasAnyErrors = false;

  for (const file of files) {
    const source = readSource(file, io);
    if (source === null) {
      hasAnyErrors = true;
      continue;
    }
    const err = checkSource(source);
    if (err === null) {
      io.write(`✓ ${file} — no errors\n`);
    } else {
      hasAnyErrors = true;
      io.write(`✗ ${file} — ${err.message}\n`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function readSource(filepath: string, io: ConsoleIO): string | null {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    io.writeError(`File not found: ${filepath}\n`);
    return null;
  }
  return fs.readFileSync(resolved, 'utf-8');
}

export function usage(): string {
  return [
    `${NAME} v${VERSION}`,
    '',
    'Usage:',
    '  kuzur <program.kz>              Run a Kuzur program',
    '  kuzur run <program.kz>          Run a Kuzur program',
    '  kuzur check <program.kz> [...]  Check files for lex and parse errors',
    '  kuzur repl                      Start interactive REPL',
    '  kuzur --eval "<code>"           Evaluate inline code',
    '',
    'Options:',
    '  -V, --version                   Print Kuzur version and exit',
    '  -h, --help                      Show this help message',
    '',
    'Environment:',
    `  KUZUR_MAX_CALL_DEPTH            Maximum function call depth (default ${DEFAULT_MAX_CALL_DEPTH})`,
    '  KUZUR_STACK_TRACE               Print host stack traces for internal errors',
    '',
  ].join('\n');
}
