/**
 * Kuzur REPL: interactive read-eval-print loop.
 *
 * Usage: kuzur repl
 *
 * Features:
 *   - Persistent interpreter state across inputs
 *   - Multi-line input (detects unclosed braces/parens)
 *   - Special commands: :help, :quit, :env, :type, :clear, :reset
 *   - Errors are printed and the loop continues
 *   - Prints the value of each top-level expression (unless null)
 */

import * as readline from 'readline';
import { parseSource } from './parser';
import { Interpreter } from './interpreter';
import { KuzurError, KuzurRuntimeError } from './errors';
import { valueToString, typeName, KuzurValue } from './values';
import { ConsoleIO } from './io';
import { loadConfig, ConfigError, DEFAULT_MAX_CALL_DEPTH } from './config';
import { NAME, VERSION, EXIT_USAGE } from './cli';

export const PROMPT = 'kuzur> ';
export const CONTINUATION_PROMPT = '  ... ';

const PREVIEW_WIDTH = 60;

export type LineResult = 'prompt' | 'continue' | 'quit';

/**
 * One REPL session: the interpreter plus any partially typed input.
 * Kept free of readline so it can be driven line by line.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private buffer = '';
  private readonly io: ConsoleIO;
  private readonly maxCallDepth: number;

  constructor(io: ConsoleIO, maxCallDepth: number = DEFAULT_MAX_CALL_DEPTH) {
    this.io = io;
    this.maxCallDepth = maxCallDepth;
    this.interpreter = this.freshInterpreter();
  }

  /**
   * Feed one line of input. Returns 'continue' while a multi-line entry is
   * still open, 'quit' after :quit, and 'prompt' otherwise.
   */
  handleLine(line: string): LineResult {
    const trimmed = line.trim();

    // Special commands are only recognized outside multi-line input
    if (this.buffer === '' && trimmed.startsWith(':')) {
      return this.handleCommand(trimmed);
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedDelimiters(this.buffer)) {
      return 'continue';
    }

    const input = this.buffer.trim();
    this.buffer = '';
    if (input === '') return 'prompt';

    try {
      const value = this.interpreter.evaluate(parseSource(input));
      if (value.kind !== 'null') {
        this.io.write(`=> ${valueToString(value)}\n`);
      }
    } catch (e) {
      this.reportError(e);
    }
    return 'prompt';
  }

  private handleCommand(cmd: string): LineResult {
    const parts = cmd.split(/\s+/);
    const command = parts[0];

    switch (command) {
      case ':help':
      case ':h':
        this.io.write([
          '',
          'REPL Commands:',
          '  :help, :h       Show this help message',
          '  :quit, :q       Exit the REPL',
          '  :env            Show all user-defined names',
          '  :type <expr>    Show the runtime type of an expression',
          '  :clear          Clear the screen',
          '  :reset          Reset the interpreter state',
          '',
          'Tips:',
          '  - Multi-line input: leave braces/parens unclosed',
          '  - The value of each expression is printed automatically',
          '  - Variables and functions persist between inputs',
          '',
          '',
        ].join('\n'));
        return 'prompt';

      case ':quit':
      case ':q':
      case ':exit':
        return 'quit';

      case ':env':
        this.printEnvironment();
        return 'prompt';

      case ':type': {
        const expr = parts.slice(1).join(' ').trim();
        if (!expr) {
          this.io.write('Usage: :type <expression>\n');
          return 'prompt';
        }
        try {
          const value = this.interpreter.evaluate(parseSource(expr));
          this.io.write(describeType(value) + '\n');
        } catch (e) {
          this.reportError(e);
        }
        return 'prompt';
      }

      case ':clear':
        this.io.write('\x1b[2J\x1b[H');
        return 'prompt';

      case ':reset':
        this.interpreter = this.freshInterpreter();
        this.io.write('Interpreter state reset.\n');
        return 'prompt';

      default:
        this.io.write(`Unknown command: ${command}. Type :help for available commands.\n`);
        return 'prompt';
    }
  }

  /**
   * Print every non-builtin global binding with its type and a preview.
   */
  private printEnvironment(): void {
    const env = this.interpreter.getGlobalEnv();
    const lines: string[] = [];
    for (const name of env.names()) {
      const value = env.lookup(name);
      if (value.kind === 'builtin') continue;
      const preview = valueToString(value);
      const truncated = preview.length > PREVIEW_WIDTH ? preview.slice(0, PREVIEW_WIDTH - 3) + '...' : preview;
      lines.push(`  ${name}: ${describeType(value)} = ${truncated}`);
    }
    if (lines.length === 0) {
      this.io.write('  (no user-defined names — only builtins)\n');
      return;
    }
    this.io.write(lines.join('\n') + '\n');
  }

  private reportError(e: unknown): void {
    if (e instanceof KuzurError) {
      this.io.writeError(`  ${e.message}\n`);
    } else if (e instanceof Error) {
      this.io.writeError(`  Internal error: ${e.message}\n`);
    } else {
      this.io.writeError(`  Internal error: ${String(e)}\n`);
    }
  }

  private freshInterpreter(): Interpreter {
    // readline owns stdin while the REPL runs, so input() cannot read it.
    const replIO: ConsoleIO = {
      write: (text) => this.io.write(text),
      writeError: (text) => this.io.writeError(text),
      readLine: () => {
        throw new KuzurRuntimeError('input() is not available in the REPL');
      },
    };
    return new Interpreter({ io: replIO, maxCallDepth: this.maxCallDepth });
  }
}

/**
 * Check whether the input has unclosed braces or parentheses, ignoring
 * string contents and `//` comments.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (ch === '"' || ch === '\n') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    // Skip line comments
    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
    }
  }

  return braces > 0 || parens > 0;
}

/**
 * Runtime type description used by :type and :env.
 */
export function describeType(value: KuzurValue): string {
  switch (value.kind) {
    case 'function':
      return `Function (${value.name}, ${value.params.length} param${value.params.length === 1 ? '' : 's'})`;
    case 'builtin':
      return `Builtin (${value.name})`;
    default:
      return typeName(value);
  }
}

/**
 * Start the Kuzur REPL on the process's standard streams.
 */
export function startRepl(): void {
  const io: ConsoleIO = {
    write: (text) => { process.stdout.write(text); },
    writeError: (text) => { process.stderr.write(text); },
    readLine: () => null,
  };

  let maxCallDepth: number;
  try {
    maxCallDepth = loadConfig().maxCallDepth;
  } catch (e) {
    if (e instanceof ConfigError) {
      io.writeError(e.message + '\n');
      process.exitCode = EXIT_USAGE;
      return;
    }
    throw e;
  }

  const session = new ReplSession(io, maxCallDepth);
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
    terminal: process.stdin.isTTY === true,
  });

  io.write(`${NAME} REPL v${VERSION}\n`);
  io.write('Type :help for commands, :quit to exit.\n\n');
  rl.prompt();

  rl.on('line', (line: string) => {
    const result = session.handleLine(line);
    if (result === 'quit') {
      rl.close();
      return;
    }
    rl.setPrompt(result === 'continue' ? CONTINUATION_PROMPT : PROMPT);
    rl.prompt();
  });

  rl.on('close', () => {
    io.write('\nGoodbye!\n');
  });
}
