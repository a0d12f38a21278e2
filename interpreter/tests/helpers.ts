import { ConsoleIO } from '../src/io';
import { runSource, RunOptions } from '../src/run';

/**
 * ConsoleIO that records output and serves input from a fixed list.
 */
export class MemoryIO implements ConsoleIO {
  stdout = '';
  stderr = '';
  private readonly lines: string[];

  constructor(input: string[] = []) {
    this.lines = [...input];
  }

  write(text: string): void {
    this.stdout += text;
  }

  writeError(text: string): void {
    this.stderr += text;
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }
}

export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

export function runProgram(source: string, options: Omit<RunOptions, 'io'> & { input?: string[] } = {}): RunResult {
  const { input, ...rest } = options;
  const io = new MemoryIO(input);
  const code = runSource(source, { ...rest, io });
  return { code, stdout: io.stdout, stderr: io.stderr };
}
