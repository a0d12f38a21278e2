#!/usr/bin/env node
/**
 * Kuzur interpreter CLI entry point. See cli.ts for the commands.
 */

import { runCli } from './cli';
import { startRepl } from './repl';
import { createProcessIO } from './io';

function main(): void {
  const args = process.argv.slice(2);

  if (args[0] === 'repl') {
    startRepl();
    return; // REPL runs its own event loop
  }

  process.exitCode = runCli(args, createProcessIO());
}

main();
