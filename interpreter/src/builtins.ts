/**
 * Built-in functions for the Kuzur interpreter.
 *
 * The registry is fixed: print, input, len, int, str. Builtins are bound
 * in the global environment like any other value, so a program may shadow
 * them.
 */

import { Environment } from './environment';
import {
  KuzurValue,
  mkBuiltin,
  mkNumber,
  mkString,
  mkNull,
  valueToString,
  typeName,
} from './values';
import { KuzurArityError, KuzurTypeError, KuzurValueError, KuzurRuntimeError } from './errors';
import type { ConsoleIO } from './io';

export const BUILTIN_NAMES = ['print', 'input', 'len', 'int', 'str'] as const;

const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Register all built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment, io: ConsoleIO): void {
  // ---- I/O ----

  env.define('print', mkBuiltin('print', (args: KuzurValue[]): KuzurValue => {
    io.write(args.map(valueToString).join(' ') + '\n');
    return mkNull();
  }));

  env.define('input', mkBuiltin('input', (args, site): KuzurValue => {
    if (args.length > 1) throw new KuzurArityError('input', '0 or 1 arguments', args.length, site);
    if (args.length === 1) {
      io.write(valueToString(args[0]));
    }
    const line = io.readLine();
    if (line === null) throw new KuzurRuntimeError('EOF when reading a line', site);
    return mkString(line);
  }));

  // ---- Strings ----

  env.define('len', mkBuiltin('len', (args, site): KuzurValue => {
    if (args.length !== 1) throw new KuzurArityError('len', 'exactly 1 argument', args.length, site);
    const v = args[0];
    if (v.kind !== 'string') throw new KuzurTypeError(`len() expects a String, got ${typeName(v)}`, site);
    // Code points, so a surrogate pair counts once.
    return mkNumber([...v.value].length);
  }));

  // ---- Conversion ----

  env.define('int', mkBuiltin('int', (args, site): KuzurValue => {
    if (args.length !== 1) throw new KuzurArityError('int', 'exactly 1 argument', args.length, site);
    const v = args[0];
    switch (v.kind) {
      case 'number':
        return mkNumber(Math.trunc(v.value));
      case 'string': {
        const text = v.value.trim();
        if (!INTEGER_LITERAL.test(text)) {
          throw new KuzurValueError(`invalid integer literal: "${v.value}"`, site);
        }
        return mkNumber(parseInt(text, 10));
      }
      default:
        throw new KuzurTypeError(`int() expects a String or Number, got ${typeName(v)}`, site);
    }
  }));

  env.define('str', mkBuiltin('str', (args, site): KuzurValue => {
    if (args.length !== 1) throw new KuzurArityError('str', 'exactly 1 argument', args.length, site);
    const v = args[0];
    if (v.kind === 'number' || v.kind === 'bool' || v.kind === 'string') {
      return mkString(valueToString(v));
    }
    throw new KuzurTypeError(`str() expects a Number, Boolean or String, got ${typeName(v)}`, site);
  }));
}
