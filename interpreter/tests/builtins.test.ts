import { Environment } from '../src/environment';
import { registerBuiltins, BUILTIN_NAMES } from '../src/builtins';
import { mkNumber, mkString, mkBool, KuzurValue } from '../src/values';
import { KuzurArityError, KuzurTypeError, KuzurValueError } from '../src/errors';
import { MemoryIO, runProgram } from './helpers';

function callBuiltin(name: string, args: KuzurValue[], io = new MemoryIO()): KuzurValue {
  const env = new Environment();
  registerBuiltins(env, io);
  const fn = env.lookup(name);
  if (fn.kind !== 'builtin') throw new Error(`${name} is not a builtin`);
  return fn.fn(args);
}

describe('Builtins', () => {
  test('registers the fixed set of names', () => {
    const env = new Environment();
    registerBuiltins(env, new MemoryIO());
    expect(env.names()).toEqual([...BUILTIN_NAMES]);
  });

  describe('print', () => {
    test('writes its arguments and returns null', () => {
      const io = new MemoryIO();
      expect(callBuiltin('print', [mkString('x ='), mkNumber(1.5)], io)).toEqual({ kind: 'null' });
      expect(io.stdout).toBe('x = 1.5\n');
    });
  });

  describe('input', () => {
    test('reads a line after writing the prompt', () => {
      const result = runProgram('name = input("Name: ")\nprint("Hello, " + name)', { input: ['Ada'] });
      expect(result.stdout).toBe('Name: Hello, Ada\n');
      expect(result.code).toBe(0);
    });

    test('reads without a prompt', () => {
      expect(runProgram('print(len(input()))', { input: ['four'] }).stdout).toBe('4\n');
    });

    test('returns text, not numbers', () => {
      expect(runProgram('n = input()\nprint(int(n) + 1)', { input: ['41'] }).stdout).toBe('42\n');
    });

    test('end of input is a runtime error', () => {
      const result = runProgram('x = input()');
      expect(result.code).toBe(1);
      expect(result.stderr).toBe('RuntimeError [line 1, col 5]: EOF when reading a line\n');
    });

    test('takes at most one argument', () => {
      expect(() => callBuiltin('input', [mkString('a'), mkString('b')])).toThrow(
        'input() takes 0 or 1 arguments but 2 were given',
      );
    });
  });

  describe('len', () => {
    test('counts characters', () => {
      expect(callBuiltin('len', [mkString('hello')])).toEqual(mkNumber(5));
      expect(callBuiltin('len', [mkString('')])).toEqual(mkNumber(0));
    });

    test('counts characters outside the basic plane once', () => {
      expect(runProgram('print(len("😀é"))').stdout).toBe('2\n');
      expect(callBuiltin('len', [mkString('a😀b')])).toEqual(mkNumber(3));
    });

    test('rejects non-strings', () => {
      expect(() => callBuiltin('len', [mkNumber(5)])).toThrow(KuzurTypeError);
      expect(() => callBuiltin('len', [mkNumber(5)])).toThrow('len() expects a String, got Number');
    });

    test('takes exactly one argument', () => {
      expect(() => callBuiltin('len', [])).toThrow(KuzurArityError);
      expect(runProgram('len("a", "b")').stderr).toBe(
        'ArityError [line 1, col 1]: len() takes exactly 1 argument but 2 were given\n',
      );
    });
  });

  describe('int', () => {
    test('parses integer strings', () => {
      expect(callBuiltin('int', [mkString('42')])).toEqual(mkNumber(42));
      expect(callBuiltin('int', [mkString(' -7 ')])).toEqual(mkNumber(-7));
      expect(callBuiltin('int', [mkString('+3')])).toEqual(mkNumber(3));
    });

    test('truncates numbers toward zero', () => {
      expect(callBuiltin('int', [mkNumber(3.9)])).toEqual(mkNumber(3));
      expect(callBuiltin('int', [mkNumber(-3.9)])).toEqual(mkNumber(-3));
    });

    test('rejects strings that are not integers', () => {
      expect(() => callBuiltin('int', [mkString('abc')])).toThrow(KuzurValueError);
      expect(() => callBuiltin('int', [mkString('abc')])).toThrow('invalid integer literal: "abc"');
      expect(() => callBuiltin('int', [mkString('3.5')])).toThrow('invalid integer literal: "3.5"');
      expect(() => callBuiltin('int', [mkString('')])).toThrow(KuzurValueError);
    });

    test('rejects other kinds', () => {
      expect(() => callBuiltin('int', [mkBool(true)])).toThrow('int() expects a String or Number, got Boolean');
    });

    test('reports the call site', () => {
      expect(runProgram('x = int("nope")').stderr).toBe('ValueError [line 1, col 5]: invalid integer literal: "nope"\n');
    });
  });

  describe('str', () => {
    test('formats primitives', () => {
      expect(callBuiltin('str', [mkNumber(3)])).toEqual(mkString('3'));
      expect(callBuiltin('str', [mkNumber(2.5)])).toEqual(mkString('2.5'));
      expect(callBuiltin('str', [mkBool(true)])).toEqual(mkString('true'));
      expect(callBuiltin('str', [mkString('x')])).toEqual(mkString('x'));
    });

    test('str and len compose', () => {
      expect(runProgram('print(len(str(12345)))').stdout).toBe('5\n');
    });

    test('rejects callables', () => {
      expect(runProgram('str(print)').stderr).toBe(
        'TypeError [line 1, col 1]: str() expects a Number, Boolean or String, got Builtin\n',
      );
    });
  });
});
