/**
 * Basic tests for the Kuzur runtime pieces that need no source text:
 * environments, values and error formatting.
 */

import { Environment } from '../src/environment';
import {
  mkNumber,
  mkString,
  mkBool,
  mkNull,
  mkBuiltin,
  mkFunction,
  valueToString,
  valuesEqual,
  typeName,
  formatNumber,
} from '../src/values';
import {
  KuzurError,
  KuzurNameError,
  KuzurParseError,
  KuzurArityError,
  KuzurRuntimeError,
  isHostStackOverflow,
} from '../src/errors';

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('define and lookup a variable', () => {
    const env = new Environment();
    env.define('x', mkNumber(42));
    expect(env.lookup('x')).toEqual(mkNumber(42));
  });

  test('undefined variable throws KuzurNameError with the site', () => {
    const env = new Environment();
    expect(() => env.lookup('unknown', { line: 3, column: 5, offset: 20 })).toThrow(
      "NameError [line 3, col 5]: undefined name 'unknown'",
    );
    expect(() => env.lookup('unknown')).toThrow(KuzurNameError);
  });

  test('define overwrites an existing binding', () => {
    const env = new Environment();
    env.define('x', mkNumber(1));
    env.define('x', mkString('one'));
    expect(env.lookup('x')).toEqual(mkString('one'));
  });

  test('lookup walks into parent scopes', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child(true);
    expect(child.lookup('x')).toEqual(mkNumber(10));
    expect(child.has('x')).toBe(true);
    expect(child.has('y')).toBe(false);
  });

  test('assign inside a call frame shadows instead of updating the outer binding', () => {
    const globals = new Environment();
    globals.define('x', mkNumber(5));
    const frame = globals.child(true);
    frame.assign('x', mkNumber(10));
    expect(frame.lookup('x')).toEqual(mkNumber(10));
    expect(globals.lookup('x')).toEqual(mkNumber(5));
  });

  test('assign in a non-frame scope updates the enclosing frame binding', () => {
    const frame = new Environment();
    frame.define('x', mkNumber(1));
    const inner = frame.child();
    inner.assign('x', mkNumber(2));
    expect(frame.lookup('x')).toEqual(mkNumber(2));
    expect(inner.names()).toEqual([]);
  });

  test('assign of a new name defines it in the current scope', () => {
    const env = new Environment();
    env.assign('fresh', mkBool(true));
    expect(env.names()).toEqual(['fresh']);
  });

  test('names lists bindings in definition order', () => {
    const env = new Environment();
    env.define('b', mkNumber(1));
    env.define('a', mkNumber(2));
    env.define('b', mkNumber(3));
    expect(env.names()).toEqual(['b', 'a']);
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('Values', () => {
  test('valueToString for primitives', () => {
    expect(valueToString(mkNumber(42))).toBe('42');
    expect(valueToString(mkNumber(3.14))).toBe('3.14');
    expect(valueToString(mkNumber(-2.5))).toBe('-2.5');
    expect(valueToString(mkString('hello'))).toBe('hello');
    expect(valueToString(mkBool(true))).toBe('true');
    expect(valueToString(mkBool(false))).toBe('false');
    expect(valueToString(mkNull())).toBe('null');
  });

  test('integral numbers print without a fraction', () => {
    expect(valueToString(mkNumber(10 / 2))).toBe('5');
    expect(formatNumber(-0)).toBe('0');
  });

  test('valueToString for callables', () => {
    const env = new Environment();
    const fn = mkFunction('add', ['a', 'b'], { type: 'Block', statements: [], position: { line: 1, column: 1, offset: 0 } }, env);
    expect(valueToString(fn)).toBe('<func add>');
    expect(valueToString(mkBuiltin('len', () => mkNull()))).toBe('<builtin len>');
  });

  test('valuesEqual compares by kind and value', () => {
    expect(valuesEqual(mkNumber(1), mkNumber(1))).toBe(true);
    expect(valuesEqual(mkString('a'), mkString('a'))).toBe(true);
    expect(valuesEqual(mkString('a'), mkString('b'))).toBe(false);
    expect(valuesEqual(mkNull(), mkNull())).toBe(true);
  });

  test('values of different kinds are never equal', () => {
    expect(valuesEqual(mkNumber(1), mkString('1'))).toBe(false);
    expect(valuesEqual(mkBool(false), mkNumber(0))).toBe(false);
    expect(valuesEqual(mkNull(), mkBool(false))).toBe(false);
  });

  test('callables compare by identity', () => {
    const a = mkBuiltin('x', () => mkNull());
    const b = mkBuiltin('x', () => mkNull());
    expect(valuesEqual(a, a)).toBe(true);
    expect(valuesEqual(a, b)).toBe(false);
  });

  test('typeName', () => {
    expect(typeName(mkNumber(1))).toBe('Number');
    expect(typeName(mkString(''))).toBe('String');
    expect(typeName(mkBool(true))).toBe('Boolean');
    expect(typeName(mkNull())).toBe('Null');
    expect(typeName(mkBuiltin('print', () => mkNull()))).toBe('Builtin');
  });
});

// ==================================================================
// Error tests
// ==================================================================

describe('Errors', () => {
  test('message carries kind, location and detail', () => {
    const err = new KuzurRuntimeError('division by zero', { line: 2, column: 9 });
    expect(err.message).toBe('RuntimeError [line 2, col 9]: division by zero');
    expect(err.kind).toBe('RuntimeError');
    expect(err.line).toBe(2);
    expect(err.column).toBe(9);
    expect(err).toBeInstanceOf(KuzurError);
  });

  test('location is omitted when unknown', () => {
    const err = new KuzurRuntimeError('EOF when reading a line');
    expect(err.message).toBe('RuntimeError: EOF when reading a line');
    expect(err.line).toBeUndefined();
  });

  test('parse errors name what was expected and found', () => {
    const err = new KuzurParseError("'{'", "identifier 'x'", { line: 1, column: 7 });
    expect(err.message).toBe("ParseError [line 1, col 7]: expected '{' but found identifier 'x'");
    expect(err.expected).toBe("'{'");
    expect(err.found).toBe("identifier 'x'");
  });

  test('only stack overflows count as host stack overflow', () => {
    expect(isHostStackOverflow(new RangeError('Maximum call stack size exceeded'))).toBe(true);
    expect(isHostStackOverflow(new RangeError('Invalid string length'))).toBe(false);
    expect(isHostStackOverflow(new Error('Maximum call stack size exceeded'))).toBe(false);
  });

  test('arity errors agree in number', () => {
    expect(new KuzurArityError('f', '2 arguments', 1).detail).toBe('f() takes 2 arguments but 1 was given');
    expect(new KuzurArityError('g', 'exactly 1 argument', 0).detail).toBe('g() takes exactly 1 argument but 0 were given');
  });
});
