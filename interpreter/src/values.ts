/**
 * Runtime value representations for the Kuzur interpreter.
 */

import type { Environment } from './environment';
import type { Block } from './ast';
import type { Position } from './lexer';

export type BuiltinFn = (args: KuzurValue[], site?: Position) => KuzurValue;

export type KuzurValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'function'; name: string; params: string[]; body: Block; closure: Environment }
  | { kind: 'builtin'; name: string; fn: BuiltinFn };

export type KuzurFunction = Extract<KuzurValue, { kind: 'function' }>;

// ---- Value constructors ----

export function mkNumber(value: number): KuzurValue {
  return { kind: 'number', value };
}

export function mkString(value: string): KuzurValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): KuzurValue {
  return { kind: 'bool', value };
}

const NULL: KuzurValue = { kind: 'null' };

export function mkNull(): KuzurValue {
  return NULL;
}

export function mkFunction(name: string, params: string[], body: Block, closure: Environment): KuzurValue {
  return { kind: 'function', name, params, body, closure };
}

export function mkBuiltin(name: string, fn: BuiltinFn): KuzurValue {
  return { kind: 'builtin', name, fn };
}

// ---- Value utilities ----

/**
 * Shortest round-trip decimal form; integral values print without a fraction.
 */
export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '0';
  return String(n);
}

export function valueToString(v: KuzurValue): string {
  switch (v.kind) {
    case 'number': return formatNumber(v.value);
    case 'string': return v.value;
    case 'bool': return String(v.value);
    case 'null': return 'null';
    case 'function': return `<func ${v.name}>`;
    case 'builtin': return `<builtin ${v.name}>`;
  }
}

/**
 * Equality used by `==` / `!=`. Values of different kinds are never equal;
 * functions and builtins compare by identity.
 */
export function valuesEqual(a: KuzurValue, b: KuzurValue): boolean {
  switch (a.kind) {
    case 'number':
    case 'string':
    case 'bool':
      return b.kind === a.kind && a.value === b.value;
    case 'null':
      return b.kind === 'null';
    case 'function':
    case 'builtin':
      return a === b;
  }
}

/**
 * User-facing name of a value's kind, as used in error messages.
 */
export function typeName(v: KuzurValue): string {
  switch (v.kind) {
    case 'number': return 'Number';
    case 'string': return 'String';
    case 'bool': return 'Boolean';
    case 'null': return 'Null';
    case 'function': return 'Function';
    case 'builtin': return 'Builtin';
  }
}
