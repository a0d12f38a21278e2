/**
 * Tree-walking interpreter for the Kuzur language.
 *
 * Statements return a control signal (normal, return, break, continue)
 * that unwinds through enclosing blocks until a loop or function body
 * handles it. A signal that reaches a function boundary or the top level
 * unhandled is a ControlFlowError.
 */

import { Environment } from './environment';
import {
  KuzurValue,
  KuzurFunction,
  mkNumber,
  mkString,
  mkBool,
  mkNull,
  mkFunction,
  valueToString,
  valuesEqual,
  typeName,
} from './values';
import {
  KuzurTypeError,
  KuzurArityError,
  KuzurControlFlowError,
  KuzurRuntimeError,
  isHostStackOverflow,
} from './errors';
import type {
  Program,
  Statement,
  Expression,
  Block,
  BinaryExpression,
  LogicalExpression,
  UnaryExpression,
  CallExpression,
  IfStatement,
  WhileStatement,
  DoWhileStatement,
  ForStatement,
} from './ast';
import type { Position } from './lexer';
import { registerBuiltins } from './builtins';
import { ConsoleIO, createProcessIO } from './io';
import { DEFAULT_MAX_CALL_DEPTH } from './config';

export type Signal =
  | { type: 'normal' }
  | { type: 'return'; value: KuzurValue; position: Position }
  | { type: 'break'; position: Position }
  | { type: 'continue'; position: Position };

const NORMAL: Signal = { type: 'normal' };

export interface InterpreterOptions {
  /** Console used by print/input. Defaults to the process's stdio. */
  io?: ConsoleIO;
  /** Maximum nesting of user function calls. */
  maxCallDepth?: number;
}

export class Interpreter {
  private globalEnv: Environment;
  private readonly io: ConsoleIO;
  private readonly maxCallDepth: number;
  private callDepth = 0;

  constructor(options: InterpreterOptions = {}) {
    this.io = options.io ?? createProcessIO();
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    this.globalEnv = new Environment();
    registerBuiltins(this.globalEnv, this.io);
  }

  /**
   * Execute a full program against the global environment.
   * Returns the exit status (0); failures are thrown as KuzurError.
   */
  run(program: Program): number {
    this.evaluate(program);
    return 0;
  }

  /**
   * Execute a program and return the value of its last top-level
   * expression statement, or null if it has none. Used by the REPL.
   */
  evaluate(program: Program): KuzurValue {
    let last: KuzurValue = mkNull();
    for (const stmt of program.statements) {
      if (stmt.type === 'ExpressionStatement') {
        last = this.evalExpression(stmt.expression, this.globalEnv);
        continue;
      }
      const signal = this.execStatement(stmt, this.globalEnv);
      this.rejectEscapedSignal(signal);
      last = mkNull();
    }
    return last;
  }

  /**
   * Get the global environment (useful for testing and the REPL).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execStatement(stmt: Statement, env: Environment): Signal {
    switch (stmt.type) {
      case 'ExpressionStatement':
        this.evalExpression(stmt.expression, env);
        return NORMAL;
      case 'VarAssign':
        env.assign(stmt.name, this.evalExpression(stmt.value, env));
        return NORMAL;
      case 'Block':
        return this.execBlock(stmt, env);
      case 'IfStatement':
        return this.execIf(stmt, env);
      case 'WhileStatement':
        return this.execWhile(stmt, env);
      case 'DoWhileStatement':
        return this.execDoWhile(stmt, env);
      case 'ForStatement':
        return this.execFor(stmt, env);
      case 'FuncDecl':
        env.define(stmt.name, mkFunction(stmt.name, stmt.params, stmt.body, env));
        return NORMAL;
      case 'ReturnStatement': {
        const value = stmt.value !== null ? this.evalExpression(stmt.value, env) : mkNull();
        return { type: 'return', value, position: stmt.position };
      }
      case 'BreakStatement':
        return { type: 'break', position: stmt.position };
      case 'ContinueStatement':
        return { type: 'continue', position: stmt.position };
    }
  }

  /**
   * Run statements in order in the given environment. Blocks share the
   * enclosing frame; only function calls open a new one.
   */
  execBlock(block: Block, env: Environment): Signal {
    for (const stmt of block.statements) {
      const signal = this.execStatement(stmt, env);
      if (signal.type !== 'normal') return signal;
    }
    return NORMAL;
  }

  private execIf(stmt: IfStatement, env: Environment): Signal {
    if (this.evalCondition(stmt.condition, env, 'if')) {
      return this.execBlock(stmt.consequent, env);
    }
    for (const clause of stmt.elifs) {
      if (this.evalCondition(clause.condition, env, 'elif')) {
        return this.execBlock(clause.body, env);
      }
    }
    if (stmt.alternate !== null) {
      return this.execBlock(stmt.alternate, env);
    }
    return NORMAL;
  }

  private execWhile(stmt: WhileStatement, env: Environment): Signal {
    while (this.evalCondition(stmt.condition, env, 'while')) {
      const signal = this.execBlock(stmt.body, env);
      if (signal.type === 'break') break;
      if (signal.type === 'return') return signal;
    }
    return NORMAL;
  }

  private execDoWhile(stmt: DoWhileStatement, env: Environment): Signal {
    do {
      const signal = this.execBlock(stmt.body, env);
      if (signal.type === 'break') break;
      if (signal.type === 'return') return signal;
    } while (this.evalCondition(stmt.condition, env, 'do-while'));
    return NORMAL;
  }

  /**
   * `for i = start; end`: inclusive bound, step 1. Like a while condition,
   * the bound and the loop variable are re-read before every check, so the
   * body may change either.
   */
  private execFor(stmt: ForStatement, env: Environment): Signal {
    const start = this.evalExpression(stmt.start, env);
    if (start.kind !== 'number') {
      throw new KuzurTypeError(`for loop start must be a Number, got ${typeName(start)}`, stmt.start.position);
    }

    env.assign(stmt.variable, start);
    while (this.loopCounter(stmt, env) <= this.loopBound(stmt, env)) {
      const signal = this.execBlock(stmt.body, env);
      if (signal.type === 'break') break;
      if (signal.type === 'return') return signal;
      env.assign(stmt.variable, mkNumber(this.loopCounter(stmt, env) + 1));
    }
    return NORMAL;
  }

  private loopBound(stmt: ForStatement, env: Environment): number {
    const end = this.evalExpression(stmt.end, env);
    if (end.kind !== 'number') {
      throw new KuzurTypeError(`for loop bound must be a Number, got ${typeName(end)}`, stmt.end.position);
    }
    return end.value;
  }

  private loopCounter(stmt: ForStatement, env: Environment): number {
    const current = env.lookup(stmt.variable, stmt.position);
    if (current.kind !== 'number') {
      throw new KuzurTypeError(`for loop variable '${stmt.variable}' must stay a Number`, stmt.position);
    }
    return current.value;
  }

  private rejectEscapedSignal(signal: Signal): void {
    switch (signal.type) {
      case 'normal':
        return;
      case 'break':
        throw new KuzurControlFlowError('break outside loop', signal.position);
      case 'continue':
        throw new KuzurControlFlowError('continue outside loop', signal.position);
      case 'return':
        // Function bodies consume their own returns, so this is the top level.
        throw new KuzurControlFlowError('return outside function', signal.position);
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evalExpression(expr: Expression, env: Environment): KuzurValue {
    switch (expr.type) {
      case 'NumberLiteral':
        return mkNumber(expr.value);
      case 'StringLiteral':
        return mkString(expr.value);
      case 'BooleanLiteral':
        return mkBool(expr.value);
      case 'Identifier':
        return env.lookup(expr.name, expr.position);
      case 'UnaryExpression':
        return this.evalUnary(expr, env);
      case 'BinaryExpression':
        return this.evalBinary(expr, env);
      case 'LogicalExpression':
        return this.evalLogical(expr, env);
      case 'CallExpression':
        return this.evalCall(expr, env);
      case 'AssignmentExpression': {
        const value = this.evalExpression(expr.value, env);
        env.assign(expr.target, value);
        return value;
      }
    }
  }

  private evalCondition(expr: Expression, env: Environment, construct: string): boolean {
    const value = this.evalExpression(expr, env);
    if (value.kind !== 'bool') {
      throw new KuzurTypeError(`${construct} condition must be a Boolean, got ${typeName(value)}`, expr.position);
    }
    return value.value;
  }

  private evalUnary(expr: UnaryExpression, env: Environment): KuzurValue {
    const operand = this.evalExpression(expr.operand, env);
    switch (expr.operator) {
      case '-':
        if (operand.kind === 'number') return mkNumber(-operand.value);
        throw new KuzurTypeError(`Cannot negate ${typeName(operand)}`, expr.position);
      case '!':
        if (operand.kind === 'bool') return mkBool(!operand.value);
        throw new KuzurTypeError(`'!' expects a Boolean, got ${typeName(operand)}`, expr.position);
    }
  }

  private evalLogical(expr: LogicalExpression, env: Environment): KuzurValue {
    const left = this.evalExpression(expr.left, env);
    if (left.kind !== 'bool') {
      throw new KuzurTypeError(`'${expr.operator}' expects Boolean operands, got ${typeName(left)}`, expr.left.position);
    }
    if (expr.operator === '&&' && !left.value) return left;
    if (expr.operator === '||' && left.value) return left;

    const right = this.evalExpression(expr.right, env);
    if (right.kind !== 'bool') {
      throw new KuzurTypeError(`'${expr.operator}' expects Boolean operands, got ${typeName(right)}`, expr.right.position);
    }
    return right;
  }

  private evalBinary(expr: BinaryExpression, env: Environment): KuzurValue {
    const left = this.evalExpression(expr.left, env);
    const right = this.evalExpression(expr.right, env);
    const op = expr.operator;

    switch (op) {
      case '+':
        return this.evalAdd(left, right, expr.position);
      case '-': {
        const [a, b] = this.numericOperands(op, left, right, expr.position);
        return mkNumber(a - b);
      }
      case '*': {
        const [a, b] = this.numericOperands(op, left, right, expr.position);
        return mkNumber(a * b);
      }
      case '/': {
        const [a, b] = this.numericOperands(op, left, right, expr.position);
        if (b === 0) throw new KuzurRuntimeError('division by zero', expr.position);
        return mkNumber(a / b);
      }
      case '%': {
        const [a, b] = this.numericOperands(op, left, right, expr.position);
        if (b === 0) throw new KuzurRuntimeError('division by zero', expr.position);
        // Floored: the result takes the sign of the divisor.
        return mkNumber(a - b * Math.floor(a / b));
      }
      case '==':
        return mkBool(valuesEqual(left, right));
      case '!=':
        return mkBool(!valuesEqual(left, right));
      case '<':
        return mkBool(this.compareValues(op, left, right, expr.position) < 0);
      case '<=':
        return mkBool(this.compareValues(op, left, right, expr.position) <= 0);
      case '>':
        return mkBool(this.compareValues(op, left, right, expr.position) > 0);
      case '>=':
        return mkBool(this.compareValues(op, left, right, expr.position) >= 0);
    }
  }

  private evalAdd(left: KuzurValue, right: KuzurValue, position: Position): KuzurValue {
    if (left.kind === 'number' && right.kind === 'number') {
      return mkNumber(left.value + right.value);
    }
    if (left.kind === 'string' && isConcatenable(right)) {
      return mkString(left.value + valueToString(right));
    }
    if (right.kind === 'string' && isConcatenable(left)) {
      return mkString(valueToString(left) + right.value);
    }
    throw new KuzurTypeError(`Cannot add ${typeName(left)} and ${typeName(right)}`, position);
  }

  private numericOperands(op: string, left: KuzurValue, right: KuzurValue, position: Position): [number, number] {
    if (left.kind === 'number' && right.kind === 'number') {
      return [left.value, right.value];
    }
    throw new KuzurTypeError(`'${op}' expects Numbers, got ${typeName(left)} and ${typeName(right)}`, position);
  }

  private compareValues(op: string, left: KuzurValue, right: KuzurValue, position: Position): number {
    if (left.kind === 'number' && right.kind === 'number') {
      return left.value - right.value;
    }
    if (left.kind === 'string' && right.kind === 'string') {
      if (left.value === right.value) return 0;
      return left.value < right.value ? -1 : 1;
    }
    throw new KuzurTypeError(`Cannot compare ${typeName(left)} and ${typeName(right)} with '${op}'`, position);
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private evalCall(expr: CallExpression, env: Environment): KuzurValue {
    const callee = env.lookup(expr.callee, expr.position);
    const args = expr.args.map((arg) => this.evalExpression(arg, env));

    if (callee.kind === 'builtin') {
      return callee.fn(args, expr.position);
    }
    if (callee.kind === 'function') {
      return this.callFunction(callee, args, expr.position);
    }
    throw new KuzurTypeError(`'${expr.callee}' is not callable (it is a ${typeName(callee)})`, expr.position);
  }

  /**
   * Invoke a user function: new call frame over the captured environment,
   * positional parameter binding, and Return handling.
   */
  callFunction(fn: KuzurFunction, args: KuzurValue[], site: Position): KuzurValue {
    if (args.length !== fn.params.length) {
      const expected = `${fn.params.length} argument${fn.params.length === 1 ? '' : 's'}`;
      throw new KuzurArityError(fn.name, expected, args.length, site);
    }
    if (this.callDepth >= this.maxCallDepth) {
      throw new KuzurRuntimeError(`maximum call depth exceeded (${this.maxCallDepth}) in '${fn.name}'`, site);
    }

    const frame = fn.closure.child(true);
    fn.params.forEach((param, i) => frame.define(param, args[i]));

    this.callDepth++;
    let signal: Signal;
    try {
      signal = this.execBlock(fn.body, frame);
    } catch (e) {
      // The host stack can run out before maxCallDepth is reached.
      if (isHostStackOverflow(e)) {
        throw new KuzurRuntimeError(`maximum call depth exceeded in '${fn.name}'`, site);
      }
      throw e;
    } finally {
      this.callDepth--;
    }

    if (signal.type === 'return') return signal.value;
    this.rejectEscapedSignal(signal);
    return mkNull();
  }
}

function isConcatenable(v: KuzurValue): boolean {
  return v.kind === 'string' || v.kind === 'number' || v.kind === 'bool';
}
