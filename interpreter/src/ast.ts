/**
 * AST node types for Kuzur.
 *
 * Expressions and statements are discriminated on `type`. Every node
 * records the position of its first token. The tree is strict: a block
 * owns its statements and nothing is shared between parents.
 */

import type { Position } from './lexer';

// ---- Expressions ----

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = '&&' | '||';
export type UnaryOperator = '-' | '!';

export interface NumberLiteral {
  type: 'NumberLiteral';
  value: number;
  position: Position;
}

export interface StringLiteral {
  type: 'StringLiteral';
  value: string;
  position: Position;
}

export interface BooleanLiteral {
  type: 'BooleanLiteral';
  value: boolean;
  position: Position;
}

export interface Identifier {
  type: 'Identifier';
  name: string;
  position: Position;
}

export interface UnaryExpression {
  type: 'UnaryExpression';
  operator: UnaryOperator;
  operand: Expression;
  position: Position;
}

export interface BinaryExpression {
  type: 'BinaryExpression';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
  position: Position;
}

/** `&&` / `||`; the right operand is only evaluated when needed. */
export interface LogicalExpression {
  type: 'LogicalExpression';
  operator: LogicalOperator;
  left: Expression;
  right: Expression;
  position: Position;
}

export interface CallExpression {
  type: 'CallExpression';
  callee: string;
  args: Expression[];
  position: Position;
}

export interface AssignmentExpression {
  type: 'AssignmentExpression';
  target: string;
  value: Expression;
  position: Position;
}

export type Expression =
  | NumberLiteral
  | StringLiteral
  | BooleanLiteral
  | Identifier
  | UnaryExpression
  | BinaryExpression
  | LogicalExpression
  | CallExpression
  | AssignmentExpression;

// ---- Statements ----

export interface ExpressionStatement {
  type: 'ExpressionStatement';
  expression: Expression;
  position: Position;
}

/** `name = expr` at statement level; assignment doubles as declaration. */
export interface VarAssign {
  type: 'VarAssign';
  name: string;
  value: Expression;
  position: Position;
}

export interface ElifClause {
  condition: Expression;
  body: Block;
  position: Position;
}

export interface IfStatement {
  type: 'IfStatement';
  condition: Expression;
  consequent: Block;
  elifs: ElifClause[];
  alternate: Block | null;
  position: Position;
}

export interface WhileStatement {
  type: 'WhileStatement';
  condition: Expression;
  body: Block;
  position: Position;
}

export interface DoWhileStatement {
  type: 'DoWhileStatement';
  body: Block;
  condition: Expression;
  position: Position;
}

/** `for i = start; end { ... }`, inclusive upper bound, step 1. */
export interface ForStatement {
  type: 'ForStatement';
  variable: string;
  start: Expression;
  end: Expression;
  body: Block;
  position: Position;
}

export interface FuncDecl {
  type: 'FuncDecl';
  name: string;
  params: string[];
  body: Block;
  position: Position;
}

export interface ReturnStatement {
  type: 'ReturnStatement';
  value: Expression | null;
  position: Position;
}

export interface BreakStatement {
  type: 'BreakStatement';
  position: Position;
}

export interface ContinueStatement {
  type: 'ContinueStatement';
  position: Position;
}

export interface Block {
  type: 'Block';
  statements: Statement[];
  position: Position;
}

export type Statement =
  | ExpressionStatement
  | VarAssign
  | IfStatement
  | WhileStatement
  | DoWhileStatement
  | ForStatement
  | FuncDecl
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | Block;

export interface Program {
  type: 'Program';
  statements: Statement[];
}
