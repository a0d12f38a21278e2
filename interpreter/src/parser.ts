/**
 * Recursive-descent parser for Kuzur.
 *
 * Statements are parsed by dedicated methods; expressions use precedence
 * climbing over BINARY_PRECEDENCE. The parser stops at the first error:
 * there is no recovery and no multi-error reporting.
 */

import {
  Program,
  Statement,
  Expression,
  Block,
  ElifClause,
  IfStatement,
  WhileStatement,
  DoWhileStatement,
  ForStatement,
  FuncDecl,
  ReturnStatement,
  BinaryOperator,
  LogicalOperator,
} from './ast';
import { Token, tokenize, describeToken } from './lexer';
import { KuzurParseError, isHostStackOverflow } from './errors';

type InfixOperator = BinaryOperator | LogicalOperator;

const BINARY_PRECEDENCE: Readonly<Record<InfixOperator, number>> = {
  '||': 1,
  '&&': 2,
  '==': 3,
  '!=': 3,
  '<': 4,
  '<=': 4,
  '>': 4,
  '>=': 4,
  '+': 5,
  '-': 5,
  '*': 6,
  '/': 6,
  '%': 6,
};

function isInfixOperator(text: string): text is InfixOperator {
  return Object.prototype.hasOwnProperty.call(BINARY_PRECEDENCE, text);
}

export class Parser {
  private readonly tokens: Token[];
  private idx = 0;

  constructor(tokens: Token[]) {
    if (tokens.length === 0 || tokens[tokens.length - 1].kind !== 'eof') {
      throw new Error('Token sequence must end with an eof token');
    }
    this.tokens = tokens;
  }

  parseProgram(): Program {
    const statements: Statement[] = [];
    try {
      while (!this.isAtEnd()) {
        if (this.matchOperator(';')) continue;
        statements.push(this.parseStatement());
      }
    } catch (e) {
      if (isHostStackOverflow(e)) throw this.errorAtCurrent('less deeply nested input');
      throw e;
    }
    return { type: 'Program', statements };
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private parseStatement(): Statement {
    const tok = this.current();

    if (tok.kind === 'keyword') {
      switch (tok.text) {
        case 'if': return this.parseIf();
        case 'while': return this.parseWhile();
        case 'do': return this.parseDoWhile();
        case 'for': return this.parseFor();
        case 'func': return this.parseFuncDecl();
        case 'return': return this.parseReturn();
        case 'break':
          this.advance();
          return { type: 'BreakStatement', position: tok.position };
        case 'continue':
          this.advance();
          return { type: 'ContinueStatement', position: tok.position };
        default:
          // elif / else without a preceding if
          throw this.errorAtCurrent('a statement');
      }
    }

    if (this.checkOperator('{')) return this.parseBlock();

    const expression = this.parseExpression();
    if (expression.type === 'AssignmentExpression') {
      return { type: 'VarAssign', name: expression.target, value: expression.value, position: expression.position };
    }
    return { type: 'ExpressionStatement', expression, position: expression.position };
  }

  private parseBlock(): Block {
    const open = this.expectOperator('{', "'{'");
    const statements: Statement[] = [];
    while (!this.checkOperator('}')) {
      if (this.isAtEnd()) throw this.errorAtCurrent("'}'");
      if (this.matchOperator(';')) continue;
      statements.push(this.parseStatement());
    }
    this.advance();
    return { type: 'Block', statements, position: open.position };
  }

  private parseCondition(keyword: string): Expression {
    this.expectOperator('(', `'(' after '${keyword}'`);
    const condition = this.parseExpression();
    this.expectOperator(')', `')' after ${keyword} condition`);
    return condition;
  }

  private parseIf(): IfStatement {
    const kw = this.advance();
    const condition = this.parseCondition('if');
    const consequent = this.parseBlock();

    const elifs: ElifClause[] = [];
    while (this.checkKeyword('elif')) {
      const elifTok = this.advance();
      const elifCondition = this.parseCondition('elif');
      elifs.push({ condition: elifCondition, body: this.parseBlock(), position: elifTok.position });
    }

    let alternate: Block | null = null;
    if (this.checkKeyword('else')) {
      this.advance();
      alternate = this.parseBlock();
    }

    return { type: 'IfStatement', condition, consequent, elifs, alternate, position: kw.position };
  }

  private parseWhile(): WhileStatement {
    const kw = this.advance();
    const condition = this.parseCondition('while');
    const body = this.parseBlock();
    return { type: 'WhileStatement', condition, body, position: kw.position };
  }

  private parseDoWhile(): DoWhileStatement {
    const kw = this.advance();
    const body = this.parseBlock();
    if (!this.checkKeyword('while')) throw this.errorAtCurrent("'while' after do block");
    this.advance();
    const condition = this.parseCondition('while');
    return { type: 'DoWhileStatement', body, condition, position: kw.position };
  }

  /**
   * `for i = start; end { ... }`, optionally with the header in parentheses.
   */
  private parseFor(): ForStatement {
    const kw = this.advance();
    const parenthesized = this.matchOperator('(');
    const variable = this.expectIdentifier('loop variable name').text;
    this.expectOperator('=', "'=' after loop variable");
    const start = this.parseExpression();
    this.expectOperator(';', "';' between loop start and end");
    const end = this.parseExpression();
    if (parenthesized) this.expectOperator(')', "')' after for header");
    const body = this.parseBlock();
    return { type: 'ForStatement', variable, start, end, body, position: kw.position };
  }

  private parseFuncDecl(): FuncDecl {
    const kw = this.advance();
    const name = this.expectIdentifier('function name').text;
    this.expectOperator('(', "'(' after function name");

    const params: string[] = [];
    if (!this.checkOperator(')')) {
      do {
        const param = this.expectIdentifier('parameter name');
        if (params.includes(param.text)) {
          throw new KuzurParseError('distinct parameter names', `duplicate parameter '${param.text}'`, param.position);
        }
        params.push(param.text);
      } while (this.matchOperator(','));
    }
    this.expectOperator(')', "')' after parameters");

    const body = this.parseBlock();
    return { type: 'FuncDecl', name, params, body, position: kw.position };
  }

  private parseReturn(): ReturnStatement {
    const kw = this.advance();
    const next = this.current();
    const bare =
      next.kind === 'eof' ||
      (next.kind === 'operator' && (next.text === '}' || next.text === ';')) ||
      next.position.line > kw.position.line;
    const value = bare ? null : this.parseExpression();
    return { type: 'ReturnStatement', value, position: kw.position };
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  parseExpression(): Expression {
    return this.parseAssignment();
  }

  private parseAssignment(): Expression {
    const tok = this.current();
    const next = this.tokens[this.idx + 1];
    if (tok.kind === 'identifier' && next.kind === 'operator' && next.text === '=') {
      this.advance();
      this.advance();
      const value = this.parseAssignment();
      return { type: 'AssignmentExpression', target: tok.text, value, position: tok.position };
    }
    return this.parseBinary(1);
  }

  /**
   * Precedence climbing: parse operands binding at least as tightly as
   * `minPrec`, folding left-associatively.
   */
  private parseBinary(minPrec: number): Expression {
    let left = this.parseUnary();

    for (;;) {
      const tok = this.current();
      const op = tok.text;
      if (tok.kind !== 'operator' || !isInfixOperator(op)) break;
      const prec = BINARY_PRECEDENCE[op];
      if (prec < minPrec) break;

      this.advance();
      const right = this.parseBinary(prec + 1);
      if (op === '&&' || op === '||') {
        left = { type: 'LogicalExpression', operator: op, left, right, position: left.position };
      } else {
        left = { type: 'BinaryExpression', operator: op, left, right, position: left.position };
      }
    }

    return left;
  }

  private parseUnary(): Expression {
    const tok = this.current();
    const op = tok.text;
    if (tok.kind === 'operator' && (op === '-' || op === '!')) {
      this.advance();
      const operand = this.parseUnary();
      return { type: 'UnaryExpression', operator: op, operand, position: tok.position };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const tok = this.current();

    switch (tok.kind) {
      case 'number':
        this.advance();
        return { type: 'NumberLiteral', value: Number(tok.text), position: tok.position };
      case 'string':
        this.advance();
        return { type: 'StringLiteral', value: tok.text, position: tok.position };
      case 'boolean':
        this.advance();
        return { type: 'BooleanLiteral', value: tok.text === 'true', position: tok.position };
      case 'identifier':
        this.advance();
        if (this.checkOperator('(')) return this.parseCallArguments(tok);
        return { type: 'Identifier', name: tok.text, position: tok.position };
      default:
        break;
    }

    if (this.matchOperator('(')) {
      const inner = this.parseExpression();
      this.expectOperator(')', "')'");
      return inner;
    }

    throw this.errorAtCurrent('an expression');
  }

  private parseCallArguments(calleeTok: Token): Expression {
    this.advance(); // '('
    const args: Expression[] = [];
    if (!this.checkOperator(')')) {
      do {
        args.push(this.parseExpression());
      } while (this.matchOperator(','));
    }
    this.expectOperator(')', "')' after arguments");
    return { type: 'CallExpression', callee: calleeTok.text, args, position: calleeTok.position };
  }

  // ==================================================================
  // Token helpers
  // ==================================================================

  private current(): Token {
    return this.tokens[this.idx];
  }

  private isAtEnd(): boolean {
    return this.current().kind === 'eof';
  }

  private advance(): Token {
    const tok = this.current();
    if (tok.kind !== 'eof') this.idx++;
    return tok;
  }

  private checkOperator(text: string): boolean {
    const tok = this.current();
    return tok.kind === 'operator' && tok.text === text;
  }

  private checkKeyword(text: string): boolean {
    const tok = this.current();
    return tok.kind === 'keyword' && tok.text === text;
  }

  private matchOperator(text: string): boolean {
    if (!this.checkOperator(text)) return false;
    this.advance();
    return true;
  }

  private expectOperator(text: string, expected: string): Token {
    if (!this.checkOperator(text)) throw this.errorAtCurrent(expected);
    return this.advance();
  }

  private expectIdentifier(expected: string): Token {
    if (this.current().kind !== 'identifier') throw this.errorAtCurrent(expected);
    return this.advance();
  }

  private errorAtCurrent(expected: string): KuzurParseError {
    const tok = this.current();
    return new KuzurParseError(expected, describeToken(tok), tok.position);
  }
}

/**
 * Parse a token sequence (ending in `eof`) into a Program.
 */
export function parse(tokens: Token[]): Program {
  return new Parser(tokens).parseProgram();
}

/**
 * Lex and parse Kuzur source text.
 */
export function parseSource(source: string): Program {
  return parse(tokenize(source));
}
