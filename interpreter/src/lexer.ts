/**
 * Lexer for Kuzur source text.
 *
 * Produces tokens lazily through `Lexer.tokens()`; `tokenize()` collects
 * them into an array for the parser. Whitespace and `//` comments are
 * skipped, so newlines never reach the parser. Each token still records
 * its line so the parser can tell where a bare `return` ends.
 */

import { KuzurLexError } from './errors';

export type TokenKind =
  | 'identifier'
  | 'number'
  | 'string'
  | 'boolean'
  | 'keyword'
  | 'operator'
  | 'eof';

export type Keyword =
  | 'if'
  | 'elif'
  | 'else'
  | 'while'
  | 'for'
  | 'do'
  | 'func'
  | 'return'
  | 'break'
  | 'continue';

export interface Position {
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
  /** 0-based offset into the source */
  offset: number;
}

export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token; for strings, the contents between the quotes. */
  readonly text: string;
  readonly position: Position;
}

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>([
  'if', 'elif', 'else', 'while', 'for', 'do', 'func', 'return', 'break', 'continue',
]);

// Longest first: a two-character operator always wins over its prefix.
const OPERATORS: readonly string[] = [
  '==', '!=', '<=', '>=', '&&', '||',
  '+', '-', '*', '/', '%', '<', '>', '=', '!',
  '(', ')', '{', '}', ',', ';',
];

export function isKeyword(text: string): text is Keyword {
  return KEYWORDS.has(text);
}

export class Lexer {
  private readonly src: string;
  private i = 0;
  private line = 1;
  private col = 1;

  constructor(source: string) {
    this.src = source;
  }

  /**
   * Yield tokens one at a time, finishing with a single `eof` token.
   * Throws KuzurLexError at the first malformed token.
   */
  *tokens(): Generator<Token, void, undefined> {
    for (;;) {
      this.skipTrivia();
      if (this.i >= this.src.length) {
        yield { kind: 'eof', text: '', position: this.position() };
        return;
      }
      yield this.next();
    }
  }

  private next(): Token {
    const start = this.position();
    const c = this.src[this.i];

    if (isDigit(c)) return this.lexNumber(start);
    if (isIdentStart(c)) return this.lexWord(start);
    if (c === '"') return this.lexString(start);

    for (const op of OPERATORS) {
      if (this.src.startsWith(op, this.i)) {
        this.advanceBy(op.length);
        return { kind: 'operator', text: op, position: start };
      }
    }

    if (c === '.' && isDigit(this.peek(1))) {
      throw new KuzurLexError('number literal must start with a digit', start);
    }
    throw new KuzurLexError(`unexpected character '${printable(c)}'`, start);
  }

  private skipTrivia(): void {
    while (this.i < this.src.length) {
      const c = this.src[this.i];
      if (c === ' ' || c === '\t' || c === '\r' || c === '\n') {
        this.advance();
      } else if (c === '/' && this.peek(1) === '/') {
        while (this.i < this.src.length && this.src[this.i] !== '\n') this.advance();
      } else {
        return;
      }
    }
  }

  private lexNumber(start: Position): Token {
    const from = this.i;
    while (isDigit(this.peek(0))) this.advance();
    if (this.peek(0) === '.') {
      if (!isDigit(this.peek(1))) {
        throw new KuzurLexError('expected digit after decimal point', this.position());
      }
      this.advance();
      while (isDigit(this.peek(0))) this.advance();
      if (this.peek(0) === '.' && isDigit(this.peek(1))) {
        throw new KuzurLexError('number literal has more than one decimal point', this.position());
      }
    }
    return { kind: 'number', text: this.src.slice(from, this.i), position: start };
  }

  private lexWord(start: Position): Token {
    const from = this.i;
    while (isIdentPart(this.peek(0))) this.advance();
    const text = this.src.slice(from, this.i);
    if (text === 'true' || text === 'false') return { kind: 'boolean', text, position: start };
    if (isKeyword(text)) return { kind: 'keyword', text, position: start };
    return { kind: 'identifier', text, position: start };
  }

  private lexString(start: Position): Token {
    this.advance(); // opening quote
    const from = this.i;
    while (this.i < this.src.length && this.src[this.i] !== '"') {
      if (this.src[this.i] === '\n') break;
      this.advance();
    }
    if (this.peek(0) !== '"') {
      throw new KuzurLexError('unterminated string', start);
    }
    const text = this.src.slice(from, this.i);
    this.advance(); // closing quote
    return { kind: 'string', text, position: start };
  }

  private peek(ahead: number): string {
    return this.src.charAt(this.i + ahead);
  }

  private advance(): void {
    if (this.src[this.i] === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    this.i++;
  }

  private advanceBy(n: number): void {
    for (let k = 0; k < n; k++) this.advance();
  }

  private position(): Position {
    return { line: this.line, column: this.col, offset: this.i };
  }
}

/**
 * Tokenize a whole source string eagerly.
 */
export function tokenize(source: string): Token[] {
  return Array.from(new Lexer(source).tokens());
}

/**
 * Human-readable description of a token, used in parse errors.
 */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case 'eof': return 'end of input';
    case 'string': return `string "${tok.text}"`;
    case 'number': return `number ${tok.text}`;
    case 'identifier': return `identifier '${tok.text}'`;
    default: return `'${tok.text}'`;
  }
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isIdentStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function printable(c: string): string {
  if (c === '\t') return '\\t';
  if (c === '\0') return '\\0';
  return c;
}
