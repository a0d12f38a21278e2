/**
 * Error types for the Kuzur interpreter.
 *
 * Every stage (lexer, parser, evaluator, builtins) reports failures as a
 * subclass of KuzurError. All of them are fatal to the current run.
 */

export type ErrorKind =
  | 'LexError'
  | 'ParseError'
  | 'NameError'
  | 'TypeError'
  | 'ArityError'
  | 'ValueError'
  | 'ControlFlowError'
  | 'RuntimeError';

export interface SourceLocation {
  line: number;
  column: number;
}

function formatLocation(loc?: SourceLocation): string {
  return loc !== undefined ? ` [line ${loc.line}, col ${loc.column}]` : '';
}

export class KuzurError extends Error {
  public readonly kind: ErrorKind;
  public readonly detail: string;
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(kind: ErrorKind, detail: string, loc?: SourceLocation) {
    super(`${kind}${formatLocation(loc)}: ${detail}`);
    this.name = 'KuzurError';
    this.kind = kind;
    this.detail = detail;
    this.line = loc?.line;
    this.column = loc?.column;
  }
}

export class KuzurLexError extends KuzurError {
  constructor(detail: string, loc: SourceLocation) {
    super('LexError', detail, loc);
    this.name = 'KuzurLexError';
  }
}

export class KuzurParseError extends KuzurError {
  public readonly expected: string;
  public readonly found: string;

  constructor(expected: string, found: string, loc: SourceLocation) {
    super('ParseError', `expected ${expected} but found ${found}`, loc);
    this.name = 'KuzurParseError';
    this.expected = expected;
    this.found = found;
  }
}

export class KuzurNameError extends KuzurError {
  public readonly identifier: string;

  constructor(identifier: string, loc?: SourceLocation) {
    super('NameError', `undefined name '${identifier}'`, loc);
    this.name = 'KuzurNameError';
    this.identifier = identifier;
  }
}

export class KuzurTypeError extends KuzurError {
  constructor(detail: string, loc?: SourceLocation) {
    super('TypeError', detail, loc);
    this.name = 'KuzurTypeError';
  }
}

export class KuzurArityError extends KuzurError {
  constructor(callee: string, expected: string, received: number, loc?: SourceLocation) {
    super('ArityError', `${callee}() takes ${expected} but ${received} ${received === 1 ? 'was' : 'were'} given`, loc);
    this.name = 'KuzurArityError';
  }
}

export class KuzurValueError extends KuzurError {
  constructor(detail: string, loc?: SourceLocation) {
    super('ValueError', detail, loc);
    this.name = 'KuzurValueError';
  }
}

export class KuzurControlFlowError extends KuzurError {
  constructor(detail: string, loc?: SourceLocation) {
    super('ControlFlowError', detail, loc);
    this.name = 'KuzurControlFlowError';
  }
}

/**
 * True for V8's stack overflow. Other RangeErrors, such as an invalid
 * string length, are not matched.
 */
export function isHostStackOverflow(e: unknown): e is RangeError {
  return e instanceof RangeError && /call stack/i.test(e.message);
}

export class KuzurRuntimeError extends KuzurError {
  constructor(detail: string, loc?: SourceLocation) {
    super('RuntimeError', detail, loc);
    this.name = 'KuzurRuntimeError';
  }
}

