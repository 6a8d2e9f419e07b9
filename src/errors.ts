/**
 * Error types raised while parsing or evaluating a line.
 *
 * Every failure the user can cause is a CalcError; the REPL prints
 * its message and moves on to the next line.
 */

export class CalcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalcError';
  }
}

export class CalcSyntaxError extends CalcError {
  constructor(message: string) {
    super(message);
    this.name = 'CalcSyntaxError';
  }
}

export class CalcUnboundIdentifierError extends CalcError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`Undefined identifier '${identifier}'`);
    this.name = 'CalcUnboundIdentifierError';
    this.identifier = identifier;
  }
}

export class CalcTypeMismatchError extends CalcError {
  constructor(message: string) {
    super(message);
    this.name = 'CalcTypeMismatchError';
  }
}

export class CalcDivisionByZeroError extends CalcError {
  constructor() {
    super('Division by zero');
    this.name = 'CalcDivisionByZeroError';
  }
}

export class CalcRecursionError extends CalcError {
  constructor() {
    super('Maximum recursion depth exceeded');
    this.name = 'CalcRecursionError';
  }
}

/**
 * Map a host RangeError (stack overflow, oversized BigInt) onto the
 * language's error type so it reaches the caller as a result.
 */
export function fromRangeError(e: RangeError): CalcError {
  return /call stack/i.test(e.message) ? new CalcRecursionError() : new CalcError(e.message);
}
