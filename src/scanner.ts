/**
 * Line scanner for the calculator language.
 *
 * Splits a line into short string tokens and keeps at most one token
 * of pushback, which is all the lookahead the grammar needs.
 */

export type Token = string;

export interface TokenSource {
  /** Next token, or null once the line is exhausted. */
  next(): Token | null;
  /** Return a token so the following next() yields it again. */
  pushback(token: Token | null): void;
}

/** The interpreter always scans with `ignoreSpaces` on. */
export interface ScannerOptions {
  ignoreSpaces: boolean;
}

const TWO_CHAR_OPERATORS = ['<=', '>=', '==', '!='];

export function isIntegerToken(token: Token): boolean {
  return /^[0-9]/.test(token);
}

export function isIdentifierToken(token: Token): boolean {
  return /^[A-Za-z]/.test(token);
}

function isWordChar(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

export class Scanner implements TokenSource {
  private input = '';
  private pos = 0;
  /** Pushed-back lookahead; undefined when the slot is empty. */
  private saved: { token: Token | null } | undefined = undefined;
  private readonly options: ScannerOptions;

  constructor(input = '', options: Partial<ScannerOptions> = {}) {
    this.options = { ignoreSpaces: true, ...options };
    this.setInput(input);
  }

  /**
   * Start scanning a new line, dropping any leftover state.
   */
  setInput(input: string): void {
    this.input = input;
    this.pos = 0;
    this.saved = undefined;
  }

  next(): Token | null {
    if (this.saved !== undefined) {
      const { token } = this.saved;
      this.saved = undefined;
      return token;
    }
    return this.scan();
  }

  pushback(token: Token | null): void {
    if (this.saved !== undefined) {
      throw new Error('Scanner pushback capacity exceeded');
    }
    this.saved = { token };
  }

  private scan(): Token | null {
    const { input } = this;

    if (this.options.ignoreSpaces) {
      while (this.pos < input.length && isSpace(input[this.pos])) this.pos++;
    }
    if (this.pos >= input.length) return null;

    const start = this.pos;
    const ch = input[start];

    if (isSpace(ch)) {
      while (this.pos < input.length && isSpace(input[this.pos])) this.pos++;
      return input.slice(start, this.pos);
    }

    if (isWordChar(ch)) {
      while (this.pos < input.length && isWordChar(input[this.pos])) this.pos++;
      return input.slice(start, this.pos);
    }

    const pair = input.slice(start, start + 2);
    if (TWO_CHAR_OPERATORS.includes(pair)) {
      this.pos += 2;
      return pair;
    }

    this.pos++;
    return ch;
  }
}
