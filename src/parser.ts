/**
 * Recursive-descent parser for the calculator language.
 *
 * Grammar, lowest precedence first:
 *
 *       A  ->  S ('=' A)?
 *       S  ->  T (('+' | '-') S)?
 *       T  ->  C (('*' | '/') T)?
 *       C  ->  F ('(' A ')')?
 *       F  ->  integer | identifier | '(' A ')'
 *           |  func '(' identifier ')' '{' A '}'
 *           |  if A relop A then A else A
 *
 * Each level recurses into itself for its right operand, so chains of
 * same-level operators group to the right: `20 - 8 - 2` is `20 - (8 - 2)`.
 *
 * A line starting with the command prefix (`:` by default) is parsed as
 * a command instead: `:define x = <expr>`, `:load`, or any other name.
 */

import {
  Expr,
  mkIntegerLiteral,
  mkIdentifier,
  mkBinaryOp,
  mkCall,
  mkFunctionDef,
  mkConditional,
} from './ast';
import { CalcError, CalcSyntaxError, fromRangeError } from './errors';
import { Result, ok, error } from './result';
import { Token, TokenSource, isIdentifierToken, isIntegerToken } from './scanner';

export interface ParserOptions {
  commandPrefix: string;
}

export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  commandPrefix: ':',
};

export type ParseResult = Result<Expr, CalcError>;

/**
 * Parse one complete line from a token source. Throws CalcSyntaxError
 * on malformed input or on tokens left over after the expression.
 */
export function parseExpression(tokens: TokenSource, options: ParserOptions = DEFAULT_PARSER_OPTIONS): Expr {
  return new Parser(tokens, options).parseLine();
}

/**
 * Parse from a token source, reporting syntax errors as a result.
 */
export function parse(tokens: TokenSource, options: ParserOptions = DEFAULT_PARSER_OPTIONS): ParseResult {
  try {
    return ok(parseExpression(tokens, options));
  } catch (e) {
    if (e instanceof CalcError) return error(e);
    if (e instanceof RangeError) return error(fromRangeError(e));
    throw e;
  }
}

/**
 * Binding strength of a binary operator token; 0 for anything else.
 */
export function precedence(token: Token): number {
  if (token.length > 1) return 0;
  switch (token) {
    case '=': return 1;
    case '+': case '-': return 2;
    case '*': case '/': return 3;
    default: return 0;
  }
}

class Parser {
  constructor(
    private readonly tokens: TokenSource,
    private readonly options: ParserOptions,
  ) {}

  parseLine(): Expr {
    const command = this.readCommandToken();
    if (command !== null) {
      return this.readCommand(command);
    }
    const exp = this.readAssignment();
    this.expectEnd();
    return exp;
  }

  // ---- Commands ----

  /**
   * If the line starts with the command prefix, return the full command
   * name (prefix joined with the following token). Otherwise leave the
   * first token in place and return null.
   */
  private readCommandToken(): string | null {
    const token = this.tokens.next();
    if (token === null || !token.startsWith(this.options.commandPrefix)) {
      this.tokens.pushback(token);
      return null;
    }
    if (token !== this.options.commandPrefix) return token;
    return token + (this.tokens.next() ?? '');
  }

  private readCommand(command: string): Expr {
    const prefix = this.options.commandPrefix;

    if (command === `${prefix}define`) {
      const id = this.tokens.next();
      if (id === null || !isIdentifierToken(id)) {
        throw new CalcSyntaxError(`${command} expects an identifier`);
      }
      const op = this.tokens.next();
      if (op !== '=') {
        throw new CalcSyntaxError(`${command} expects '=' after '${id}'`);
      }
      const value = this.readAssignment();
      this.expectEnd();
      return mkBinaryOp('=', mkIdentifier(id), value);
    }

    // `:load` and unknown commands evaluate as an identifier named after
    // the command.
    // TODO: make `:load <file>` read and evaluate the file line by line
    return mkIdentifier(command);
  }

  // ---- Expressions ----

  private readAssignment(): Expr {
    const exp = this.readSum();
    const token = this.tokens.next();

    if (token === '=') {
      if (exp.kind !== 'identifier') {
        throw new CalcSyntaxError('Invalid assignment target');
      }
      return mkBinaryOp('=', exp, this.readAssignment());
    }

    this.tokens.pushback(token);
    return exp;
  }

  private readSum(): Expr {
    const exp = this.readProduct();
    const token = this.tokens.next();

    if (token === '+' || token === '-') {
      return mkBinaryOp(token, exp, this.readSum());
    }

    this.tokens.pushback(token);
    return exp;
  }

  private readProduct(): Expr {
    const exp = this.readCall();
    const token = this.tokens.next();

    if (token === '*' || token === '/') {
      return mkBinaryOp(token, exp, this.readProduct());
    }

    this.tokens.pushback(token);
    return exp;
  }

  private readCall(): Expr {
    const exp = this.readTerm();
    const token = this.tokens.next();

    if (token === '(') {
      const argument = this.readAssignment();
      this.tokens.next(); // ")"
      return mkCall(exp, argument);
    }

    this.tokens.pushback(token);
    return exp;
  }

  private readTerm(): Expr {
    const token = this.tokens.next();

    if (token === '(') {
      const exp = this.readAssignment();
      this.tokens.next(); // ")"
      return exp;
    }
    if (token !== null && isIntegerToken(token)) {
      if (!/^[0-9]+$/.test(token)) {
        throw new CalcSyntaxError(`Malformed integer '${token}'`);
      }
      return mkIntegerLiteral(BigInt(token));
    }
    if (token !== null && isIdentifierToken(token)) {
      if (token === 'func') return this.readFunction();
      if (token === 'if') return this.readConditional();
      return mkIdentifier(token);
    }

    throw new CalcSyntaxError('Illegal term in expression');
  }

  private readFunction(): Expr {
    this.tokens.next(); // "("
    const param = this.tokens.next();
    if (param === null) {
      throw new CalcSyntaxError('Function literal is missing its parameter');
    }
    this.tokens.next(); // ")"
    this.tokens.next(); // "{"
    const body = this.readAssignment();
    this.tokens.next(); // "}"
    return mkFunctionDef(param, body);
  }

  private readConditional(): Expr {
    const left = this.readAssignment();
    const relation = this.tokens.next();
    if (relation === null) {
      throw new CalcSyntaxError('Conditional is missing its relational operator');
    }
    const right = this.readAssignment();
    this.expectKeyword('then');
    const consequence = this.readAssignment();
    this.expectKeyword('else');
    const alternative = this.readAssignment();
    return mkConditional(left, relation, right, consequence, alternative);
  }

  // ---- Helpers ----

  private expectKeyword(keyword: string): void {
    const token = this.tokens.next();
    if (token !== keyword) {
      throw new CalcSyntaxError(`Expected '${keyword}' in conditional expression`);
    }
  }

  private expectEnd(): void {
    const token = this.tokens.next();
    if (token !== null) {
      throw new CalcSyntaxError(`Unexpected token '${token}' after expression`);
    }
  }
}
