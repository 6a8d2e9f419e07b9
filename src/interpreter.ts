/**
 * Interpreter session: one global environment shared by every line
 * evaluated through it.
 */

import { Environment } from './environment';
import { run, EvalResult } from './evaluator';
import { parse, ParserOptions, DEFAULT_PARSER_OPTIONS } from './parser';
import { isOk } from './result';
import { Scanner } from './scanner';
import { valueToString } from './values';

export class Interpreter {
  private globalEnv: Environment;
  private scanner: Scanner;
  private options: ParserOptions;

  constructor(options: Partial<ParserOptions> = {}) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options };
    this.globalEnv = new Environment();
    this.scanner = new Scanner();
  }

  /**
   * Parse and evaluate one line against the global environment.
   * Bindings made before a failure in the same line are kept.
   */
  evalLine(line: string): EvalResult {
    this.scanner.setInput(line);
    const parsed = parse(this.scanner, this.options);
    if (parsed.type === 'error') return parsed;
    return run(parsed.value, this.globalEnv);
  }

  getGlobalEnv(): Environment {
    return this.globalEnv;
  }
}

/**
 * Text printed for a line: the value, or `Error: <message>`.
 */
export function formatResult(result: EvalResult): string {
  return isOk(result)
    ? valueToString(result.value)
    : `Error: ${result.value.message}`;
}
