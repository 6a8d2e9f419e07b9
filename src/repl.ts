/**
 * Calculator REPL: interactive read-eval-print loop.
 *
 * Usage: calc [repl] [--prompt <text>]
 *
 *   - Variables persist between lines
 *   - Special commands: :help, :env, :quit
 *   - A failing line prints `Error: <message>` and the loop continues
 */

import * as readline from 'readline';
import { Interpreter, formatResult } from './interpreter';
import { ReplConfig } from './config';
import { valueToString } from './values';

const VERSION = '0.1.0';

export type LineOutcome =
  | { kind: 'print'; text: string }
  | { kind: 'skip' }
  | { kind: 'quit' };

/**
 * Decide what one input line does. REPL-only commands are handled here;
 * everything else, including other `:` commands, goes to the interpreter.
 */
export function handleLine(line: string, interpreter: Interpreter): LineOutcome {
  const trimmed = line.trim();

  switch (trimmed) {
    case '':
      return { kind: 'skip' };
    case ':quit':
    case ':q':
      return { kind: 'quit' };
    case ':help':
      return { kind: 'print', text: HELP_TEXT };
    case ':env':
      return { kind: 'print', text: describeEnvironment(interpreter) };
  }

  return { kind: 'print', text: formatResult(interpreter.evalLine(trimmed)) };
}

/**
 * Start the REPL on stdin/stdout.
 */
export function startRepl(config: ReplConfig): void {
  const interpreter = new Interpreter();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.prompt,
  });

  console.log(`calc v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    try {
      const outcome = handleLine(line, interpreter);
      if (outcome.kind === 'quit') {
        rl.close();
        return;
      }
      if (outcome.kind === 'print') {
        console.log(outcome.text);
      }
    } catch (e) {
      // Host-level failures such as stack overflow from runaway recursion
      console.log(`Error: ${e instanceof Error ? e.message : String(e)}`);
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

const HELP_TEXT = [
  'REPL Commands:',
  '  :help              Show this help message',
  '  :env               Show all global variables',
  '  :quit, :q          Exit the REPL',
  '  :define x = <expr> Bind x to the value of <expr>',
  '',
  'Expressions:',
  '  1 + 2 * 3    x = 5    f = func (n) { n * 2 }    f(21)',
  '  if x < 10 then 1 else 0',
].join('\n');

function describeEnvironment(interpreter: Interpreter): string {
  const bindings = interpreter.getGlobalEnv().bindings();
  if (bindings.length === 0) {
    return '  (no variables defined)';
  }
  return bindings.map(([name, value]) => `  ${name} = ${valueToString(value)}`).join('\n');
}
