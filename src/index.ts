#!/usr/bin/env node
/**
 * calc CLI entry point.
 *
 * Usage: calc                  Start the REPL
 *        calc repl             Start the REPL
 *        calc --eval "<line>"  Evaluate one line and print the result
 */

import { parseArgs } from './config';
import { Interpreter, formatResult } from './interpreter';
import { startRepl } from './repl';

function main(): void {
  const command = parseArgs(process.argv.slice(2));

  switch (command.mode) {
    case 'help':
      printUsage();
      process.exit(0);
      break;
    case 'usage-error':
      console.error(`Error: ${command.message}`);
      printUsage();
      process.exit(1);
      break;
    case 'eval': {
      const interpreter = new Interpreter();
      const result = interpreter.evalLine(command.source);
      console.log(formatResult(result));
      process.exit(result.type === 'ok' ? 0 : 1);
      break;
    }
    case 'repl':
      startRepl(command.config);
      break;
  }
}

function printUsage(): void {
  console.log('calc v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  calc [repl] [--prompt <text>]   Start the interactive REPL');
  console.log('  calc --eval "<line>"            Evaluate one line and print the result');
  console.log('  calc --help                     Show this help');
}

main();
