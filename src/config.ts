/**
 * Command-line options for the `calc` entry point.
 */

export interface ReplConfig {
  prompt: string;
}

export const DEFAULT_CONFIG: ReplConfig = {
  prompt: '=> ',
};

export type CliCommand =
  | { mode: 'repl'; config: ReplConfig }
  | { mode: 'eval'; config: ReplConfig; source: string }
  | { mode: 'help' }
  | { mode: 'usage-error'; message: string };

/**
 * Interpret process arguments (without the node and script paths).
 */
export function parseArgs(args: string[]): CliCommand {
  const config: ReplConfig = { ...DEFAULT_CONFIG };
  let source: string | null = null;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--help':
      case '-h':
        return { mode: 'help' };
      case 'repl':
        break;
      case '--eval':
      case '-e': {
        const code = args[++i];
        if (code === undefined) {
          return { mode: 'usage-error', message: `${args[i - 1]} requires a code argument` };
        }
        source = code;
        break;
      }
      case '--prompt': {
        const prompt = args[++i];
        if (prompt === undefined) {
          return { mode: 'usage-error', message: '--prompt requires a value' };
        }
        config.prompt = prompt;
        break;
      }
      default:
        return { mode: 'usage-error', message: `Unknown option: ${args[i]}` };
    }
  }

  return source !== null ? { mode: 'eval', config, source } : { mode: 'repl', config };
}
