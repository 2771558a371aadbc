/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';
import { parseHttpPort } from '../config/resolve-config';

type ArgValue = { value: string; skip: number } | { error: string };

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): ArgValue {
  const arg = args[index];

  // Check for --arg=value format
  const equalsIndex = arg.indexOf('=');
  if (equalsIndex !== -1) {
    const value = arg.slice(equalsIndex + 1);
    if (!value) {
      return { error: `${argName}= requires a value` };
    }
    return { value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { error: `${argName} requires a value` };
  }
  return { value: nextArg, skip: 1 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--config': {
        const parsed = getArgValue(args, i, '--config');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        result.configPath = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--port': {
        const parsed = getArgValue(args, i, '--port');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        const port = parseHttpPort(parsed.value);
        if (port === undefined) {
          return { success: false, error: 'Error: --port must be an integer between 1 and 65535' };
        }
        result.port = port;
        i += parsed.skip;
        break;
      }

      case '--endpoint': {
        const parsed = getArgValue(args, i, '--endpoint');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        if (!parsed.value.startsWith('/')) {
          return { success: false, error: 'Error: --endpoint must start with "/"' };
        }
        result.endpoint = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        return { success: false, error: `Error: Unexpected argument: ${arg}` };
      }
    }
  }

  return { success: true, args: result };
}
