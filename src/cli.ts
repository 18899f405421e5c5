/**
 * Command-line argument parsing for the report runner.
 *
 * Kept apart from the entry point so it can be tested without running the
 * pipeline.
 */

import { DEFAULT_CONFIG_PATH } from './config/index.js';
import type { RunOptions } from './pipeline/index.js';

export const USAGE = `Usage: sales-report [options]

Options:
  -t, --test              Test mode: every email goes to TEST_EMAIL with a [TEST] subject
  -c, --config <path>     Base configuration document (default: ${DEFAULT_CONFIG_PATH})
      --scheduled         Scheduled run: production mode, all categories
      --ci                Apply the ci_ path overrides in production mode
      --category <name>   Only dispatch this recipient category (repeatable)
      --materialize <path>
                          Write the merged configuration (without secrets) to <path>
  -h, --help              Show this help`;

export class UsageError extends Error {
  readonly code = 'USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: RunOptions };

/** @throws UsageError for unknown flags, missing values or conflicting modes */
export function parseCliArgs(args: readonly string[]): CliCommand {
  let test = false;
  let scheduled = false;
  let ci = false;
  let configPath = DEFAULT_CONFIG_PATH;
  let materializePath: string | undefined;
  const categories: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i++];
    const [flag, inline] = splitFlag(arg);

    const value = (): string => {
      if (inline !== undefined) {
        if (!inline) throw new UsageError(`${flag} requires a value`);
        return inline;
      }
      const next = args[i];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-t':
      case '--test':
        test = true;
        break;
      case '--scheduled':
        scheduled = true;
        break;
      case '--ci':
        ci = true;
        break;
      case '-c':
      case '--config':
        configPath = value();
        break;
      case '--category':
        categories.push(value());
        break;
      case '--materialize':
        materializePath = value();
        break;
      default:
        throw new UsageError(arg.startsWith('-') ? `Unknown option: ${flag}` : `Unexpected argument: ${arg}`);
    }
  }

  if (scheduled && test) {
    throw new UsageError('--scheduled runs in production mode and cannot be combined with --test');
  }
  if (scheduled && categories.length > 0) {
    throw new UsageError('--scheduled dispatches every category and cannot be combined with --category');
  }

  return {
    kind: 'run',
    options: {
      mode: test ? 'test' : 'production',
      configPath,
      ci,
      ...(categories.length > 0 ? { categories } : {}),
      ...(materializePath ? { materializePath } : {}),
    },
  };
}

/** "--config=a.json" -> ["--config", "a.json"]; "-t" -> ["-t", undefined] */
function splitFlag(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) return [arg, undefined];
  const eq = arg.indexOf('=');
  if (eq === -1) return [arg, undefined];
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}
