#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Runs one weekly sales report pipeline and exits:
 *   0  every stage completed and every category was delivered
 *   1  the run failed (the summary names the stage and error kind)
 *   2  invalid command-line usage
 *
 * Usage:
 *   Production: node dist/index.js --scheduled --ci
 *   Development: npx tsx src/index.ts --test
 */

import 'dotenv/config';

import { parseCliArgs, UsageError, USAGE } from './cli.js';
import type { CliCommand } from './cli.js';
import { formatRunSummary, runPipeline } from './pipeline/index.js';

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_USAGE = 2;

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`[startup] ${err.message}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }

  const { options } = command;
  console.log('[startup] Weekly sales report starting...');
  console.log('[startup] Mode:', options.mode);
  if (options.categories) {
    console.log('[startup] Categories:', options.categories.join(', '));
  }

  const summary = await runPipeline(options);
  console.log(formatRunSummary(summary));

  return summary.status === 'Done' ? EXIT_OK : EXIT_FAILED;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(EXIT_FAILED);
  });
