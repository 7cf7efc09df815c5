/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { PlaywiseError, toError } from '../core/errors.js';
import { createInitCommand } from './commands/init.js';
import { createEvaluateCommand } from './commands/evaluate.js';
import { createEstimateCommand } from './commands/estimate.js';
import { createRecalibrateCommand } from './commands/recalibrate.js';
import { createPruneCommand } from './commands/prune.js';
import { createClientsCommand } from './commands/clients.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Advisory playback policy decisions and outcome-driven client confidence');

  program.addCommand(createInitCommand());
  program.addCommand(createEvaluateCommand());
  program.addCommand(createEstimateCommand());
  program.addCommand(createRecalibrateCommand());
  program.addCommand(createPruneCommand());
  program.addCommand(createClientsCommand());

  return program;
}

export async function main(argv: string[] = process.argv, cli: Command = createCLI()): Promise<void> {
  try {
    await cli.parseAsync(argv);
  } catch (error) {
    const err = toError(error);
    const code = err instanceof PlaywiseError ? ` [${err.code}]` : '';
    console.error(`\n  ${err.message}${code}\n`);
    if (process.env.DEBUG) {
      console.error(err.stack);
    }
    process.exitCode = 1;
  }
}
