/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createParseCommand } from './commands/parse.js';
import { createListenCommand } from './commands/listen.js';
import { createCalibrateCommand } from './commands/calibrate.js';
import { createConfigCommand } from './commands/config.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Voice commands for the desktop')
    .option('-v, --verbose', 'Log to stderr at debug level');

  program.addCommand(createListenCommand());
  program.addCommand(createParseCommand());
  program.addCommand(createCalibrateCommand());
  program.addCommand(createConfigCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
