/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createResolveCommand } from './commands/resolve.js';
import { createRulesCommand } from './commands/rules.js';
import { createTranscribeCommand } from './commands/transcribe.js';
import { createInitCommand } from './commands/init.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Push-to-talk voice commands resolved to a fixed action set')
    .option('-v, --verbose', 'Log to the console instead of the log file');

  program.addCommand(createResolveCommand());
  program.addCommand(createRulesCommand());
  program.addCommand(createTranscribeCommand());
  program.addCommand(createInitCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
