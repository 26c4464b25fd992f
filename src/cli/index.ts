/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createIngestCommand } from './commands/ingest.js';
import { createAskCommand } from './commands/ask.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Typed ontology reasoning over weighted SubclassOf / InstanceOf / HasAttribute graphs');

  program.addCommand(createIngestCommand());
  program.addCommand(createAskCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${NAME}: ${message.split('\n')[0]}`);
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}
