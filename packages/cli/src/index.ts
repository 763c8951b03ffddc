/**
 * mustard CLI - render and check logic-less templates
 */

import { Command, type CommanderError } from 'commander';
import { checkCommand } from './commands/check.js';
import { renderCommand } from './commands/render.js';
import { EXIT_USAGE_ERROR } from './reporter.js';

const program = new Command();

program.name('mustard').description('Render and check mustache-style templates').version('0.1.0');

// Register commands
program.addCommand(renderCommand);
program.addCommand(checkCommand);

// Commander reports bad arguments with exit code 1; those are usage errors here
function exitOnUsageError(error: CommanderError): never {
  process.exit(error.exitCode === 0 ? 0 : EXIT_USAGE_ERROR);
}

program.exitOverride(exitOnUsageError);
for (const command of program.commands) {
  command.exitOverride(exitOnUsageError);
}

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = EXIT_USAGE_ERROR;
});
