/**
 * mustard check command
 *
 * Parses templates and reports lexer and parser errors without rendering.
 */

import { parse } from '@mustard/templates';
import { Command } from 'commander';
import * as path from 'node:path';
import {
  createColors,
  describeFailure,
  EXIT_OK,
  plural,
  processIO,
  type CommandIO,
} from '../reporter.js';
import { readTextFile } from '../workspace/loader.js';

export interface CheckCommandOptions {
  quiet?: boolean;
  color?: boolean;
}

/**
 * Check every file, reporting each failure
 *
 * @returns The highest exit code any file produced
 */
export async function runCheck(
  files: string[],
  options: CheckCommandOptions,
  io: CommandIO = processIO,
  cwd: string = process.cwd(),
): Promise<number> {
  const c = createColors(options.color !== false);
  let exitCode = EXIT_OK;
  let failed = 0;

  for (const file of files) {
    try {
      parse(await readTextFile(path.resolve(cwd, file)));
      if (!options.quiet) {
        io.stdout(`${c.green('✓')} ${file}\n`);
      }
    } catch (error) {
      const failure = describeFailure(file, error, c);
      io.stderr(`${failure.message}\n`);
      exitCode = Math.max(exitCode, failure.code);
      failed++;
    }
  }

  if (failed === 0) {
    if (!options.quiet) {
      io.stdout(c.green(`All ${plural(files.length, 'template')} passed\n`));
    }
  } else {
    io.stderr(c.gray(`Found errors in ${failed} of ${plural(files.length, 'template')}\n`));
  }

  return exitCode;
}

export const checkCommand = new Command('check')
  .description('Check templates for syntax errors')
  .argument('<templates...>', 'Template files to check')
  .option('--quiet', 'Only output on errors')
  .option('--no-color', 'Disable colored output')
  .action(async (templates: string[], options: CheckCommandOptions) => {
    process.exitCode = await runCheck(templates, options);
  });
