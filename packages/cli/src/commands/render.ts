/**
 * mustard render command
 *
 * Renders one template file against a JSON or YAML data file, with partials
 * loaded from a directory.
 */

import { createLogger } from '@mustard/logger';
import { compile } from '@mustard/templates';
import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig } from '../config.js';
import {
  createColors,
  describeFailure,
  EXIT_OK,
  processIO,
  type CommandIO,
} from '../reporter.js';
import { loadData, loadPartials, readTextFile } from '../workspace/loader.js';

export interface RenderCommandOptions {
  data?: string;
  partials?: string;
  out?: string;
  color?: boolean;
}

/**
 * Render a template file and write the result
 *
 * @returns The process exit code
 */
export async function runRender(
  templatePath: string,
  options: RenderCommandOptions,
  io: CommandIO = processIO,
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): Promise<number> {
  const c = createColors(options.color !== false);

  try {
    const config = loadConfig(cwd, env);
    const logger = createLogger({
      environment: config.environment,
      minLevel: config.logLevel,
      write: (line) => io.stderr(`${line}\n`),
    }).child({ template: templatePath });

    const template = await readTextFile(path.resolve(cwd, templatePath));
    const compiled = compile(template);

    const data = options.data ? await loadData(path.resolve(cwd, options.data)) : {};

    const partialsDir = options.partials ? path.resolve(cwd, options.partials) : config.partialsDir;
    const partials = partialsDir ? await loadPartials(partialsDir, config.partialExtension) : {};

    const output = compiled.render(data, { partials, logger });

    if (options.out) {
      await fs.writeFile(path.resolve(cwd, options.out), output, 'utf-8');
      logger.info('output_written', { out: options.out, bytes: Buffer.byteLength(output) });
    } else {
      io.stdout(output);
    }

    return EXIT_OK;
  } catch (error) {
    const failure = describeFailure(templatePath, error, c);
    io.stderr(`${failure.message}\n`);
    return failure.code;
  }
}

export const renderCommand = new Command('render')
  .description('Render a template with data and partials')
  .argument('<template>', 'Template file to render')
  .option('-d, --data <file>', 'Data file (.json, .yaml or .yml)')
  .option('-p, --partials <dir>', 'Directory of partial templates')
  .option('-o, --out <file>', 'Write output to a file instead of stdout')
  .option('--no-color', 'Disable colored output')
  .action(async (template: string, options: RenderCommandOptions) => {
    process.exitCode = await runRender(template, options);
  });
