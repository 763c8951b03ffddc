/**
 * Terminal output helpers shared by the commands
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { TemplateError } from '@mustard/templates';

/**
 * Where a command writes; tests substitute in-memory streams
 */
export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export const EXIT_OK = 0;
export const EXIT_TEMPLATE_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * Color functions, plain when color is off
 */
export function createColors(color: boolean): ChalkInstance {
  return new Chalk(color ? {} : { level: 0 });
}

/**
 * Format an engine error as `file:line:column message`
 */
export function formatTemplateError(file: string, error: TemplateError, c: ChalkInstance): string {
  const location = error.line > 0 ? `${file}:${error.line}:${error.column + 1}` : file;
  return `${c.red('✗')} ${c.bold(location)} ${c.red(error.name)}: ${error.reason}`;
}

/**
 * Exit code and message for any failure a command can hit
 */
export function describeFailure(
  file: string,
  error: unknown,
  c: ChalkInstance,
): { code: number; message: string } {
  if (error instanceof TemplateError) {
    return { code: EXIT_TEMPLATE_ERROR, message: formatTemplateError(file, error, c) };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { code: EXIT_USAGE_ERROR, message: `${c.red('Error:')} ${message}` };
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}
