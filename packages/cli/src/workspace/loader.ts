import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { parse as parseYaml } from 'yaml';

/**
 * Raised for problems with the command line or the files it names
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Read a text file, turning a missing file into a UsageError
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new UsageError(`Cannot read file: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Load the render context from a JSON or YAML file, chosen by extension
 */
export async function loadData(filePath: string): Promise<unknown> {
  const extension = path.extname(filePath).toLowerCase();
  const content = await readTextFile(filePath);

  switch (extension) {
    case '.json':
      try {
        const data: unknown = JSON.parse(content);
        return data;
      } catch (error) {
        throw new UsageError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`);
      }
    case '.yaml':
    case '.yml':
      try {
        const data: unknown = parseYaml(content);
        return data;
      } catch (error) {
        throw new UsageError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`);
      }
    default:
      throw new UsageError(
        `Unsupported data file '${filePath}': expected .json, .yaml or .yml`,
      );
  }
}

/**
 * Load every partial under a directory
 *
 * A partial's name is its path relative to the directory, with forward
 * slashes and without the extension: `layout/header.mustache` is
 * `{{>layout/header}}`.
 */
export async function loadPartials(dir: string, extension: string): Promise<Record<string, string>> {
  const stats = await fs.stat(dir).catch((): null => null);
  if (!stats?.isDirectory()) {
    throw new UsageError(`Partials directory not found: ${dir}`);
  }

  const files = await glob(`**/*${extension}`, {
    cwd: dir,
    nodir: true,
    posix: true,
    ignore: ['**/node_modules/**'],
  });

  const partials: Record<string, string> = {};
  for (const file of files.sort()) {
    const name = file.slice(0, -extension.length);
    partials[name] = await fs.readFile(path.join(dir, file), 'utf-8');
  }

  return partials;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
