import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CommandIO } from '../src/reporter.js';

export interface CapturedIO extends CommandIO {
  out: () => string;
  err: () => string;
}

export function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout: (text) => {
      stdout.push(text);
    },
    stderr: (text) => {
      stderr.push(text);
    },
    out: () => stdout.join(''),
    err: () => stderr.join(''),
  };
}

/**
 * Create a temporary directory holding the given files
 *
 * A commented .env is always written at the root so configuration lookup
 * never climbs out of the directory.
 */
export function createWorkspace(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'mustard-cli-'));
  const all: Record<string, string> = { '.env': '# test workspace\n', ...files };

  for (const [name, content] of Object.entries(all)) {
    const filePath = path.join(root, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }

  return root;
}

export function removeWorkspace(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
