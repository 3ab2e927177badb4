import * as fs from 'fs';
import * as path from 'path';
import { PrerequisiteError } from './errors.js';

export const REQUIRED_BINARIES = ['ssh', 'scp'] as const;

export function findExecutable(name: string, searchPath: string | undefined): string | null {
  for (const dir of (searchPath ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      if (fs.statSync(candidate).isFile()) return candidate;
    } catch {
      // not in this directory
    }
  }
  return null;
}

/**
 * Throws PrerequisiteError naming every local binary that is missing from PATH.
 */
export function checkPrerequisites(
  searchPath: string | undefined,
  binaries: readonly string[] = REQUIRED_BINARIES,
): Map<string, string> {
  const found = new Map<string, string>();
  const missing: string[] = [];

  for (const binary of binaries) {
    const location = findExecutable(binary, searchPath);
    if (location) found.set(binary, location);
    else missing.push(binary);
  }

  if (missing.length > 0) {
    throw new PrerequisiteError(`Required command(s) not found on PATH: ${missing.join(', ')}`, {
      host: 'localhost',
      operation: 'check local prerequisites',
    });
  }
  return found;
}
