import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

/** Nearest ancestor of `startDir` that holds a package.json. */
export function findPackageRoot(startDir: string): string {
  let dir = startDir;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
  return dir;
}

export function packageRoot(): string {
  return findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));
}

export function defaultStacksDir(): string {
  return path.join(packageRoot(), 'stacks');
}

export function configTemplatePath(): string {
  return path.join(packageRoot(), 'config', 'swarmup.example.yaml');
}
