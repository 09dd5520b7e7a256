/**
 * Locate files shipped with the package (bundled data tables)
 *
 * Sources run from src/ under tsx/vitest and from dist/src/ once built, so the
 * package root is found by walking up to the nearest package.json instead of
 * a fixed relative path.
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

let packageRoot: string | null = null;

export function findPackageRoot(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = resolve(startDir);

  while (true) {
    if (existsSync(join(dir, 'package.json'))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${startDir}`);
    }
    dir = parent;
  }
}

/**
 * Absolute path of a file relative to the package root
 */
export function packageFile(...segments: string[]): string {
  if (!packageRoot) {
    packageRoot = findPackageRoot();
  }
  return join(packageRoot, ...segments);
}
