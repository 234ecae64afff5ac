import * as fs from 'fs';
import * as path from 'path';

const MAX_SEARCH_DEPTH = 10;

/**
 * Find the project root directory by searching for package.json
 *
 * Walks up the directory tree from the current file location until it finds
 * a directory containing package.json. Works from compiled code in dist/,
 * from TypeScript sources and under ts-jest.
 *
 * @throws Error if package.json cannot be found
 */
export function findProjectRoot(startDir: string = __dirname): string {
  let currentDir = startDir;
  let depth = 0;

  while (depth < MAX_SEARCH_DEPTH) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }

    currentDir = parentDir;
    depth++;
  }

  throw new Error(
    `Could not find project root (package.json) by walking up from ${startDir}. ` +
    `Searched ${depth} levels up the directory tree.`
  );
}

/**
 * Resolve a path relative to the project root, e.g. `resolveProjectPath('config', 'stability')`.
 */
export function resolveProjectPath(...segments: string[]): string {
  return path.join(findProjectRoot(), ...segments);
}
