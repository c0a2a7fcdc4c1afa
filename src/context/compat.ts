/**
 * Re-exports from node built-ins, plus the filesystem seam the walker reads through.
 * Tests swap in their own WalkerFs to count reads or fail on purpose.
 */

import { readdirSync, readFileSync, statSync } from 'fs';

export { resolve, basename, join } from 'path';
export { existsSync, statSync } from 'fs';

export interface DirEntry {
  name: string;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export interface WalkerFs {
  readDir(path: string): DirEntry[];
  /** Follows symlinks. */
  isDirectory(path: string): boolean;
  /** True for a regular file. Follows symlinks. */
  isFile(path: string): boolean;
  readFile(path: string): Buffer;
}

export const nodeWalkerFs: WalkerFs = {
  readDir: (path) => readdirSync(path, { withFileTypes: true }),
  isDirectory: (path) => statSync(path).isDirectory(),
  isFile: (path) => statSync(path).isFile(),
  readFile: (path) => readFileSync(path),
};
