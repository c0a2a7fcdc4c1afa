import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join, dirname } from 'path';
import { tmpdir } from 'os';
import { nodeWalkerFs, type WalkerFs } from '../../../src/context/index.js';

export type FixtureFiles = Record<string, string | Buffer>;

/** Small project used by the end-to-end cases. */
export const SAMPLE_PROJECT: FixtureFiles = {
  'src/main.py': "print('hello')",
  'docs/guide.md': '# Guide',
  'config.json': '{"key": "value"}',
  '.gitignore': '*.log\n',
  'secret.log': 'secret info',
  '.venv/lib/site.py': 'import site',
  'README.md': '# Demo',
};

export function writeFiles(root: string, files: FixtureFiles): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

export function createFixture(name: string, files: FixtureFiles = {}): string {
  const root = mkdtempSync(join(tmpdir(), `ctxpack-${name}-`));
  writeFiles(root, files);
  return root;
}

export function removeFixture(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/** Node fs that records every directory read and can fail chosen ones. */
export function recordingFs(failOn: (path: string) => boolean = () => false): {
  fs: WalkerFs;
  readDirCalls: string[];
} {
  const readDirCalls: string[] = [];
  const fs: WalkerFs = {
    readDir: (path) => {
      readDirCalls.push(path);
      if (failOn(path)) {
        throw new Error(`EACCES: permission denied, scandir '${path}'`);
      }
      return nodeWalkerFs.readDir(path);
    },
    isDirectory: (path) => nodeWalkerFs.isDirectory(path),
    isFile: (path) => nodeWalkerFs.isFile(path),
    readFile: (path) => nodeWalkerFs.readFile(path),
  };
  return { fs, readDirCalls };
}
