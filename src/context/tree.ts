/**
 * Tree Walker - one lazy, cached depth-first walk of a directory.
 *
 * The first call to any accessor walks the tree and fills both outputs (tree
 * lines and content files) together; later calls reuse that result. Excluded
 * directories are pruned before they are read.
 */

import { resolve, basename, join, nodeWalkerFs, type DirEntry, type WalkerFs } from './compat.js';
import { classifyPath } from './filter.js';
import type { RuleSet } from './rules.js';
import { readFileBlock, formatFullContext, type ContentFile } from './reader.js';
import { TraversalError, errorMessage } from './errors.js';

export type TreeStyle = 'indent' | 'branches';

export interface TreeOptions {
  /** 'indent' (4 spaces per level, default) or 'branches' (├── / └── connectors) */
  treeStyle?: TreeStyle;
  /** Keep directories with nothing visible inside (default: false) */
  showEmptyDirs?: boolean;
  /** Filesystem to read through (default: node fs) */
  fs?: WalkerFs;
}

interface TreeNode {
  name: string;
  isDirectory: boolean;
  children: TreeNode[];
}

interface TraversalResult {
  treeLines: readonly string[];
  contentFiles: readonly ContentFile[];
  contentPaths: readonly string[];
  entryCount: number;
}

const INDENT = '    ';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function label(node: TreeNode): string {
  return node.isDirectory ? `${node.name}/` : node.name;
}

function* renderIndented(node: TreeNode, depth: number): Generator<string> {
  for (const child of node.children) {
    yield `${INDENT.repeat(depth)}${label(child)}`;
    if (child.isDirectory) {
      yield* renderIndented(child, depth + 1);
    }
  }
}

function* renderBranches(node: TreeNode, prefix: string): Generator<string> {
  for (let i = 0; i < node.children.length; i++) {
    const child = node.children[i];
    const isLast = i === node.children.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    yield `${prefix}${connector}${label(child)}`;

    if (child.isDirectory) {
      yield* renderBranches(child, `${prefix}${childPrefix}`);
    }
  }
}

function countEntries(node: TreeNode): number {
  return node.children.reduce((sum, child) => sum + 1 + countEntries(child), 0);
}

export class TreeWalker {
  readonly root: string;
  private readonly rules: RuleSet;
  private readonly treeStyle: TreeStyle;
  private readonly showEmptyDirs: boolean;
  private readonly fs: WalkerFs;
  private result: TraversalResult | null = null;

  constructor(startPath: string, rules: RuleSet, options: TreeOptions = {}) {
    this.root = resolve(startPath);
    this.rules = rules;
    this.treeStyle = options.treeStyle ?? 'indent';
    this.showEmptyDirs = options.showEmptyDirs ?? false;
    this.fs = options.fs ?? nodeWalkerFs;
  }

  /** Tree lines: the root as "name/", then every visible entry in walk order. */
  getDirectoryTree(): readonly string[] {
    return this.traverse().treeLines;
  }

  getDirectoryTreeString(): string {
    return this.getDirectoryTree().join('\n');
  }

  /** Absolute paths of content files, sorted. */
  getContentFilePaths(): readonly string[] {
    return this.traverse().contentPaths;
  }

  getContentFiles(): readonly ContentFile[] {
    return this.traverse().contentFiles;
  }

  /** Number of visible entries below the root. */
  getEntryCount(): number {
    return this.traverse().entryCount;
  }

  /** One `<file path="...">` block per content file, separated by a blank line. */
  getFileContentsString(): string {
    return this.readBlocks().join('\n\n');
  }

  getFullContext(): string {
    return formatFullContext(this.getDirectoryTreeString(), this.readBlocks());
  }

  private readBlocks(): string[] {
    return this.getContentFiles().map(file => readFileBlock(file, this.fs));
  }

  /** Walks on first use only. A failed walk leaves nothing cached. */
  private traverse(): TraversalResult {
    if (this.result === null) {
      this.result = this.walk();
    }
    return this.result;
  }

  private walk(): TraversalResult {
    // A filesystem root has no basename: "/" is labelled "/", not "//"
    const rootName = basename(this.root) || this.root.replace(/[\\/]+$/, '');
    const rootNode: TreeNode = { name: rootName, isDirectory: true, children: [] };
    const contentFiles: ContentFile[] = [];

    this.walkDirectory(this.root, '', rootNode, contentFiles);
    contentFiles.sort((a, b) => compareNames(a.absolutePath, b.absolutePath));

    const body = this.treeStyle === 'branches' ? renderBranches(rootNode, '') : renderIndented(rootNode, 1);
    const treeLines = [label(rootNode), ...body];

    return Object.freeze({
      treeLines: Object.freeze(treeLines),
      contentFiles: Object.freeze(contentFiles.map(file => Object.freeze(file))),
      contentPaths: Object.freeze(contentFiles.map(file => file.absolutePath)),
      entryCount: countEntries(rootNode),
    });
  }

  private walkDirectory(dirPath: string, relativeDir: string, node: TreeNode, contentFiles: ContentFile[]): void {
    let entries: DirEntry[];
    try {
      entries = this.fs.readDir(dirPath);
    } catch (error) {
      throw new TraversalError(dirPath, `Failed to read directory ${dirPath}: ${errorMessage(error)}`, { cause: error });
    }

    const dirs: DirEntry[] = [];
    const files: DirEntry[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() || this.isLinkedDirectory(entry, join(dirPath, entry.name))) {
        dirs.push(entry);
      } else {
        files.push(entry);
      }
    }
    dirs.sort((a, b) => compareNames(a.name, b.name));
    files.sort((a, b) => compareNames(a.name, b.name));

    for (const entry of dirs) {
      const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (classifyPath(relPath, true, this.rules) === 'excluded') continue;

      const child: TreeNode = { name: entry.name, isDirectory: true, children: [] };
      // Linked directories are listed but not followed, so a link cycle cannot loop
      if (!entry.isSymbolicLink()) {
        this.walkDirectory(join(dirPath, entry.name), relPath, child, contentFiles);
      }
      if (child.children.length > 0 || this.showEmptyDirs) {
        node.children.push(child);
      }
    }

    for (const entry of files) {
      const relPath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      const pathClass = classifyPath(relPath, false, this.rules);
      if (pathClass === 'excluded') continue;

      node.children.push({ name: entry.name, isDirectory: false, children: [] });
      if (pathClass === 'content') {
        contentFiles.push({ absolutePath: join(dirPath, entry.name), relativePath: relPath });
      }
    }
  }

  private isLinkedDirectory(entry: DirEntry, fullPath: string): boolean {
    if (!entry.isSymbolicLink()) return false;
    try {
      return this.fs.isDirectory(fullPath);
    } catch {
      // Dangling link: kept as a file, so reading it later renders an error block
      return false;
    }
  }
}
