/**
 * Context Gatherer - Full pipeline:
 *
 * 1. Validate the root directory
 * 2. Check that some include rule exists (before any traversal)
 * 3. Load {root}/.gitignore (unless disabled)
 * 4. Build the RuleSet (patterns compiled, bad ones rejected)
 * 5. Walk once: tree lines + content files
 * 6. Read files and render the requested output
 */

import { resolve, existsSync, statSync, type WalkerFs } from './compat.js';
import { buildRuleSet, assertHasIncludeRules, readGitignore, type RuleSetInput } from './rules.js';
import { TreeWalker, type TreeStyle } from './tree.js';
import { formatTreeBlock, formatFileContentsBlock, formatFullContext, readFileBlock } from './reader.js';
import { TraversalError } from './errors.js';

/** 'full': tree + files, 'tree': tree block only, 'files': file contents block only */
export type OutputMode = 'full' | 'tree' | 'files';

export interface GatherOptions {
  /** Include / exclude / tree-only rules (gitignore content is loaded here, not passed in) */
  rules: Omit<RuleSetInput, 'gitignore'>;
  /** What to render (default: 'full') */
  output?: OutputMode;
  /** Respect {root}/.gitignore (default: true) */
  useGitignore?: boolean;
  /** Tree rendering style (default: 'indent') */
  treeStyle?: TreeStyle;
  /** List directories that contain nothing visible (default: false) */
  showEmptyDirs?: boolean;
  /** Filesystem to walk and read through (default: node fs) */
  fs?: WalkerFs;
  /** Verbose logging */
  verbose?: boolean;
}

export interface GatherResult {
  /** The rendered artifact for the requested output mode */
  output: string;
  /** The directory tree, newline-joined */
  tree: string;
  /** Relative paths of files whose content was included */
  files: string[];
  /** Number of content files */
  fileCount: number;
  /** Number of visible tree entries below the root */
  entryCount: number;
  /** Size of the output in bytes */
  totalSize: number;
  /** Timing info */
  timing: {
    treeMs: number;
    readMs: number;
    totalMs: number;
  };
}

/**
 * Validate that the path exists and is a directory. Returns the absolute path.
 */
export function validateRoot(path: string): string {
  const abs = resolve(path);

  if (!existsSync(abs)) {
    throw new TraversalError(abs, `Path does not exist: ${path}\nResolved to: ${abs}`);
  }

  const stats = statSync(abs);
  if (!stats.isDirectory()) {
    throw new TraversalError(abs, `Path is not a directory: ${path}\nResolved to: ${abs}`);
  }

  return abs;
}

/**
 * Run the pipeline for one root:
 *   validate → rules → walk → read → render
 */
export function gatherContext(path: string, options: GatherOptions): GatherResult {
  const totalStart = Date.now();
  const { verbose = false, output = 'full', useGitignore = true } = options;

  const root = validateRoot(path);
  assertHasIncludeRules(options.rules);

  const gitignore = useGitignore ? readGitignore(root) : null;
  if (verbose) {
    console.log(`  Root: ${root}`);
    console.log(`  .gitignore: ${gitignore === null ? (useGitignore ? 'not found' : 'disabled') : 'loaded'}`);
  }

  const rules = buildRuleSet({ ...options.rules, gitignore });
  const walker = new TreeWalker(root, rules, {
    treeStyle: options.treeStyle,
    showEmptyDirs: options.showEmptyDirs,
    fs: options.fs,
  });

  // ── Walk ──────────────────────────────────────────────────────────────────
  const treeStart = Date.now();
  const tree = walker.getDirectoryTreeString();
  const contentFiles = walker.getContentFiles();
  const treeMs = Date.now() - treeStart;

  if (verbose) {
    console.log(`  Tree generated in ${treeMs}ms (${walker.getEntryCount()} entries, ${contentFiles.length} content files)`);
    if (rules.excludePatterns.source.length > 0) {
      console.log(`  Exclude patterns: ${rules.excludePatterns.source.join(', ')}`);
    }
  }

  // ── Read + render ─────────────────────────────────────────────────────────
  const readStart = Date.now();
  const blocks = output === 'tree' ? [] : contentFiles.map(file => readFileBlock(file, options.fs));
  const readMs = Date.now() - readStart;

  let rendered: string;
  if (output === 'tree') {
    rendered = formatTreeBlock(tree);
  } else if (output === 'files') {
    rendered = blocks.length > 0 ? formatFileContentsBlock(blocks) : '';
  } else {
    rendered = formatFullContext(tree, blocks);
  }

  if (verbose && output !== 'tree') {
    console.log(`  Read ${blocks.length} files in ${readMs}ms`);
  }

  return {
    output: rendered,
    tree,
    files: contentFiles.map(file => file.relativePath),
    fileCount: contentFiles.length,
    entryCount: walker.getEntryCount(),
    totalSize: Buffer.byteLength(rendered, 'utf-8'),
    timing: { treeMs, readMs, totalMs: Date.now() - totalStart },
  };
}
