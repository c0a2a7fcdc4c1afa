/**
 * Rule Set - the merged include/exclude configuration for one run.
 *
 * Built once, never mutated. Every pattern list is compiled up front so a bad
 * pattern fails here, before any directory is read.
 */

import ignoreModule from 'ignore';
import type { Ignore } from 'ignore';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigurationError, PatternCompilationError, TraversalError, errorMessage } from './errors.js';

// `ignore` is CommonJS; under NodeNext its factory is reached through `default`.
// Matching is case-sensitive, like extension matching. `allowRelativePaths` keeps
// legal names such as "..." from being rejected as non-relative paths.
function createIgnore(): Ignore {
    return ignoreModule.default({ ignorecase: false, allowRelativePaths: true });
}

/** Names that are never shown, read or descended into. Include rules cannot override them. */
export const DEFAULT_IGNORED_NAMES: readonly string[] = [
    '.git',
    '.hg',
    '.svn',
    '.venv',
    'venv',
    'node_modules',
    '__pycache__',
    '.mypy_cache',
    '.pytest_cache',
    '.DS_Store',
    'Thumbs.db',
];

/** Raw rule values as they come from presets and command-line flags. */
export interface RuleSetInput {
    includeExtensions?: string[];
    includeFiles?: string[];
    includePatterns?: string[];
    excludeExtensions?: string[];
    excludeFiles?: string[];
    excludePatterns?: string[];
    /** File names, `.ext` suffixes, relative paths or globs shown in the tree without content */
    includeInTreeOnly?: string[];
    /** Defaults to DEFAULT_IGNORED_NAMES */
    defaultIgnoredNames?: Iterable<string>;
    /** Content of the root `.gitignore`, if any */
    gitignore?: string | null;
}

/** One compiled pattern list. `source` keeps the original strings for logging. */
export interface PatternList {
    readonly source: readonly string[];
    readonly matcher: Ignore | null;
}

export interface TreeOnlyRules {
    readonly suffixes: readonly string[];
    readonly names: ReadonlySet<string>;
    readonly patterns: PatternList;
}

export interface RuleSet {
    readonly includeExtensions: ReadonlySet<string>;
    readonly includeFiles: ReadonlySet<string>;
    readonly includePatterns: PatternList;
    readonly excludeExtensions: ReadonlySet<string>;
    readonly excludeFiles: ReadonlySet<string>;
    readonly excludePatterns: PatternList;
    readonly includeInTreeOnly: TreeOnlyRules;
    readonly defaultIgnoredNames: ReadonlySet<string>;
    readonly gitignore: Ignore | null;
}

const GLOB_CHARS = /[*?[]/;

// ── Normalization ───────────────────────────────────────────────────────────

/** "py", ".py" and "..py" all become ".py". */
export function normalizeExtension(ext: string): string {
    const stripped = ext.trim().replace(/^\.+/, '');
    if (!stripped) {
        throw new ConfigurationError(`Invalid extension: "${ext}"`);
    }
    return `.${stripped}`;
}

/** Forward slashes, no leading "./", no duplicate or trailing slashes. */
export function normalizeRelativePath(path: string): string {
    let normalized = path.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/');
    while (normalized.startsWith('./')) {
        normalized = normalized.slice(2);
    }
    return normalized.replace(/\/+$/, '');
}

function dedupe(values: Iterable<string>): string[] {
    return [...new Set(values)];
}

// ── Pattern compilation ─────────────────────────────────────────────────────

function validatePattern(pattern: string): void {
    if (!pattern.trim()) {
        throw new PatternCompilationError(pattern, 'pattern is empty');
    }
    if (pattern.trim() === '!') {
        throw new PatternCompilationError(pattern, 'negation without a pattern');
    }
    if (pattern.includes('\0')) {
        throw new PatternCompilationError(pattern, 'pattern contains a NUL character');
    }
    const trailing = /\\+$/.exec(pattern);
    if (trailing && trailing[0].length % 2 === 1) {
        throw new PatternCompilationError(pattern, 'pattern ends with an unescaped backslash');
    }
}

/**
 * Compile a list of gitignore-style patterns.
 * Order is kept: the last matching rule wins, so "!keep.log" after "*.log" re-includes.
 */
export function compilePatterns(patterns: readonly string[] = []): PatternList {
    if (patterns.length === 0) {
        return { source: [], matcher: null };
    }

    const matcher = createIgnore();
    for (const pattern of patterns) {
        validatePattern(pattern);
        try {
            matcher.add(pattern);
        } catch (error) {
            throw new PatternCompilationError(pattern, errorMessage(error), { cause: error });
        }
    }
    return { source: [...patterns], matcher };
}

function compileGitignore(content: string): Ignore {
    const matcher = createIgnore();
    try {
        matcher.add(content);
    } catch (error) {
        throw new PatternCompilationError('.gitignore', errorMessage(error), { cause: error });
    }
    return matcher;
}

function compileTreeOnly(entries: readonly string[] = []): TreeOnlyRules {
    const suffixes: string[] = [];
    const names = new Set<string>();
    const globs: string[] = [];

    for (const raw of entries) {
        const entry = raw.trim();
        if (!entry) continue;

        if (GLOB_CHARS.test(entry)) {
            globs.push(entry);
        } else if (entry.startsWith('.') && !entry.includes('/')) {
            // ".lock" matches "yarn.lock"; a dotfile name matches itself
            suffixes.push(entry);
        } else {
            names.add(normalizeRelativePath(entry));
        }
    }

    return { suffixes: dedupe(suffixes), names, patterns: compilePatterns(globs) };
}

// ── Construction ────────────────────────────────────────────────────────────

/**
 * Build an immutable RuleSet. Throws PatternCompilationError on a malformed
 * pattern and ConfigurationError on an empty extension.
 */
export function buildRuleSet(input: RuleSetInput = {}): RuleSet {
    return {
        includeExtensions: new Set((input.includeExtensions ?? []).map(normalizeExtension)),
        includeFiles: new Set((input.includeFiles ?? []).map(normalizeRelativePath).filter(Boolean)),
        includePatterns: compilePatterns(input.includePatterns),
        excludeExtensions: new Set((input.excludeExtensions ?? []).map(normalizeExtension)),
        excludeFiles: new Set((input.excludeFiles ?? []).map(normalizeRelativePath).filter(Boolean)),
        excludePatterns: compilePatterns(input.excludePatterns),
        includeInTreeOnly: compileTreeOnly(input.includeInTreeOnly),
        defaultIgnoredNames: new Set(input.defaultIgnoredNames ?? DEFAULT_IGNORED_NAMES),
        gitignore: input.gitignore ? compileGitignore(input.gitignore) : null,
    };
}

/** True if the input names at least one thing to show in the tree or the content. */
export function hasIncludeRules(input: RuleSetInput): boolean {
    return [
        input.includeExtensions,
        input.includeFiles,
        input.includePatterns,
        input.includeInTreeOnly,
    ].some(list => (list ?? []).some(value => value.trim() !== ''));
}

export function assertHasIncludeRules(input: RuleSetInput): void {
    if (!hasIncludeRules(input)) {
        throw new ConfigurationError(
            'No include rules provided: at least one of --include, --include-extensions, ' +
            '--include-files or --include-in-tree must be provided (directly or through a preset).'
        );
    }
}

/**
 * Read `{root}/.gitignore`. A missing file returns null; any other read failure
 * aborts the run.
 */
export function readGitignore(root: string): string | null {
    const gitignorePath = join(root, '.gitignore');
    try {
        return readFileSync(gitignorePath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return null;
        }
        throw new TraversalError(gitignorePath, `Failed to read ${gitignorePath}: ${errorMessage(error)}`, { cause: error });
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
