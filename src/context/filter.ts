/**
 * Path Matcher - classifies one relative path against a RuleSet.
 *
 * Tiers, highest first:
 * 1. default ignored names (never overridable)
 * 2. hard excludes: .gitignore, exclude extensions / files / patterns
 * 3. tree-only entries (content suppressed)
 * 4. include files / extensions / patterns
 *
 * Pure: no I/O, the RuleSet is only read.
 */

import type { PatternList, RuleSet } from './rules.js';

/**
 * - `excluded`: absent from tree and content; a directory is pruned
 * - `tree-only`: listed in the tree, content never emitted (every kept directory)
 * - `content`: listed and its content rendered
 */
export type PathClass = 'excluded' | 'tree-only' | 'content';

function baseName(relativePath: string): string {
    const slash = relativePath.lastIndexOf('/');
    return slash === -1 ? relativePath : relativePath.slice(slash + 1);
}

function endsWithAny(name: string, suffixes: Iterable<string>): boolean {
    for (const suffix of suffixes) {
        if (name.endsWith(suffix)) return true;
    }
    return false;
}

function matchesPatterns(patterns: PatternList, relativePath: string, isDirectory: boolean): boolean {
    if (!patterns.matcher) return false;
    return patterns.matcher.ignores(isDirectory ? `${relativePath}/` : relativePath);
}

/** Any segment equal to a default ignored name (".git", "node_modules", ...). */
export function isDefaultIgnored(relativePath: string, rules: RuleSet): boolean {
    return relativePath.split('/').some(segment => rules.defaultIgnoredNames.has(segment));
}

/**
 * Exclusion by .gitignore or by user exclude rules. The two pattern sources are
 * evaluated independently: either one matching is enough.
 */
export function isHardExcluded(relativePath: string, isDirectory: boolean, rules: RuleSet): boolean {
    if (rules.gitignore && rules.gitignore.ignores(isDirectory ? `${relativePath}/` : relativePath)) return true;
    if (endsWithAny(baseName(relativePath), rules.excludeExtensions)) return true;
    if (rules.excludeFiles.has(relativePath)) return true;
    return matchesPatterns(rules.excludePatterns, relativePath, isDirectory);
}

export function isTreeOnly(relativePath: string, rules: RuleSet): boolean {
    const { suffixes, names, patterns } = rules.includeInTreeOnly;
    const name = baseName(relativePath);

    if (endsWithAny(name, suffixes)) return true;
    if (names.has(name) || names.has(relativePath)) return true;
    return matchesPatterns(patterns, relativePath, false);
}

export function isContentCandidate(relativePath: string, rules: RuleSet): boolean {
    if (rules.includeFiles.has(relativePath)) return true;
    if (endsWithAny(baseName(relativePath), rules.includeExtensions)) return true;
    return matchesPatterns(rules.includePatterns, relativePath, false);
}

/**
 * Classify a POSIX path relative to the scan root.
 * Directories only go through the exclusion tiers: a kept directory is `tree-only`.
 */
export function classifyPath(relativePath: string, isDirectory: boolean, rules: RuleSet): PathClass {
    if (isDefaultIgnored(relativePath, rules)) return 'excluded';
    if (isHardExcluded(relativePath, isDirectory, rules)) return 'excluded';
    if (isDirectory) return 'tree-only';

    if (isTreeOnly(relativePath, rules)) return 'tree-only';
    if (isContentCandidate(relativePath, rules)) return 'content';
    return 'excluded';
}
