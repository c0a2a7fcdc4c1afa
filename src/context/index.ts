export { validateRoot, gatherContext } from './gather.js';
export type { GatherOptions, GatherResult, OutputMode } from './gather.js';

// Rules
export {
    buildRuleSet,
    compilePatterns,
    normalizeExtension,
    normalizeRelativePath,
    hasIncludeRules,
    assertHasIncludeRules,
    readGitignore,
    DEFAULT_IGNORED_NAMES,
} from './rules.js';
export type { RuleSet, RuleSetInput, PatternList, TreeOnlyRules } from './rules.js';

// Matching
export { classifyPath, isDefaultIgnored, isHardExcluded, isTreeOnly, isContentCandidate } from './filter.js';
export type { PathClass } from './filter.js';

// Traversal
export { TreeWalker } from './tree.js';
export type { TreeOptions, TreeStyle } from './tree.js';

// Reading + rendering
export {
    readFileText,
    readFileBlock,
    formatFileBlock,
    formatFileErrorBlock,
    formatTreeBlock,
    formatFileContentsBlock,
    formatFullContext,
} from './reader.js';
export type { ContentFile } from './reader.js';

// Filesystem seam
export { nodeWalkerFs } from './compat.js';
export type { WalkerFs, DirEntry } from './compat.js';

// Errors
export {
    ContextError,
    ConfigurationError,
    PatternCompilationError,
    TraversalError,
    FileReadError,
    errorMessage,
} from './errors.js';
export type { ContextErrorCode, ContextErrorOptions } from './errors.js';
