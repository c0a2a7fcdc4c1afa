/**
 * Preset Config Support
 *
 * A presets file is a JSON object of named rule bundles:
 *
 *   { "python": { "includeExtensions": ["py"], "exclude": ["tests/fixtures/"] } }
 *
 * Built-in presets ship with the CLI; a user presets file (default
 * ~/.config/ctxpack/presets.json) can add presets or replace built-ins by name.
 * Priority when merging: preset values first, then CLI values, duplicates dropped.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, join } from 'path';
import { homedir } from 'os';
import { ConfigurationError } from '../context/errors.js';
import type { RuleSetInput } from '../context/rules.js';

// ── Types ───────────────────────────────────────────────────────────────────

export interface PresetConfig {
    /** Include patterns (gitignore syntax) */
    include?: string[];
    includeExtensions?: string[];
    includeFiles?: string[];
    /** Exclude patterns (gitignore syntax) */
    exclude?: string[];
    excludeExtensions?: string[];
    excludeFiles?: string[];
    /** Shown in the tree, content never emitted */
    includeInTree?: string[];
}

export type PresetsFile = Record<string, PresetConfig>;

export const DEFAULT_PRESETS_PATH = join(homedir(), '.config', 'ctxpack', 'presets.json');

const PRESET_KEYS = [
    'include', 'includeExtensions', 'includeFiles',
    'exclude', 'excludeExtensions', 'excludeFiles',
    'includeInTree',
] as const satisfies readonly (keyof PresetConfig)[];

const KNOWN_KEYS = new Set<string>(PRESET_KEYS);

// ── Built-ins ───────────────────────────────────────────────────────────────

export const BUILTIN_PRESETS: PresetsFile = {
    python: {
        includeExtensions: ['.py'],
        includeInTree: ['README.md', 'pyproject.toml', 'requirements.txt'],
        exclude: ['*.egg-info/', 'build/', 'dist/'],
    },
    typescript: {
        includeExtensions: ['.ts', '.tsx'],
        includeInTree: ['README.md', 'package.json', 'tsconfig.json'],
        exclude: ['dist/', 'coverage/', '*.d.ts'],
    },
    rust: {
        include: ['src/**/*.rs'],
        includeFiles: ['Cargo.toml'],
        includeInTree: ['README.md'],
        exclude: ['target/'],
    },
};

// ── Validation helpers ──────────────────────────────────────────────────────

function assertStringArray(obj: Record<string, unknown>, key: string, presetName: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || !val.every((v): v is string => typeof v === 'string')) {
        throw new ConfigurationError(`Preset "${presetName}": "${key}" must be an array of strings`);
    }
    return val;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePreset(name: string, raw: unknown): PresetConfig {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Preset "${name}" must be an object`);
    }

    const unknowns = Object.keys(raw).filter(k => !KNOWN_KEYS.has(k));
    if (unknowns.length > 0) {
        console.warn(`Warning: Unknown keys in preset "${name}" ignored: ${unknowns.join(', ')}`);
    }

    const preset: PresetConfig = {};
    for (const key of PRESET_KEYS) {
        if (raw[key] !== undefined) preset[key] = assertStringArray(raw, key, name);
    }
    return preset;
}

// ── Loader ──────────────────────────────────────────────────────────────────

/**
 * Load a presets file.
 *
 * - No path: the default location is used, and a missing file means no user presets
 * - Explicit path: the file must exist
 * - Throws ConfigurationError on unreadable files, invalid JSON or bad field types
 */
export function loadPresets(presetsPath?: string): PresetsFile {
    const absolutePath = resolve(presetsPath ?? DEFAULT_PRESETS_PATH);

    if (!existsSync(absolutePath)) {
        if (presetsPath === undefined) return {};
        throw new ConfigurationError(`Presets file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Failed to read presets file: ${absolutePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in presets file: ${absolutePath}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Presets file must contain a JSON object: ${absolutePath}`);
    }

    const presets: PresetsFile = {};
    for (const [name, value] of Object.entries(parsed)) {
        presets[name] = parsePreset(name, value);
    }
    return presets;
}

/**
 * Pick the preset for this run.
 *
 * An explicit name must exist (user presets first, then built-ins). Without a
 * name, a user preset named after the project directory is used if there is one.
 */
export function selectPreset(
    userPresets: PresetsFile,
    presetName: string | undefined,
    projectName?: string
): PresetConfig | undefined {
    const all: PresetsFile = { ...BUILTIN_PRESETS, ...userPresets };

    if (presetName !== undefined) {
        if (!Object.prototype.hasOwnProperty.call(all, presetName)) {
            throw new ConfigurationError(
                `Unknown preset "${presetName}". Available presets: ${Object.keys(all).sort().join(', ')}`
            );
        }
        return all[presetName];
    }

    if (projectName !== undefined && Object.prototype.hasOwnProperty.call(userPresets, projectName)) {
        return userPresets[projectName];
    }
    return undefined;
}

/** Concatenate, keep the first occurrence of each value. */
export function mergeUnique(first: string[] = [], second: string[] = []): string[] {
    return [...new Set([...first, ...second])];
}

/** Merge a preset with command-line values into rule input (preset first, then CLI). */
export function mergeRuleInput(preset: PresetConfig | undefined, cli: PresetConfig): RuleSetInput {
    const p = preset ?? {};
    return {
        includePatterns: mergeUnique(p.include, cli.include),
        includeExtensions: mergeUnique(p.includeExtensions, cli.includeExtensions),
        includeFiles: mergeUnique(p.includeFiles, cli.includeFiles),
        excludePatterns: mergeUnique(p.exclude, cli.exclude),
        excludeExtensions: mergeUnique(p.excludeExtensions, cli.excludeExtensions),
        excludeFiles: mergeUnique(p.excludeFiles, cli.excludeFiles),
        includeInTreeOnly: mergeUnique(p.includeInTree, cli.includeInTree),
    };
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Template written by `ctxpack init`.
 * Shows every preset field; the top-level key is the preset name.
 */
export const PRESETS_TEMPLATE: PresetsFile = {
    'my-project': {
        include: ['src/**'],
        includeExtensions: ['.ts', '.md'],
        includeFiles: ['package.json'],
        exclude: ['src/generated/', '*.snap'],
        excludeExtensions: ['.map'],
        excludeFiles: ['src/legacy.ts'],
        includeInTree: ['README.md', '.lock'],
    },
};
