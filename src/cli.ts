#!/usr/bin/env node

/**
 * ctxpack CLI
 *
 * Pack a directory tree and selected file contents into one text artifact for LLM prompts.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { resolve, basename, dirname } from 'path';
import { createRequire } from 'module';
import { gatherContext, validateRoot, type OutputMode } from './context/gather.js';
import type { TreeStyle } from './context/tree.js';
import { ContextError, ConfigurationError, errorMessage } from './context/errors.js';
import {
    loadPresets,
    selectPreset,
    mergeRuleInput,
    PRESETS_TEMPLATE,
    DEFAULT_PRESETS_PATH,
} from './config/presets.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

interface ScanOptions {
    include?: string[];
    includeExtensions?: string[];
    includeFiles?: string[];
    exclude?: string[];
    excludeExtensions?: string[];
    excludeFiles?: string[];
    includeInTree?: string[];
    preset?: string;
    presetsPath?: string;
    tree?: boolean;
    files?: boolean;
    treeStyle: string;
    showEmptyDirs?: boolean;
    gitignore: boolean;
    output: string;
    verbose?: boolean;
}

function outputMode(options: ScanOptions): OutputMode {
    if (options.tree && !options.files) return 'tree';
    if (options.files && !options.tree) return 'files';
    return 'full';
}

function parseTreeStyle(value: string): TreeStyle {
    if (value === 'indent' || value === 'branches') return value;
    throw new ConfigurationError(`Invalid tree style "${value}". Use "indent" or "branches".`);
}

function fail(error: unknown): never {
    console.error('Error:', errorMessage(error));
    process.exit(error instanceof ContextError ? error.exitCode : 1);
}

program
    .name('ctxpack')
    .description('Pack a directory tree and selected file contents into one LLM-ready context')
    .version(pkg.version);

/**
 * Scan command - the default
 */
program
    .command('scan', { isDefault: true })
    .description('Print the directory tree and the contents of matching files')
    .argument('[path]', 'Root directory to scan', '.')
    .option('-i, --include <pattern...>', 'Include patterns (gitignore syntax, e.g. "src/**/*.rs")')
    .option('-e, --include-extensions <ext...>', 'File extensions to include (e.g. py js)')
    .option('--include-files <file...>', 'Relative file paths to include')
    .option('-x, --exclude <pattern...>', 'Exclude patterns (gitignore syntax)')
    .option('--exclude-extensions <ext...>', 'File extensions to exclude')
    .option('--exclude-files <file...>', 'Relative file paths to exclude')
    .option('-t, --include-in-tree <entry...>', 'Names, .ext suffixes or globs shown in the tree without content')
    .option('-p, --preset <name>', 'Preset to apply (built-in or from the presets file)')
    .option('--presets-path <path>', `Presets file (default: ${DEFAULT_PRESETS_PATH})`)
    .option('--tree', 'Show only the directory tree')
    .option('--files', 'Show only the file contents')
    .option('--tree-style <style>', 'Tree style: indent, branches', 'indent')
    .option('--show-empty-dirs', 'List directories with nothing visible inside')
    .option('--no-gitignore', 'Do not apply the root .gitignore')
    .option('-o, --output <file>', 'Output file ("-" for stdout)', '-')
    .option('--verbose', 'Verbose output')
    .action((path: string, options: ScanOptions) => {
        try {
            const root = validateRoot(path);
            const userPresets = loadPresets(options.presetsPath);
            const preset = selectPreset(userPresets, options.preset, basename(root));

            const rules = mergeRuleInput(preset, {
                include: options.include,
                includeExtensions: options.includeExtensions,
                includeFiles: options.includeFiles,
                exclude: options.exclude,
                excludeExtensions: options.excludeExtensions,
                excludeFiles: options.excludeFiles,
                includeInTree: options.includeInTree,
            });

            if (options.verbose) {
                console.log(`Scanning ${root}`);
                if (options.preset) console.log(`  Preset: ${options.preset}`);
            }

            const result = gatherContext(root, {
                rules,
                output: outputMode(options),
                useGitignore: options.gitignore,
                treeStyle: parseTreeStyle(options.treeStyle),
                showEmptyDirs: options.showEmptyDirs ?? false,
                verbose: options.verbose ?? false,
            });

            if (result.entryCount === 0) {
                console.error('No content found for the specified criteria.');
                return;
            }

            if (options.output === '-') {
                process.stdout.write(`${result.output}\n`);
            } else {
                const absolutePath = resolve(options.output);
                writeFileSync(absolutePath, `${result.output}\n`, 'utf-8');
                console.log(`Created: ${absolutePath}`);
                console.log(`Files: ${result.fileCount}, Size: ${(result.totalSize / 1024).toFixed(1)}KB`);
            }

            if (options.verbose) {
                const t = result.timing;
                console.log(`  Done in ${t.totalMs}ms (tree: ${t.treeMs}ms, read: ${t.readMs}ms)`);
            }
        } catch (error) {
            fail(error);
        }
    });

/**
 * Init command - create a starter presets file
 */
program
    .command('init')
    .description('Create a starter presets file')
    .argument('[path]', 'Output path for the presets file', DEFAULT_PRESETS_PATH)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            mkdirSync(dirname(absolutePath), { recursive: true });
            const content = JSON.stringify(PRESETS_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created presets file: ${absolutePath}`);
            console.log(`Use it with: ctxpack --preset my-project --presets-path ${outputPath}`);
        } catch (error) {
            fail(error);
        }
    });

// Parse arguments and run
program.parse();
