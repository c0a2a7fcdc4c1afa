/**
 * File Reader - reads content files and formats the context artifact.
 *
 * Output shape:
 *   <directory_structure>\nTREE\n</directory_structure>
 *   \n\n<file_contents>\n<file path="a">\n...\n</file>\n\n<file path="b">...</file>\n</file_contents>
 */

import { FileReadError, errorMessage } from './errors.js';
import { nodeWalkerFs, type WalkerFs } from './compat.js';

/** Same window git uses to decide a blob is binary */
const BINARY_SNIFF_BYTES = 8000;

export interface ContentFile {
    /** Absolute path */
    absolutePath: string;
    /** POSIX path relative to the scan root */
    relativePath: string;
}

function looksBinary(buffer: Buffer): boolean {
    const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
    for (let i = 0; i < limit; i++) {
        if (buffer[i] === 0) return true;
    }
    return false;
}

/**
 * Read a file as UTF-8 text. Invalid byte sequences become U+FFFD.
 * Throws FileReadError when the file cannot be read, is not a regular file
 * (a FIFO would block the read) or holds binary content.
 */
export function readFileText(path: string, fs: WalkerFs = nodeWalkerFs): string {
    let isRegular: boolean;
    try {
        isRegular = fs.isFile(path);
    } catch (error) {
        throw new FileReadError(path, errorMessage(error), { cause: error });
    }
    if (!isRegular) {
        throw new FileReadError(path, 'not a regular file');
    }

    let buffer: Buffer;
    try {
        buffer = fs.readFile(path);
    } catch (error) {
        throw new FileReadError(path, errorMessage(error), { cause: error });
    }

    if (looksBinary(buffer)) {
        throw new FileReadError(path, 'binary content');
    }
    return buffer.toString('utf-8');
}

export function formatFileBlock(relativePath: string, content: string): string {
    return `<file path="${relativePath}">\n${content}\n</file>`;
}

export function formatFileErrorBlock(relativePath: string, message: string): string {
    return formatFileBlock(relativePath, `[ERROR] ${message}`);
}

/**
 * Read one content file into its block. A read failure becomes an error block
 * so one bad file never aborts the run.
 */
export function readFileBlock(file: ContentFile, fs: WalkerFs = nodeWalkerFs): string {
    try {
        return formatFileBlock(file.relativePath, readFileText(file.absolutePath, fs));
    } catch (error) {
        if (error instanceof FileReadError) {
            return formatFileErrorBlock(file.relativePath, error.message);
        }
        throw error;
    }
}

export function formatTreeBlock(tree: string): string {
    return `<directory_structure>\n${tree}\n</directory_structure>`;
}

export function formatFileContentsBlock(blocks: readonly string[]): string {
    return `<file_contents>\n${blocks.join('\n\n')}\n</file_contents>`;
}

/** Tree block, plus the file contents block only when there is at least one file. */
export function formatFullContext(tree: string, blocks: readonly string[]): string {
    const treeBlock = formatTreeBlock(tree);
    if (blocks.length === 0) return treeBlock;
    return `${treeBlock}\n\n${formatFileContentsBlock(blocks)}`;
}
