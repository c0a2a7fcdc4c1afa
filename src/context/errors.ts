/**
 * Context errors.
 *
 * Configuration and pattern problems are user-correctable (exit code 2).
 * Filesystem failures abort the run (exit code 1). FileReadError never escapes
 * the renderer: it becomes an inline error block.
 */

export type ContextErrorCode =
    | 'ConfigError'
    | 'PatternError'
    | 'TraversalError'
    | 'FileReadError';

export interface ContextErrorOptions {
    cause?: unknown;
}

export class ContextError extends Error {
    public readonly code: ContextErrorCode;
    public readonly exitCode: number;
    public readonly cause?: unknown;

    constructor(code: ContextErrorCode, message: string, exitCode: number, options: ContextErrorOptions = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.exitCode = exitCode;
        this.cause = options.cause;
    }
}

/** No include rule of any kind, or an unusable preset / extension value. */
export class ConfigurationError extends ContextError {
    constructor(message: string, options: ContextErrorOptions = {}) {
        super('ConfigError', message, 2, options);
    }
}

/** A user-supplied pattern that cannot be compiled. */
export class PatternCompilationError extends ContextError {
    public readonly pattern: string;

    constructor(pattern: string, reason: string, options: ContextErrorOptions = {}) {
        super('PatternError', `Invalid pattern "${pattern}": ${reason}`, 2, options);
        this.pattern = pattern;
    }
}

/** The root is unreadable, or a directory vanished mid-walk. */
export class TraversalError extends ContextError {
    public readonly path: string;

    constructor(path: string, message: string, options: ContextErrorOptions = {}) {
        super('TraversalError', message, 1, options);
        this.path = path;
    }
}

export class FileReadError extends ContextError {
    public readonly path: string;

    constructor(path: string, message: string, options: ContextErrorOptions = {}) {
        super('FileReadError', message, 1, options);
        this.path = path;
    }
}

/** Message of an unknown thrown value, for log lines and error blocks. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
