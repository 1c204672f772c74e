/**
 * Error types shared across the renderer.
 */

/** A ray was built with a direction that cannot be traced (zero length or NaN). */
export class DegenerateRayError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/** A scene file could not be parsed. `line` is 1-based, 0 when not tied to a line. */
export class SceneFileError extends Error {
    line: number;

    constructor(message: string, line: number = 0) {
        super(line > 0 ? `line ${line}: ${message}` : message);
        this.name = this.constructor.name;
        this.line = line;
    }
}

/**
 * Wraps a lower-level error with context. The resulting stack keeps the
 * new message followed by the original error's stack.
 */
export class RethrownError extends Error {
    originalError: Error;
    stackBeforeRethrow: string | undefined;

    constructor(message: string, error: Error) {
        super(message);
        this.name = this.constructor.name;
        this.originalError = error;
        this.stackBeforeRethrow = this.stack;
        const messageLines = (this.message.match(/\n/g) || []).length + 1;
        this.stack =
            this.stack
                ?.split('\n')
                .slice(0, messageLines + 1)
                .join('\n') +
            '\n' +
            error.stack;
    }
}

/** Normalises an unknown thrown value into an Error. */
export function asError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
