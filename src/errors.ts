/**
 * Raised when the configuration file or merged settings cannot be used.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly source?: string) {
        super(source ? `${message} (${source})` : message);
        this.name = 'ConfigError';
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, EXDEV, ...).
 */
export const errorCode = (error: unknown): string | undefined => {
    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
};
