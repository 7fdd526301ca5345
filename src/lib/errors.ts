export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A remote content source (GitHub API, raw file host) failed. The message is
 * safe to show to chat users; the cause keeps the details for the logs.
 */
export class ContentSourceError extends Error {
    readonly source: string;
    readonly status?: number;

    constructor(source: string, message: string, options: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ContentSourceError';
        this.source = source;
        this.status = options.status;
    }
}

export function stringifyError(value: unknown): string {
    if (value instanceof Error) {
        return value.message;
    }
    return String(value);
}
