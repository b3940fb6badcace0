/**
 * Error types.
 *
 * ConfigError is fatal: entry points print it and exit before any fetch or
 * computation. FetchError never leaves the fetcher; a pair whose request
 * raises it is dropped from the run.
 */

export class ConfigError extends Error {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

export class FetchError extends Error {
    constructor(message: string, readonly pair?: string, readonly status?: number) {
        super(message);
        this.name = 'FetchError';
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}

export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
