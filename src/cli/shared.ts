import { ConfigError } from '../lib/errors.js';

export function reportFailure(tag: string, err: unknown): void {
    if (err instanceof ConfigError) {
        console.error(`[${tag}] configuration error: ${err.message}`);
    } else {
        console.error(`[${tag}]`, err);
    }
    process.exitCode = 1;
}
