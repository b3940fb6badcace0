import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config/index.js';
import { ConfigError } from '../src/lib/errors.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({});
        expect(config).toMatchObject({
            baseUrl: 'https://api.kraken.com',
            basePath: '/0/public',
            batchSize: 10,
            interval: 15,
            defaultFee: 0.0026,
            feeSide: 'taker',
            feesPath: 'data/trade_fees.csv',
            outliers: { method: 'iqr', multiplier: 1.5 },
            weighting: 'conviction',
            sweep: { start: 1, end: 5, step: 0.1 },
            retry: { attempts: 1, baseDelayMs: 500 },
            cache: { dir: 'results/cache', ttlMs: 900_000 },
            storeBackend: 'sqlite',
            port: 3000,
            allowedOrigin: '*'
        });
        expect(config.thresholdSpec).toBeUndefined();
        expect(config.pairLimit).toBeUndefined();
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('reads threshold and overrides from the environment', () => {
        const config = loadConfig({
            THRESHOLD_METHOD: 'percentile',
            THRESHOLD_PARAMETER: '95',
            FEE_SIDE: 'MAKER',
            PAIR_LIMIT: '20',
            STORE_BACKEND: 'jsonl',
            ALLOWED_ORIGIN: 'http://localhost:5173'
        });
        expect(config.allowedOrigin).toBe('http://localhost:5173');
        expect(config.thresholdSpec).toEqual({ method: 'percentile', parameter: 95 });
        expect(config.feeSide).toBe('maker');
        expect(config.pairLimit).toBe(20);
        expect(config.storeBackend).toBe('jsonl');
    });

    it('rejects invalid values with a ConfigError naming the field', () => {
        expect(() => loadConfig({ BATCH_SIZE: '0' })).toThrow(ConfigError);
        expect(() => loadConfig({ OHLC_INTERVAL: '7' })).toThrow(ConfigError);
        expect(() => loadConfig({ THRESHOLD_METHOD: 'percentile' })).toThrow(ConfigError);
        expect(() => loadConfig({ SWEEP_START: '5', SWEEP_END: '1' })).toThrow(ConfigError);
        try {
            loadConfig({ BATCH_SIZE: 'ten' });
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(ConfigError);
            expect(e instanceof ConfigError ? e.issues[0] : '').toMatch(/^batchSize: /);
        }
    });
});
