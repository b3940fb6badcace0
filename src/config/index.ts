/**
 * ENGINE CONFIGURATION
 *
 * Loads environment variables once into a typed, frozen configuration
 * struct that is passed explicitly into every entry point:
 * - Exchange endpoint and candle interval
 * - Batch size, request timeout and retry policy for the fetcher
 * - Fee table location and default fee
 * - Threshold, outlier and weighting policy for calibration and scoring
 * - Store backend, cache and output locations
 * - HTTP port and CORS origin
 *
 * Invalid values raise ConfigError before anything else runs.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { ThresholdSpecSchema } from '../analysis/threshold.js';
import { DEFAULT_FEE } from '../analysis/fees.js';

export const KRAKEN_INTERVALS = [1, 5, 15, 30, 60, 240, 1440, 10080, 21600] as const;

const ALLOWED_INTERVALS: readonly number[] = KRAKEN_INTERVALS;

const IntervalSchema = z.number().int().refine((n) => ALLOWED_INTERVALS.includes(n), {
    message: `interval must be one of ${KRAKEN_INTERVALS.join(', ')} minutes`
});

export const EngineConfigSchema = z.object({
    baseUrl: z.string().url(),
    basePath: z.string().startsWith('/'),
    batchSize: z.number().int().positive(),
    interval: IntervalSchema,
    defaultFee: z.number().min(0).lt(1),
    feeSide: z.enum(['taker', 'maker']),
    feesPath: z.string().min(1),
    thresholdSpec: ThresholdSpecSchema.optional(),
    outliers: z.object({
        method: z.enum(['iqr', 'stdDev']),
        multiplier: z.number().finite().nonnegative()
    }),
    weighting: z.enum(['conviction', 'proximity']),
    sweep: z.object({
        start: z.number().finite(),
        end: z.number().finite(),
        step: z.number().positive()
    }).refine((s) => s.end >= s.start, { message: 'sweep end must not be below start' }),
    fetchTimeoutMs: z.number().int().nonnegative(),
    retry: z.object({
        attempts: z.number().int().positive(),
        baseDelayMs: z.number().int().nonnegative()
    }),
    cache: z.object({
        dir: z.string().min(1),
        ttlMs: z.number().int().nonnegative()
    }),
    storeBackend: z.enum(['sqlite', 'jsonl']),
    dbPath: z.string().min(1),
    ledgerPath: z.string().min(1),
    outputDir: z.string().min(1),
    pairLimit: z.number().int().positive().optional(),
    loopIntervalMs: z.number().int().positive(),
    port: z.number().int().min(0).max(65535),
    allowedOrigin: z.string().min(1)
});

export type EngineConfig = Readonly<z.infer<typeof EngineConfigSchema>>;

type Env = Record<string, string | undefined>;

function num(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    return Number(value);
}

function optionalNum(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return Number(value);
}

function thresholdFromEnv(env: Env): unknown {
    const method = env.THRESHOLD_METHOD?.trim();
    if (!method) return undefined;
    return { method, parameter: num(env.THRESHOLD_PARAMETER, Number.NaN) };
}

export function loadConfig(env: Env = process.env): EngineConfig {
    const candidate = {
        baseUrl: env.KRAKEN_BASE_URL || 'https://api.kraken.com',
        basePath: env.KRAKEN_BASE_PATH || '/0/public',
        batchSize: num(env.BATCH_SIZE, 10),
        interval: num(env.OHLC_INTERVAL, 15),
        defaultFee: num(env.DEFAULT_FEE, DEFAULT_FEE),
        feeSide: (env.FEE_SIDE || 'taker').toLowerCase(),
        feesPath: env.FEES_PATH || 'data/trade_fees.csv',
        thresholdSpec: thresholdFromEnv(env),
        outliers: {
            method: env.OUTLIER_METHOD || 'iqr',
            multiplier: num(env.OUTLIER_MULTIPLIER, 1.5)
        },
        weighting: (env.WEIGHTING || 'conviction').toLowerCase(),
        sweep: {
            start: num(env.SWEEP_START, 1),
            end: num(env.SWEEP_END, 5),
            step: num(env.SWEEP_STEP, 0.1)
        },
        fetchTimeoutMs: num(env.FETCH_TIMEOUT_MS, 10_000),
        retry: {
            attempts: num(env.FETCH_ATTEMPTS, 1),
            baseDelayMs: num(env.FETCH_RETRY_DELAY_MS, 500)
        },
        cache: {
            dir: env.CACHE_DIR || 'results/cache',
            ttlMs: num(env.CACHE_TTL_MS, 15 * 60 * 1000)
        },
        storeBackend: (env.STORE_BACKEND || 'sqlite').toLowerCase(),
        dbPath: env.DB_PATH || 'results/arbitrage_data.db',
        ledgerPath: env.LEDGER_PATH || 'results/discrepancies.jsonl',
        outputDir: env.OUTPUT_DIR || 'results',
        pairLimit: optionalNum(env.PAIR_LIMIT),
        loopIntervalMs: num(env.LOOP_INTERVAL_MS, 15 * 60 * 1000),
        port: num(env.PORT, 3000),
        allowedOrigin: env.ALLOWED_ORIGIN || '*'
    };
    const parsed = EngineConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
        throw new ConfigError('invalid configuration', issues);
    }
    return Object.freeze(parsed.data);
}
