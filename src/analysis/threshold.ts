/**
 * THRESHOLD CALIBRATOR
 *
 * Resolves a ThresholdSpec against a distribution of adjusted
 * discrepancies:
 * - percentile(p): p-th percentile, p in (0, 100)
 * - stdDev(k):     mean + k * population std-dev
 * - iqr(m):        [Q1 - m*IQR, Q3 + m*IQR], an outlier band
 * - fixed(v):      v
 *
 * With no spec the entry threshold is stdDev(2) over the distribution being
 * filtered. A zero-variance distribution resolves stdDev(k) to its mean; an
 * empty one resolves to 0.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { mean, populationStd, quantile } from '../lib/stats.js';
import type { DiscrepancyRecord } from '../types/discrepancy.js';

export const ThresholdSpecSchema = z.discriminatedUnion('method', [
    z.object({ method: z.literal('percentile'), parameter: z.number().gt(0).lt(100) }),
    z.object({ method: z.literal('stdDev'), parameter: z.number().finite() }),
    z.object({ method: z.literal('iqr'), parameter: z.number().finite().nonnegative() }),
    z.object({ method: z.literal('fixed'), parameter: z.number().finite() })
]);
export type ThresholdSpec = z.infer<typeof ThresholdSpecSchema>;
export type ThresholdMethod = ThresholdSpec['method'];

export const DEFAULT_THRESHOLD_SPEC: ThresholdSpec = { method: 'stdDev', parameter: 2 };

export type Bounds = { lower: number; upper: number };

export type ResolvedThreshold =
    | { kind: 'scalar'; value: number }
    | ({ kind: 'bounds' } & Bounds);

export function parseThresholdSpec(input: unknown): ThresholdSpec {
    const parsed = ThresholdSpecSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError('invalid threshold spec', parsed.error.issues.map((i) => `${i.path.join('.') || 'spec'}: ${i.message}`));
    }
    return parsed.data;
}

export function iqrBounds(values: readonly number[], multiplier: number): Bounds {
    const q1 = quantile(values, 0.25);
    const q3 = quantile(values, 0.75);
    const iqr = q3 - q1;
    return { lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr };
}

export function stdDevBounds(values: readonly number[], multiplier: number): Bounds {
    const m = mean(values);
    const sd = populationStd(values);
    return { lower: m - multiplier * sd, upper: m + multiplier * sd };
}

// tailPct = 1 -> [p1, p99]; tailPct = 5 -> [p5, p95]
export function percentileBounds(values: readonly number[], tailPct: number): Bounds {
    return { lower: quantile(values, tailPct / 100), upper: quantile(values, 1 - tailPct / 100) };
}

export function resolveThreshold(values: readonly number[], spec: ThresholdSpec): ResolvedThreshold {
    switch (spec.method) {
        case 'percentile':
            return { kind: 'scalar', value: quantile(values, spec.parameter / 100) };
        case 'stdDev':
            return { kind: 'scalar', value: mean(values) + spec.parameter * populationStd(values) };
        case 'iqr':
            return { kind: 'bounds', ...iqrBounds(values, spec.parameter) };
        case 'fixed':
            return { kind: 'scalar', value: spec.parameter };
    }
}

/**
 * Scalar entry cutoff for filtering trade candidates. An IQR spec enters on
 * its upper bound.
 */
export function resolveEntryThreshold(values: readonly number[], spec: ThresholdSpec = DEFAULT_THRESHOLD_SPEC): number {
    const resolved = resolveThreshold(values, spec);
    return resolved.kind === 'scalar' ? resolved.value : resolved.upper;
}

export function findOutliers<T extends Pick<DiscrepancyRecord, 'adjustedDiscrepancy'>>(records: readonly T[], bounds: Bounds): T[] {
    return records.filter((r) => r.adjustedDiscrepancy < bounds.lower || r.adjustedDiscrepancy > bounds.upper);
}

export function describeSpec(spec: ThresholdSpec | undefined): string {
    if (!spec) return 'stdDev(2) per combination';
    return `${spec.method}(${spec.parameter})`;
}
