/**
 * STATISTICAL COMPUTATION LIBRARY
 *
 * Descriptive statistics over discrepancy and profit distributions:
 * - Central tendency (mean) and dispersion (population and sample std-dev)
 * - Quantiles with linear interpolation between closest ranks
 * - Clamping and ranged sequences for threshold sweeps
 *
 * Every function is pure and returns 0 for an empty input instead of NaN.
 */

export function sum(values: readonly number[]): number {
    return values.reduce((a, b) => a + b, 0);
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return sum(values) / values.length;
}

export function populationStd(values: readonly number[]): number {
    const n = values.length;
    if (n === 0) return 0;
    const m = mean(values);
    const variance = values.reduce((a, b) => a + (b - m) * (b - m), 0) / n;
    return Math.sqrt(variance) || 0;
}

export function sampleStd(values: readonly number[]): number {
    const n = values.length;
    if (n < 2) return 0;
    const m = mean(values);
    const variance = values.reduce((a, b) => a + (b - m) * (b - m), 0) / (n - 1);
    return Math.sqrt(variance) || 0;
}

/**
 * Quantile for q in [0, 1], interpolating linearly between the two closest
 * order statistics (the same rule spreadsheet PERCENTILE.INC uses).
 */
export function quantile(values: readonly number[], q: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const pos = (sorted.length - 1) * Math.min(1, Math.max(0, q));
    const lo = Math.floor(pos);
    const hi = Math.ceil(pos);
    const lower = sorted[lo] ?? 0;
    const upper = sorted[hi] ?? lower;
    return lower + (upper - lower) * (pos - lo);
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

/**
 * Inclusive arithmetic range. Points are computed from integer step counts
 * and rounded so 1.0..5.0 by 0.1 yields exactly 41 clean values.
 */
export function range(start: number, end: number, step: number): number[] {
    if (!(step > 0) || end < start) return [start];
    const count = Math.floor((end - start) / step + 1e-9) + 1;
    const out: number[] = [];
    for (let i = 0; i < count; i++) {
        out.push(Math.round((start + i * step) * 1e10) / 1e10);
    }
    return out;
}
