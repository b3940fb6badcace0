/**
 * PAIR UTILITIES
 *
 * Canonical keys for unordered pair combinations, so that a combination
 * analyzed as (A, B) and as (B, A) resolves to the same key, the same
 * orientation and the same stored rows.
 */

/**
 * Creates a canonical key for an unordered pair combination.
 * Always orders identifiers alphabetically.
 *
 * Example:
 * - createCanonicalPairKey('XETHZUSD', 'XXBTZUSD') => 'XETHZUSD|XXBTZUSD'
 * - createCanonicalPairKey('XXBTZUSD', 'XETHZUSD') => 'XETHZUSD|XXBTZUSD'
 */
export function createCanonicalPairKey(pairA: string, pairB: string): string {
    if (!pairA || !pairB) {
        throw new Error(`Invalid pairs for combination key: ${pairA}, ${pairB}`);
    }
    return pairA < pairB ? `${pairA}|${pairB}` : `${pairB}|${pairA}`;
}

/**
 * Extracts both identifiers from a canonical key, in key order.
 */
export function parseCanonicalPairKey(key: string): { first: string; second: string } {
    const parts = key.split('|');
    const [first, second] = parts;
    if (parts.length !== 2 || !first || !second) {
        throw new Error(`Invalid pair key format: ${key}`);
    }
    return { first, second };
}

/**
 * Orders two identifiers canonically.
 */
export function orientPair(pairA: string, pairB: string): [string, string] {
    return pairA < pairB ? [pairA, pairB] : [pairB, pairA];
}

/**
 * Unordered 2-combinations of a pair list, each {A, B} yielded once in
 * list order. Duplicate identifiers and self-combinations are skipped.
 */
export function* pairCombinations(pairs: readonly string[]): Generator<[string, string]> {
    const seen = new Set<string>();
    for (let i = 0; i < pairs.length - 1; i++) {
        for (let j = i + 1; j < pairs.length; j++) {
            const a = pairs[i];
            const b = pairs[j];
            if (a === undefined || b === undefined || a === b) continue;
            const key = createCanonicalPairKey(a, b);
            if (seen.has(key)) continue;
            seen.add(key);
            yield [a, b];
        }
    }
}
