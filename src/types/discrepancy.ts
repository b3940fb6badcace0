/**
 * Domain types shared by the normalizer, analyzer, calibrator and scorer.
 * Everything here is plain data; the computation modules never mutate it.
 */

export type Pair = string;

export type FeeSide = 'taker' | 'maker';

export type Candle = {
    timestamp: number; // seconds since epoch
    open: number;
    high: number;
    low: number;
    close: number;
    vwap: number;
    volume: number;
    tradeCount: number;
};

export type NormalizedSeries = {
    readonly pair: Pair;
    readonly interval: number;
    readonly candles: ReadonlyArray<Readonly<Candle>>;
};

export type FeeEntry = {
    pair: Pair;
    takerFee: number;
    makerFee: number;
};

export type DiscrepancyRecord = {
    timestamp: number;
    pairA: Pair;
    pairB: Pair;
    priceA: number;
    priceB: number;
    rawDiscrepancy: number;
    feeA: number;
    feeB: number;
    adjustedDiscrepancy: number;
    volumeA: number;
};

export type PairAnalysis = {
    key: string;
    pairA: Pair;
    pairB: Pair;
    records: DiscrepancyRecord[];
};

export type TradeCandidate = DiscrepancyRecord & {
    profit: number;
    weight: number;
    weightedProfit: number;
    cumulativeProfit: number;
};

export type BacktestResult = {
    threshold: number;
    totalProfit: number;
    weightedProfit: number;
    tradeCount: number;
    sharpeRatio: number;
    sortinoRatio: number;
    candidates: TradeCandidate[];
};
