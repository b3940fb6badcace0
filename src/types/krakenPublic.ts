import { z } from 'zod';

const NumericSchema = z.union([z.string(), z.number()]);

// [time, open, high, low, close, vwap, volume, count]
export const OhlcRowSchema = z.tuple([
    NumericSchema, // time (s)
    NumericSchema, // open
    NumericSchema, // high
    NumericSchema, // low
    NumericSchema, // close
    NumericSchema, // vwap
    NumericSchema, // volume
    NumericSchema // trade count
]);
export type OhlcRow = z.infer<typeof OhlcRowSchema>;

export const PublicEnvelopeSchema = z.object({
    error: z.array(z.string()).default([]),
    result: z.unknown().optional()
});

export const OhlcResultSchema = z.record(z.string(), z.unknown());

export const FeeScheduleSchema = z.array(z.tuple([z.number(), z.number()]));

export const AssetPairInfoSchema = z.object({
    altname: z.string().optional(),
    wsname: z.string().optional(),
    base: z.string().optional(),
    quote: z.string().optional(),
    fees: FeeScheduleSchema.optional(),
    fees_maker: FeeScheduleSchema.optional()
}).passthrough();
export type AssetPairInfo = z.infer<typeof AssetPairInfoSchema>;

export const AssetPairsResultSchema = z.record(z.string(), AssetPairInfoSchema);

export type RawOhlcPayload = {
    rows: OhlcRow[];
    last?: number;
};

export type AssetPairFee = {
    pair: string;
    altName: string;
    base: string;
    quote: string;
    takerFeePct: number;
    makerFeePct: number;
};
