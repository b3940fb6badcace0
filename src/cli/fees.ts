#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../config/index.js';
import { PublicClient } from '../http/publicClient.js';
import { writeFeeCsv } from '../analysis/fees.js';
import { reportFailure } from './shared.js';

async function main() {
    const config = loadConfig();
    const client = new PublicClient(config.baseUrl, config.basePath);
    const fees = await client.getAssetPairFees();
    await writeFeeCsv(config.feesPath, fees);
    console.log(`[fees] wrote ${fees.length} pairs to ${config.feesPath}`);
}

main().catch((err) => reportFailure('fees', err));
