declare namespace NodeJS {
    interface ProcessEnv {
        KRAKEN_BASE_URL?: string;
        KRAKEN_BASE_PATH?: string;
        BATCH_SIZE?: string;
        OHLC_INTERVAL?: string;
        DEFAULT_FEE?: string;
        FEE_SIDE?: string;
        FEES_PATH?: string;
        THRESHOLD_METHOD?: string;
        THRESHOLD_PARAMETER?: string;
        OUTLIER_METHOD?: string;
        OUTLIER_MULTIPLIER?: string;
        WEIGHTING?: string;
        SWEEP_START?: string;
        SWEEP_END?: string;
        SWEEP_STEP?: string;
        FETCH_TIMEOUT_MS?: string;
        FETCH_ATTEMPTS?: string;
        FETCH_RETRY_DELAY_MS?: string;
        CACHE_DIR?: string;
        CACHE_TTL_MS?: string;
        STORE_BACKEND?: string;
        DB_PATH?: string;
        LEDGER_PATH?: string;
        OUTPUT_DIR?: string;
        PAIR_LIMIT?: string;
        LOOP_INTERVAL_MS?: string;
        PORT?: string;
        ALLOWED_ORIGIN?: string;
    }
}
