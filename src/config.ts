import type { CodecId } from './codecs/meta.js';
import type { Logger } from './types.js';

/**
 * Reproducible algorithm presets. Each maps to a fixed list of codec/level
 * pairs, in priority order.
 *
 * - `balanced`: all codecs at their default levels (default)
 * - `max_ratio`: best ratio, much higher CPU cost
 * - `low_latency`: fastest encode, skips brotli
 */
export type CompressionPreset = 'balanced' | 'max_ratio' | 'low_latency';

export const COMPRESSION_PRESETS: Readonly<Record<CompressionPreset, ReadonlyArray<readonly [CodecId, number]>>> = {
    balanced:    [['gzip', 6], ['br', 4], ['zstd', 3]],
    max_ratio:   [['gzip', 9], ['br', 11], ['zstd', 19]],
    low_latency: [['gzip', 1], ['zstd', 1]],
};

export const DEFAULT_MEMORY_LIMIT_BYTES = 5_000_000;
export const DEFAULT_CONCURRENCY = 4;

export const CONCURRENCY_ENV = 'TRICODEC_CONCURRENCY';
export const MEMORY_LIMIT_ENV = 'TRICODEC_MEMORY_LIMIT';

export interface RuntimeConfig {
    /** Items compressed in parallel by a batch run. */
    concurrency: number;
    /** Default per-item ceiling for in-memory output. */
    memoryLimitBytes: number;
}

function positiveInt(raw: string | undefined, name: string, fallback: number, logger?: Logger | null): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        logger?.warn?.(`[config] Ignoring ${name}=${JSON.stringify(raw)}: expected a positive integer. Using ${fallback}.`);
        return fallback;
    }
    return value;
}

/**
 * Reads process-level defaults from the environment. Explicit options passed
 * to a batch always win over these.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger | null): RuntimeConfig {
    return {
        concurrency: positiveInt(env[CONCURRENCY_ENV], CONCURRENCY_ENV, DEFAULT_CONCURRENCY, logger),
        memoryLimitBytes: positiveInt(env[MEMORY_LIMIT_ENV], MEMORY_LIMIT_ENV, DEFAULT_MEMORY_LIMIT_BYTES, logger),
    };
}
