/**
 * Derived statistics over a batch: counts, ratios and timing percentiles per
 * codec. Read-only; computed on demand.
 */

import type { CodecId } from '../codecs/meta.js';
import type { ItemResult } from './item-result.js';

export interface CodecStats {
    codec: CodecId;
    /** Items where this codec produced output. */
    count: number;
    totalCompressedBytes: number;
    /** Original bytes of those items minus their compressed bytes. */
    bytesSaved: number;
    averageRatio: number;
    medianRatio: number;
    p95Ratio: number;
    totalTimeMs: number;
    averageTimeMs: number;
    medianTimeMs: number;
    p95TimeMs: number;
}

export interface BatchSummary {
    totalItems: number;
    successCount: number;
    failureCount: number;
    /** 0..1; 0 for an empty batch. */
    successRate: number;
    totalOriginalBytes: number;
    codecs: Partial<Record<CodecId, CodecStats>>;
}

/**
 * Nearest-rank percentile: the value at index ceil(n * p / 100) - 1 of the
 * sorted sample, clamped to the first element. Empty sample = 0.
 */
export function percentile(values: readonly number[], p: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.max(0, Math.ceil((sorted.length * p) / 100) - 1);
    return sorted[Math.min(index, sorted.length - 1)];
}

function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((acc, v) => acc + v, 0) / values.length;
}

function sum(values: readonly number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
}

export function codecStats(items: Iterable<ItemResult>, codec: CodecId): CodecStats {
    const ratios: number[] = [];
    const times: number[] = [];
    let compressed = 0;
    let original = 0;

    for (const item of items) {
        if (!item.has(codec)) continue;
        ratios.push(item.ratio(codec));
        times.push(item.elapsedMs(codec));
        compressed += item.size(codec);
        original += item.originalSize;
    }

    return {
        codec,
        count: ratios.length,
        totalCompressedBytes: compressed,
        bytesSaved: original - compressed,
        averageRatio: mean(ratios),
        medianRatio: percentile(ratios, 50),
        p95Ratio: percentile(ratios, 95),
        totalTimeMs: sum(times),
        averageTimeMs: mean(times),
        medianTimeMs: percentile(times, 50),
        p95TimeMs: percentile(times, 95),
    };
}

export function summarize(batch: Iterable<ItemResult>): BatchSummary {
    const items = [...batch];
    const successCount = items.filter((item) => item.success).length;

    const seen = new Set<CodecId>();
    for (const item of items) {
        for (const codec of item.perCodec.keys()) seen.add(codec);
    }

    const codecs: Partial<Record<CodecId, CodecStats>> = {};
    for (const codec of seen) codecs[codec] = codecStats(items, codec);

    return {
        totalItems: items.length,
        successCount,
        failureCount: items.length - successCount,
        successRate: items.length === 0 ? 0 : successCount / items.length,
        totalOriginalBytes: sum(items.map((item) => item.originalSize)),
        codecs,
    };
}
