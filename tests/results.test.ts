import { CompressionError, CompressionFailedError, ErrorCode, PayloadTooLargeError } from '../src/errors.js';
import { BatchResult } from '../src/results/batch-result.js';
import { ItemResult, type CodecOutcome } from '../src/results/item-result.js';
import { codecStats, percentile, summarize } from '../src/results/summary.js';
import type { CodecId } from '../src/codecs/meta.js';

function ok(codec: CodecId, size: number, elapsedMs: number): CodecOutcome {
    return { ok: true, codec, level: 1, sizeBytes: size, elapsedMs, data: new Uint8Array(size), path: null };
}

function fail(codec: CodecId): CodecOutcome {
    return { ok: false, codec, level: 1, elapsedMs: 1, error: new CompressionFailedError(`${codec} broke`, { codec }) };
}

describe('ItemResult', () => {
    it('is ok when every codec succeeds', () => {
        const item = ItemResult.settle({ id: 'a', originalSize: 100, outcomes: [ok('gzip', 40, 2), ok('br', 30, 3)], requiredCodecs: ['gzip', 'br'] });
        expect(item.success).toBe(true);
        expect(item.status).toBe('ok');
        expect(item.isOk()).toBe(true);
        expect(item.ratio('br')).toBe(0.3);
        expect(item.failureReason()).toBeNull();
    });

    it('fails when a required codec fails', () => {
        const item = ItemResult.settle({ id: 'a', originalSize: 100, outcomes: [ok('gzip', 40, 2), fail('zstd')], requiredCodecs: ['gzip', 'zstd'] });
        expect(item.success).toBe(false);
        expect(item.status).toBe('partial');
        expect(item.has('gzip')).toBe(true);
        expect(item.failureReason()?.message).toBe('zstd broke');
    });

    it('succeeds when only an optional codec fails', () => {
        const item = ItemResult.settle({ id: 'a', originalSize: 100, outcomes: [ok('gzip', 40, 2), fail('zstd')], requiredCodecs: ['gzip'] });
        expect(item.success).toBe(true);
        expect(item.status).toBe('partial');
        expect(item.isOk()).toBe(false);
    });

    it('is failed when nothing succeeded', () => {
        const item = ItemResult.settle({ id: 'a', originalSize: 10, outcomes: [fail('gzip'), fail('br')], requiredCodecs: [] });
        expect(item.success).toBe(false);
        expect(item.status).toBe('failed');
        expect([...item.errors().keys()]).toEqual(['gzip', 'br']);
    });

    it('keeps an item-level error under _item', () => {
        const error = new PayloadTooLargeError('too big', { size: 11, limit: 10 });
        const item = ItemResult.failed('a', 11, error);
        expect(item.status).toBe('failed');
        expect(item.perCodec.size).toBe(0);
        expect(item.errors().get('_item')).toBe(error);
        expect(item.failureReason()).toBe(error);
    });

    it('throws ITEM_NOT_FOUND for missing output', () => {
        const item = ItemResult.settle({ id: 'x', originalSize: 10, outcomes: [fail('gzip')], requiredCodecs: [] });
        expect(() => item.data('gzip')).toThrow(CompressionError);
        expect(() => item.data('br')).toThrow('No output for algorithm br in item x');
    });

    it('reports ratio 0 for empty originals', () => {
        const item = ItemResult.settle({ id: 'e', originalSize: 0, outcomes: [ok('gzip', 20, 1)], requiredCodecs: ['gzip'] });
        expect(item.ratio('gzip')).toBe(0);
    });

    it('reads output in chunks', () => {
        const data = Uint8Array.from({ length: 10 }, (_, i) => i);
        const item = ItemResult.settle({
            id: 'c',
            originalSize: 20,
            outcomes: [{ ok: true, codec: 'gzip', level: 6, sizeBytes: 10, elapsedMs: 1, data, path: null }],
            requiredCodecs: ['gzip'],
        });
        expect([...item.chunks('gzip', 4)].map((chunk) => [...chunk])).toEqual([[0, 1, 2, 3], [4, 5, 6, 7], [8, 9]]);
    });

    it('hands out copies of the stored output', async () => {
        const item = ItemResult.settle({
            id: 'm',
            originalSize: 10,
            outcomes: [{ ok: true, codec: 'gzip', level: 6, sizeBytes: 3, elapsedMs: 1, data: Uint8Array.of(1, 2, 3), path: null }],
            requiredCodecs: ['gzip'],
        });

        item.data('gzip')[0] = 99;
        (await item.load('gzip'))[1] = 99;

        expect([...item.data('gzip')]).toEqual([1, 2, 3]);
        expect(Object.isFrozen(item.outcome('gzip'))).toBe(true);
    });

        it('attaches published paths and can drop data', () => {
        const item = ItemResult.settle({ id: 'p', originalSize: 100, outcomes: [ok('gzip', 40, 2), ok('br', 30, 3)], requiredCodecs: [] });
        const published = item.withPublishedPaths(new Map<CodecId, string>([['gzip', '/out/p.gz']]), true);

        expect(published.path('gzip')).toBe('/out/p.gz');
        expect(published.outcome('gzip')).toMatchObject({ ok: true, data: null, sizeBytes: 40 });
        expect(published.data('br').byteLength).toBe(30);
        expect(item.path('gzip')).toBeNull();
    });
});

describe('BatchResult', () => {
    const a = ItemResult.settle({ id: 'a', originalSize: 100, outcomes: [ok('gzip', 50, 1)], requiredCodecs: ['gzip'] });
    const b = ItemResult.failed('b', 5, new PayloadTooLargeError('too big'));
    const batch = new BatchResult([a, b]);

    it('iterates in input order and looks up by id', () => {
        expect(batch.ids()).toEqual(['a', 'b']);
        expect([...batch].map((item) => item.id)).toEqual(['a', 'b']);
        expect(batch.get('b')).toBe(b);
        expect(batch.first()).toBe(a);
        expect(batch.size).toBe(2);
    });

    it('splits successes and failures', () => {
        expect(batch.allOk()).toBe(false);
        expect(batch.successes().map((item) => item.id)).toEqual(['a']);
        expect(batch.failures().map((item) => item.id)).toEqual(['b']);
    });

    it('throws for unknown ids and empty batches', () => {
        expect(() => batch.get('zzz')).toThrow('No result for ID: zzz');
        let code: ErrorCode | undefined;
        try {
            new BatchResult([]).first();
        } catch (err) {
            if (err instanceof CompressionError) code = err.code;
        }
        expect(code).toBe(ErrorCode.NO_ITEMS);
    });
});

describe('summary', () => {
    it('computes nearest-rank percentiles', () => {
        const values = [15, 20, 35, 40, 50];
        expect(percentile(values, 50)).toBe(35);
        expect(percentile(values, 95)).toBe(50);
        expect(percentile(values, 0)).toBe(15);
        expect(percentile([3, 1, 2], 100)).toBe(3);
        expect(percentile([], 50)).toBe(0);
    });

    it('aggregates per codec over successful outcomes', () => {
        const items = [
            ItemResult.settle({ id: '1', originalSize: 100, outcomes: [ok('gzip', 50, 10), ok('br', 25, 20)], requiredCodecs: [] }),
            ItemResult.settle({ id: '2', originalSize: 200, outcomes: [ok('gzip', 40, 30), fail('br')], requiredCodecs: ['br'] }),
            ItemResult.failed('3', 50, new PayloadTooLargeError('too big')),
        ];
        const summary = summarize(new BatchResult(items));

        expect(summary.totalItems).toBe(3);
        expect(summary.successCount).toBe(1);
        expect(summary.failureCount).toBe(2);
        expect(summary.successRate).toBeCloseTo(1 / 3);
        expect(summary.totalOriginalBytes).toBe(350);

        expect(summary.codecs.gzip?.averageRatio).toBeCloseTo(0.35);
        expect(summary.codecs.gzip).toMatchObject({
            codec: 'gzip',
            count: 2,
            totalCompressedBytes: 90,
            bytesSaved: 210,
            medianRatio: 0.2,
            p95Ratio: 0.5,
            totalTimeMs: 40,
            averageTimeMs: 20,
            medianTimeMs: 10,
            p95TimeMs: 30,
        });
        expect(codecStats(items, 'br')).toMatchObject({ count: 1, totalCompressedBytes: 25, bytesSaved: 75, averageRatio: 0.25 });
        expect(summary.codecs.zstd).toBeUndefined();
    });

    it('handles an empty batch', () => {
        expect(summarize([])).toEqual({
            totalItems: 0,
            successCount: 0,
            failureCount: 0,
            successRate: 0,
            totalOriginalBytes: 0,
            codecs: {},
        });
    });
});
