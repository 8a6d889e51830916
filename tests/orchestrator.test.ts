import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { gunzipSync } from 'zlib';
import { BrotliAdapter, GzipAdapter, type CodecAdapter } from '../src/codecs/adapters.js';
import { CODEC_META } from '../src/codecs/meta.js';
import { CodecRegistry } from '../src/codecs/registry.js';
import { CompressionOrchestrator } from '../src/engine/orchestrator.js';
import { ErrorCode, PayloadTooLargeError } from '../src/errors.js';
import { AlgorithmSet } from '../src/model/algorithm-set.js';
import { BufferInput, FileInput, type CompressionInput } from '../src/model/input.js';
import { ItemConfig } from '../src/model/item-config.js';
import { CollectingSink, bytes, fakeAdapter, patterned, recordingLogger, withTempDir } from './helpers/test-utils.js';

/** File-like input whose stream fails on the first read. */
function brokenStreamInput(): CompressionInput {
    return {
        id: 'broken-stream',
        kind: 'file',
        allowedOutputModes: ['memory', 'stream'],
        sizeBytes: async () => 3,
        readAll: async () => patterned(3),
        openStream: () =>
            new Readable({
                read() {
                    this.destroy(new Error('EIO read'));
                },
            }),
    };
}

function config(codecs: Array<'gzip' | 'br' | 'zstd'>, maxBytes: number | null = null): ItemConfig {
    return new ItemConfig(AlgorithmSet.of(codecs.map((codec) => ({ codec }))), maxBytes);
}

describe('CompressionOrchestrator.compressItem', () => {
    it('fails the whole item once when the input exceeds maxBytes', async () => {
        const gzip = fakeAdapter('gzip');
        const br = fakeAdapter('br');
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([gzip, br]) });

        const result = await orchestrator.compressItem(new BufferInput('big', patterned(11)), config(['gzip', 'br'], 10), false);

        expect(result.success).toBe(false);
        expect(result.status).toBe('failed');
        expect(result.originalSize).toBe(11);
        expect(result.perCodec.size).toBe(0);
        expect(result.itemError?.code).toBe(ErrorCode.PAYLOAD_TOO_LARGE);
        expect(gzip.calls).toEqual([]);
        expect(br.calls).toEqual([]);
    });

    it('accepts an input of exactly maxBytes', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([fakeAdapter('gzip')]) });
        const result = await orchestrator.compressItem(new BufferInput('edge', patterned(10)), config(['gzip'], 10), false);
        expect(result.success).toBe(true);
        expect(result.size('gzip')).toBe(5);
    });

    it('throws the size violation under failFast', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([fakeAdapter('gzip')]) });
        await expect(orchestrator.compressItem(new BufferInput('big', patterned(11)), config(['gzip'], 10), true)).rejects.toBeInstanceOf(
            PayloadTooLargeError,
        );
    });

    it('isolates an unavailable codec from the others', async () => {
        const registry = new CodecRegistry([fakeAdapter('gzip'), fakeAdapter('br', { available: false })]);
        const orchestrator = new CompressionOrchestrator({ registry });
        const input = new BufferInput('doc', patterned(100));

        const required = await orchestrator.compressItem(input, config(['gzip', 'br']), false);
        expect(required.success).toBe(false);
        expect(required.status).toBe('partial');
        expect(required.data('gzip').byteLength).toBe(50);
        expect(required.error('br')?.code).toBe(ErrorCode.ALGORITHM_UNAVAILABLE);

        const optional = await orchestrator.compressItem(input, new ItemConfig(AlgorithmSet.of([{ codec: 'gzip' }, { codec: 'br', optional: true }])), false);
        expect(optional.success).toBe(true);
        expect(optional.data('gzip').byteLength).toBe(50);
    });

    it('reports a codec without a registered adapter as unavailable', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([fakeAdapter('gzip')]) });
        const result = await orchestrator.compressItem(new BufferInput('doc', bytes('hello')), config(['gzip', 'zstd']), false);

        expect(result.has('gzip')).toBe(true);
        expect(result.error('zstd')?.code).toBe(ErrorCode.ALGORITHM_UNAVAILABLE);
        expect(result.error('zstd')?.message).toBe('No adapter registered for zstd');
    });

    it('records codec errors and keeps going in graceful mode', async () => {
        const logger = recordingLogger();
        const zstd = fakeAdapter('zstd');
        const orchestrator = new CompressionOrchestrator({
            registry: new CodecRegistry([fakeAdapter('br', { failWith: 'boom' }), zstd]),
            logger,
        });

        const result = await orchestrator.compressItem(new BufferInput('doc', patterned(8)), config(['br', 'zstd']), false);

        expect(result.error('br')?.message).toBe('br compression failed: boom');
        expect(result.error('br')?.code).toBe(ErrorCode.COMPRESSION_FAILED);
        expect(result.size('zstd')).toBe(4);
        expect(zstd.calls).toEqual([3]);
        expect(logger.lines).toContain('warn [orchestrator] doc br failed: br compression failed: boom');
    });

    it('stops at the first codec error under failFast', async () => {
        const zstd = fakeAdapter('zstd');
        const orchestrator = new CompressionOrchestrator({
            registry: new CodecRegistry([fakeAdapter('br', { failWith: 'boom' }), zstd]),
        });

        await expect(orchestrator.compressItem(new BufferInput('doc', patterned(8)), config(['br', 'zstd']), true)).rejects.toThrow(
            'br compression failed: boom',
        );
        expect(zstd.calls).toEqual([]);
    });

    it('rejects an output mode the input kind does not allow', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([fakeAdapter('gzip')]) });
        const result = await orchestrator.compressItem(new BufferInput('buf', bytes('x')), config(['gzip']), false, { outputMode: 'directory' });

        expect(result.status).toBe('failed');
        expect(result.itemError?.code).toBe(ErrorCode.UNSUPPORTED_OUTPUT_MODE);
    });

    it('applies the in-memory ceiling', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([fakeAdapter('gzip')]) });
        const result = await orchestrator.compressItem(new BufferInput('buf', patterned(6)), config(['gzip']), false, {
            outputMode: 'memory',
            maxInMemoryBytes: 5,
        });

        expect(result.itemError?.code).toBe(ErrorCode.PAYLOAD_TOO_LARGE);
        expect(result.itemError?.context).toEqual({ itemId: 'buf', size: 6, limit: 5 });
    });

    it('reads a buffered input once for all codecs', async () => {
        let reads = 0;
        const data = patterned(40);
        const input: CompressionInput = {
            id: 'counted',
            kind: 'buffer',
            allowedOutputModes: ['memory'],
            sizeBytes: async () => data.byteLength,
            readAll: async () => {
                reads++;
                return data;
            },
            openStream: () => null,
        };
        const orchestrator = new CompressionOrchestrator({
            registry: new CodecRegistry([fakeAdapter('gzip'), fakeAdapter('br'), fakeAdapter('zstd')]),
        });

        const result = await orchestrator.compressItem(input, config(['gzip', 'br', 'zstd']), false);

        expect(result.isOk()).toBe(true);
        expect(reads).toBe(1);
    });

    it('fails the item when reading the input fails', async () => {
        const input: CompressionInput = {
            id: 'broken',
            kind: 'buffer',
            allowedOutputModes: ['memory'],
            sizeBytes: async () => 3,
            readAll: async () => {
                throw new Error('disk gone');
            },
            openStream: () => null,
        };
        const gzip = fakeAdapter('gzip');
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([gzip]) });

        const result = await orchestrator.compressItem(input, config(['gzip']), false);

        expect(result.status).toBe('failed');
        expect(result.itemError?.message).toBe('Failed to read input broken: disk gone');
        expect(gzip.calls).toEqual([]);
    });

    it('streams file inputs through adapters that support it', async () => {
        await withTempDir(async (dir) => {
            const file = path.join(dir, 'page.html');
            const content = Buffer.from('<p>hello</p>'.repeat(500));
            await fs.writeFile(file, content);

            const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([GzipAdapter]) });
            const result = await orchestrator.compressItem(FileInput.of(file), config(['gzip']), true);

            expect(result.originalSize).toBe(content.byteLength);
            expect(gunzipSync(result.data('gzip')).equals(content)).toBe(true);
            expect(result.size('gzip')).toBeLessThan(content.byteLength);
        });
    });

    it('fails the item once when a streamed input cannot be read', async () => {
        const logger = recordingLogger();
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([GzipAdapter, BrotliAdapter]), logger });

        const result = await orchestrator.compressItem(brokenStreamInput(), config(['gzip', 'br']), false);

        expect(result.status).toBe('failed');
        expect(result.perCodec.size).toBe(0);
        expect(result.itemError?.message).toBe('Failed to read input broken-stream: EIO read');
        expect(result.itemError?.context.codec).toBeUndefined();
        expect(logger.lines).toEqual(['warn [orchestrator] broken-stream failed: Failed to read input broken-stream: EIO read']);

        await expect(orchestrator.compressItem(brokenStreamInput(), config(['gzip', 'br']), true)).rejects.toThrow(
            'Failed to read input broken-stream: EIO read',
        );
    });

    it('keeps a streamed codec error on its codec', async () => {
        const failing: CodecAdapter = {
            id: 'gzip',
            meta: CODEC_META.gzip,
            isAvailable: () => true,
            compress: async (data) => data,
            compressStream: async () => {
                throw new Error('codec broke');
            },
        };
        const input: CompressionInput = {
            id: 'readable',
            kind: 'file',
            allowedOutputModes: ['memory'],
            sizeBytes: async () => 3,
            readAll: async () => bytes('abc'),
            openStream: () => Readable.from([Buffer.from('abc')]),
        };
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([failing, fakeAdapter('br')]) });

        const result = await orchestrator.compressItem(input, config(['gzip', 'br']), false);

        expect(result.itemError).toBeNull();
        expect(result.error('gzip')?.message).toBe('gzip compression failed: codec broke');
        expect(result.size('br')).toBe(2);
    });
});

describe('CompressionOrchestrator.compressItemInto', () => {
    it('writes each codec into its own sink without ending it', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([GzipAdapter, fakeAdapter('zstd')]) });
        const gzipSink = new CollectingSink();
        const zstdSink = new CollectingSink();
        const data = patterned(5000);

        const result = await orchestrator.compressItemInto(
            new BufferInput('doc', data),
            config(['gzip', 'zstd']),
            true,
            new Map([
                ['gzip', gzipSink],
                ['zstd', zstdSink],
            ] as const),
        );

        expect(result.isOk()).toBe(true);
        expect(gzipSink.writableEnded).toBe(false);
        expect(Buffer.compare(gunzipSync(gzipSink.bytes), Buffer.from(data))).toBe(0);
        expect(result.size('gzip')).toBe(gzipSink.bytes.byteLength);
        expect(zstdSink.bytes).toEqual(data.slice(0, 2500));
        expect(result.outcome('zstd')).toMatchObject({ ok: true, sizeBytes: 2500, data: null, path: null });
    });

    it('destroys the sink of a failed codec in graceful mode', async () => {
        const orchestrator = new CompressionOrchestrator({
            registry: new CodecRegistry([fakeAdapter('gzip'), fakeAdapter('br', { failWith: 'nope' })]),
        });
        const gzipSink = new CollectingSink();
        const brSink = new CollectingSink();

        const result = await orchestrator.compressItemInto(
            new BufferInput('doc', patterned(10)),
            config(['gzip', 'br']),
            false,
            new Map([
                ['gzip', gzipSink],
                ['br', brSink],
            ] as const),
        );

        expect(result.status).toBe('partial');
        expect(brSink.destroyed).toBe(true);
        expect(gzipSink.destroyed).toBe(false);
        expect(gzipSink.bytes.byteLength).toBe(5);
    });

    it('destroys the sink and fails the item when the input stream breaks', async () => {
        const orchestrator = new CompressionOrchestrator({ registry: new CodecRegistry([GzipAdapter]) });
        const sink = new CollectingSink();

        const result = await orchestrator.compressItemInto(brokenStreamInput(), config(['gzip']), false, new Map([['gzip', sink]] as const));

        expect(sink.destroyed).toBe(true);
        expect(result.status).toBe('failed');
        expect(result.itemError?.message).toBe('Failed to read input broken-stream: EIO read');
    });
});
