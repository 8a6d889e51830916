import { Writable, type Readable, type Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { promisify } from 'node:util';
import * as zlib from 'node:zlib';
import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { CompressionFailedError, ErrorCode } from '../errors.js';
import { CODEC_META, type CodecId, type CodecMeta } from './meta.js';

/**
 * Boundary to a compression library. One adapter per codec.
 */
export interface CodecAdapter {
    readonly id: CodecId;
    readonly meta: Readonly<CodecMeta>;
    isAvailable(): boolean;
    compress(data: Uint8Array, level: number): Promise<Uint8Array>;
    /** Compresses a readable without buffering the source first. */
    compressStream?(source: Readable, level: number): Promise<Uint8Array>;
    /** Transform used when output goes straight into a sink. */
    createCompressStream?(level: number): Transform;
    decompress?(data: Uint8Array, maxSize?: number): Promise<Uint8Array>;
}

const gzipAsync = promisify(zlib.gzip);
const gunzipAsync = promisify(zlib.gunzip);
const brotliCompressAsync = promisify(zlib.brotliCompress);
const brotliDecompressAsync = promisify(zlib.brotliDecompress);

/**
 * Runs `source` through `transform` and gathers the output in memory.
 */
export async function collectTransformed(source: Readable, transform: Transform): Promise<Uint8Array> {
    const chunks: Buffer[] = [];
    const collector = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            chunks.push(chunk);
            callback();
        },
    });
    await pipeline(source, transform, collector);
    return new Uint8Array(Buffer.concat(chunks));
}

function toUint8(buffer: Buffer): Uint8Array {
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

function limitError(codec: CodecId, maxSize: number, cause: unknown): CompressionFailedError {
    return new CompressionFailedError(
        `Decompressed size limit exceeded (Limit: ${maxSize})`,
        { codec, limit: maxSize },
        cause,
        ErrorCode.DECOMPRESSION_FAILED,
    );
}

function brotliParams(level: number, sizeHint?: number): zlib.BrotliOptions {
    const params: Record<number, number> = { [zlib.constants.BROTLI_PARAM_QUALITY]: level };
    if (sizeHint !== undefined) params[zlib.constants.BROTLI_PARAM_SIZE_HINT] = sizeHint;
    return { params };
}

export const GzipAdapter: CodecAdapter = {
    id: 'gzip',
    meta: CODEC_META.gzip,
    isAvailable() {
        return typeof zlib.createGzip === 'function';
    },
    async compress(data: Uint8Array, level: number) {
        return toUint8(await gzipAsync(data, { level }));
    },
    async compressStream(source: Readable, level: number) {
        return collectTransformed(source, zlib.createGzip({ level }));
    },
    createCompressStream(level: number) {
        return zlib.createGzip({ level });
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        try {
            return toUint8(await gunzipAsync(data, maxSize === undefined ? {} : { maxOutputLength: maxSize }));
        } catch (err) {
            if (maxSize !== undefined && err instanceof RangeError) throw limitError('gzip', maxSize, err);
            throw new CompressionFailedError('Gzip decompression failed', { codec: 'gzip' }, err, ErrorCode.DECOMPRESSION_FAILED);
        }
    },
};

export const BrotliAdapter: CodecAdapter = {
    id: 'br',
    meta: CODEC_META.br,
    isAvailable() {
        return typeof zlib.createBrotliCompress === 'function';
    },
    async compress(data: Uint8Array, level: number) {
        return toUint8(await brotliCompressAsync(data, brotliParams(level, data.byteLength)));
    },
    async compressStream(source: Readable, level: number) {
        return collectTransformed(source, zlib.createBrotliCompress(brotliParams(level)));
    },
    createCompressStream(level: number) {
        return zlib.createBrotliCompress(brotliParams(level));
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        try {
            return toUint8(await brotliDecompressAsync(data, maxSize === undefined ? {} : { maxOutputLength: maxSize }));
        } catch (err) {
            if (maxSize !== undefined && err instanceof RangeError) throw limitError('br', maxSize, err);
            throw new CompressionFailedError('Brotli decompression failed', { codec: 'br' }, err, ErrorCode.DECOMPRESSION_FAILED);
        }
    },
};

// The wasm module is initialised once, on first use.
let zstdInstance: Promise<ZstdModule> | null = null;

function getZstd(): Promise<ZstdModule> {
    if (!zstdInstance) {
        zstdInstance = new Promise((resolve) => {
            ZstdCodec.run((zstd) => resolve(zstd));
        });
    }
    return zstdInstance;
}

const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];

export function isZstdFrame(data: Uint8Array): boolean {
    return data.byteLength >= 4 && ZSTD_MAGIC.every((byte, i) => data[i] === byte);
}

/**
 * Content size declared in a zstd frame header, or null when the header
 * omits it or is malformed.
 */
export function zstdDeclaredContentSize(data: Uint8Array): number | null {
    if (!isZstdFrame(data) || data.byteLength < 5) return null;
    const descriptor = data[4];
    const fcsFlag = descriptor >> 6;
    const singleSegment = (descriptor & 0x20) !== 0;
    const dictIdBytes = [0, 1, 2, 4][descriptor & 0x03];
    const fcsBytes = fcsFlag === 0 ? (singleSegment ? 1 : 0) : [0, 2, 4, 8][fcsFlag];
    if (fcsBytes === 0) return null;

    const offset = 5 + (singleSegment ? 0 : 1) + dictIdBytes;
    if (data.byteLength < offset + fcsBytes) return null;

    let size = 0;
    for (let i = fcsBytes - 1; i >= 0; i--) size = size * 256 + data[offset + i];
    return fcsBytes === 2 ? size + 256 : size;
}

export const ZstdAdapter: CodecAdapter = {
    id: 'zstd',
    meta: CODEC_META.zstd,
    isAvailable() {
        return typeof ZstdCodec.run === 'function';
    },
    async compress(data: Uint8Array, level: number) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const compressed = simple.compress(data, level);
        if (!compressed) throw new CompressionFailedError('Zstd compression failed', { codec: 'zstd' });
        return compressed;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const zstd = await getZstd();
        let decompressed: Uint8Array | null;
        try {
            decompressed = new zstd.Simple().decompress(data);
            if (!decompressed && isZstdFrame(data)) {
                // Simple rejects frames declaring an empty body and frames without a declared size.
                if (zstdDeclaredContentSize(data) === 0) return new Uint8Array(0);
                decompressed = new zstd.Streaming().decompress(data);
            }
        } catch (err) {
            throw new CompressionFailedError('Zstd decompression failed', { codec: 'zstd' }, err, ErrorCode.DECOMPRESSION_FAILED);
        }
        if (!decompressed) {
            throw new CompressionFailedError('Zstd decompression failed', { codec: 'zstd' }, undefined, ErrorCode.DECOMPRESSION_FAILED);
        }

        if (maxSize !== undefined && decompressed.length > maxSize) {
            throw limitError('zstd', maxSize, undefined);
        }
        return decompressed;
    },
};

export const DEFAULT_ADAPTERS: readonly CodecAdapter[] = [GzipAdapter, BrotliAdapter, ZstdAdapter];
