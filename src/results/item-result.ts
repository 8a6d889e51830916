import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { CodecId } from '../codecs/meta.js';
import { CompressionError, ErrorCode } from '../errors.js';

export interface CodecSuccess {
    readonly ok: true;
    readonly codec: CodecId;
    readonly level: number;
    readonly sizeBytes: number;
    readonly elapsedMs: number;
    /** Compressed bytes, when kept in memory. */
    readonly data: Uint8Array | null;
    /** Published file, when written to a directory. */
    readonly path: string | null;
}

export interface CodecFailure {
    readonly ok: false;
    readonly codec: CodecId;
    readonly level: number;
    readonly elapsedMs: number;
    readonly error: CompressionError;
}

export type CodecOutcome = CodecSuccess | CodecFailure;

/**
 * - `ok`: every attempted codec produced output
 * - `partial`: some codecs produced output, some failed
 * - `failed`: item-level error, or nothing produced
 */
export type ItemStatus = 'ok' | 'partial' | 'failed';

export const ITEM_ERROR_KEY = '_item';

export interface SettleArgs {
    id: string;
    originalSize: number;
    outcomes: Iterable<CodecOutcome>;
    requiredCodecs: readonly CodecId[];
    itemError?: CompressionError | null;
}

function notFound(id: string, codec: CodecId, what: string): CompressionError {
    return new CompressionError(`No ${what} for algorithm ${codec} in item ${id}`, ErrorCode.ITEM_NOT_FOUND, { codec, itemId: id });
}

/**
 * Outcome of compressing one item. The result and its outcomes are frozen;
 * `data` and `load` hand out copies, since typed arrays cannot be frozen.
 * Bytes reached through `outcome()` or `perCodec` are the stored buffers.
 */
export class ItemResult {
    readonly id: string;
    readonly originalSize: number;
    readonly success: boolean;
    readonly status: ItemStatus;
    readonly perCodec: ReadonlyMap<CodecId, CodecOutcome>;
    readonly itemError: CompressionError | null;
    private readonly requiredCodecs: readonly CodecId[];

    private constructor(args: SettleArgs) {
        const perCodec = new Map<CodecId, CodecOutcome>();
        for (const outcome of args.outcomes) perCodec.set(outcome.codec, Object.freeze(outcome));

        const itemError = args.itemError ?? null;
        const succeeded = [...perCodec.values()].filter((o) => o.ok).length;
        const requiredOk = args.requiredCodecs.every((codec) => perCodec.get(codec)?.ok === true);

        this.id = args.id;
        this.originalSize = args.originalSize;
        this.perCodec = perCodec;
        this.itemError = itemError;
        this.requiredCodecs = [...args.requiredCodecs];
        this.success = itemError === null && succeeded > 0 && requiredOk;

        if (itemError !== null || succeeded === 0) {
            this.status = 'failed';
        } else if (succeeded === perCodec.size) {
            this.status = 'ok';
        } else {
            this.status = 'partial';
        }
        Object.freeze(this);
    }

    /**
     * Builds a result from per-codec outcomes. `success` is true iff there is
     * no item-level error, at least one codec produced output, and every
     * required codec produced output.
     */
    static settle(args: SettleArgs): ItemResult {
        return new ItemResult(args);
    }

    /** Whole-item failure, no codec attempted. */
    static failed(id: string, originalSize: number, error: CompressionError): ItemResult {
        return new ItemResult({ id, originalSize, outcomes: [], requiredCodecs: [], itemError: error });
    }

    /**
     * Attaches published file paths. With `dropData`, in-memory bytes of the
     * published codecs are released.
     */
    withPublishedPaths(paths: ReadonlyMap<CodecId, string>, dropData = false): ItemResult {
        const outcomes = [...this.perCodec.values()].map((o): CodecOutcome => {
            if (!o.ok) return o;
            const published = paths.get(o.codec);
            if (published === undefined) return o;
            return { ...o, path: published, data: dropData ? null : o.data };
        });
        return new ItemResult({
            id: this.id,
            originalSize: this.originalSize,
            outcomes,
            requiredCodecs: this.requiredCodecs,
            itemError: this.itemError,
        });
    }

    /** Same outcomes, marked as failed by an item-level error (e.g. a failed write). */
    withItemError(error: CompressionError): ItemResult {
        return new ItemResult({
            id: this.id,
            originalSize: this.originalSize,
            outcomes: this.perCodec.values(),
            requiredCodecs: this.requiredCodecs,
            itemError: error,
        });
    }

    isOk(): boolean {
        return this.success && this.status === 'ok';
    }

    has(codec: CodecId): boolean {
        return this.perCodec.get(codec)?.ok === true;
    }

    outcome(codec: CodecId): CodecOutcome | undefined {
        return this.perCodec.get(codec);
    }

    private successFor(codec: CodecId): CodecSuccess {
        const outcome = this.perCodec.get(codec);
        if (!outcome || !outcome.ok) throw notFound(this.id, codec, 'output');
        return outcome;
    }

    /** In-memory compressed bytes. Throws when the codec failed or output lives only on disk. */
    data(codec: CodecId): Uint8Array {
        const outcome = this.successFor(codec);
        if (outcome.data === null) throw notFound(this.id, codec, 'in-memory data');
        return outcome.data.slice();
    }

    /** Compressed bytes from memory, or read back from the published file. */
    async load(codec: CodecId): Promise<Uint8Array> {
        const outcome = this.successFor(codec);
        if (outcome.data !== null) return outcome.data.slice();
        if (outcome.path !== null) return new Uint8Array(await fs.readFile(outcome.path));
        throw notFound(this.id, codec, 'data or path');
    }

    openStream(codec: CodecId): Readable {
        const outcome = this.successFor(codec);
        if (outcome.data !== null) return Readable.from([Buffer.from(outcome.data)]);
        if (outcome.path !== null) return createReadStream(outcome.path);
        throw notFound(this.id, codec, 'data or path');
    }

    /** Yields the in-memory output in slices of at most `chunkSize` bytes. */
    *chunks(codec: CodecId, chunkSize: number = 8192): Generator<Uint8Array> {
        const data = this.data(codec);
        for (let offset = 0; offset < data.byteLength; offset += chunkSize) {
            yield data.subarray(offset, offset + chunkSize);
        }
    }

    path(codec: CodecId): string | null {
        return this.successFor(codec).path;
    }

    size(codec: CodecId): number {
        return this.successFor(codec).sizeBytes;
    }

    /**
     * compressed / original. Below 1.0 means the codec saved space.
     * Empty originals report 0.
     */
    ratio(codec: CodecId): number {
        if (this.originalSize === 0) return 0;
        return this.size(codec) / this.originalSize;
    }

    elapsedMs(codec: CodecId): number {
        return this.perCodec.get(codec)?.elapsedMs ?? 0;
    }

    error(codec: CodecId): CompressionError | null {
        const outcome = this.perCodec.get(codec);
        return outcome && !outcome.ok ? outcome.error : null;
    }

    /** All errors keyed by codec, plus the item-level error under `_item`. */
    errors(): Map<string, CompressionError> {
        const errors = new Map<string, CompressionError>();
        if (this.itemError) errors.set(ITEM_ERROR_KEY, this.itemError);
        for (const outcome of this.perCodec.values()) {
            if (!outcome.ok) errors.set(outcome.codec, outcome.error);
        }
        return errors;
    }

    /** First error explaining why the item did not succeed, if it did not. */
    failureReason(): CompressionError | null {
        if (this.success) return null;
        if (this.itemError) return this.itemError;
        for (const codec of this.requiredCodecs) {
            const err = this.error(codec);
            if (err) return err;
        }
        for (const err of this.errors().values()) return err;
        return null;
    }
}
