import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { CodecAdapter } from '../codecs/adapters.js';
import type { CodecId } from '../codecs/meta.js';
import { CodecRegistry } from '../codecs/registry.js';
import {
    CodecUnavailableError,
    CompressionError,
    CompressionFailedError,
    PayloadTooLargeError,
    UnsupportedOutputModeError,
    WriteFailedError,
    toCompressionError,
} from '../errors.js';
import type { AlgorithmSpec } from '../model/algorithm-set.js';
import type { CompressionInput } from '../model/input.js';
import type { ItemConfig } from '../model/item-config.js';
import { ItemResult, type CodecOutcome } from '../results/item-result.js';
import type { Logger, OutputMode } from '../types.js';

export interface OrchestratorOptions {
    registry?: CodecRegistry;
    logger?: Logger | null;
}

export interface CompressItemOptions {
    /** Output mode of the surrounding run; checked against the input kind. */
    outputMode?: OutputMode;
    /** Ceiling for in-memory output, applied on top of `config.maxBytes`. */
    maxInMemoryBytes?: number | null;
}

export interface PreflightResult {
    originalSize: number;
    error: CompressionError | null;
}

/** Raised by an input's own stream, as opposed to the codec consuming it. */
class InputStreamError extends Error {
    constructor(readonly origin: unknown) {
        super(origin instanceof Error ? origin.message : String(origin));
        this.name = 'InputStreamError';
    }
}

/** Raised when a caller's sink rejects a write. */
class SinkWriteError extends Error {
    constructor(readonly origin: Error) {
        super(origin.message);
        this.name = 'SinkWriteError';
    }
}

/**
 * Re-emits `source` with its errors wrapped in InputStreamError. A rejected
 * pipeline destroys every stream with the same error, so the tag is the only
 * way to tell a failed read from a failed codec afterwards.
 */
function tagSourceErrors(source: Readable): Readable {
    async function* read(): AsyncGenerator<Buffer> {
        try {
            for await (const chunk of source) yield chunk;
        } catch (err) {
            throw new InputStreamError(err);
        }
    }
    return Readable.from(read(), { objectMode: false });
}

/**
 * Writes into `sink` without ending it, so one sink can outlive the pipeline
 * that feeds it. Counts the bytes it forwards.
 */
class SinkForwarder extends Writable {
    bytes = 0;

    constructor(private readonly sink: Writable) {
        super();
    }

    override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        // A failed or destroyed sink emits no further 'error' for later writes.
        const broken = this.sink.errored ?? (this.sink.destroyed ? new Error('Sink was destroyed') : null);
        if (broken) {
            callback(new SinkWriteError(broken));
            return;
        }
        this.bytes += chunk.byteLength;
        if (this.sink.write(chunk)) {
            callback();
            return;
        }
        const onDrain = (): void => {
            this.sink.off('error', onError);
            callback();
        };
        const onError = (error: Error): void => {
            this.sink.off('drain', onDrain);
            callback(new SinkWriteError(error));
        };
        this.sink.once('drain', onDrain);
        this.sink.once('error', onError);
    }
}

/**
 * Compresses one input with every codec of its config. Codecs run in the
 * set's order, one after the other; the input is read at most once and
 * shared between codecs that need it buffered.
 *
 * Holds no state between calls.
 */
export class CompressionOrchestrator {
    private readonly registry: CodecRegistry;
    private readonly logger: Logger | null;

    constructor(options: OrchestratorOptions = {}) {
        this.registry = options.registry ?? CodecRegistry.defaults();
        this.logger = options.logger ?? null;
    }

    /**
     * Item-level checks that run before any codec: output mode against input
     * kind, then size against `config.maxBytes` and the in-memory ceiling.
     */
    async checkItem(input: CompressionInput, config: ItemConfig, options: CompressItemOptions = {}): Promise<PreflightResult> {
        const mode = options.outputMode;
        if (mode !== undefined && !input.allowedOutputModes.includes(mode)) {
            return {
                originalSize: 0,
                error: new UnsupportedOutputModeError(`Input ${input.id} (${input.kind}) does not support output mode '${mode}'`, {
                    itemId: input.id,
                }),
            };
        }

        let originalSize: number;
        try {
            originalSize = await input.sizeBytes();
        } catch (err) {
            return { originalSize: 0, error: toCompressionError(err, `Failed to size input ${input.id}`, { itemId: input.id }) };
        }

        if (config.maxBytes !== null && originalSize > config.maxBytes) {
            return {
                originalSize,
                error: new PayloadTooLargeError(`Input ${input.id} is ${originalSize} bytes, limit is ${config.maxBytes}`, {
                    itemId: input.id,
                    size: originalSize,
                    limit: config.maxBytes,
                }),
            };
        }

        const ceiling = options.maxInMemoryBytes ?? null;
        if (ceiling !== null && originalSize > ceiling) {
            return {
                originalSize,
                error: new PayloadTooLargeError(`Input ${input.id} is ${originalSize} bytes, in-memory limit is ${ceiling}`, {
                    itemId: input.id,
                    size: originalSize,
                    limit: ceiling,
                }),
            };
        }

        return { originalSize, error: null };
    }

    /**
     * Runs every configured codec and keeps the output in memory.
     *
     * Under `failFast` the first error is thrown and the remaining codecs are
     * not attempted. Otherwise item-level errors fail the item without any
     * codec attempt, and codec errors are recorded next to the outcomes of
     * the codecs that succeeded.
     */
    async compressItem(
        input: CompressionInput,
        config: ItemConfig,
        failFast: boolean,
        options: CompressItemOptions = {},
    ): Promise<ItemResult> {
        const preflight = await this.checkItem(input, config, options);
        if (preflight.error) return this.itemFailure(input, preflight.originalSize, preflight.error, failFast);

        const { originalSize } = preflight;
        const outcomes: CodecOutcome[] = [];
        let buffered: Uint8Array | null = null;

        for (const spec of config.algorithms) {
            const started = performance.now();
            let reading = false;
            try {
                const adapter = this.adapterFor(spec.codec, input.id);
                const opened = adapter.compressStream ? input.openStream() : null;
                const streamed = opened === null ? null : tagSourceErrors(opened);

                let output: Uint8Array;
                if (streamed !== null && adapter.compressStream) {
                    output = await adapter.compressStream(streamed, spec.level);
                } else {
                    if (buffered === null) {
                        reading = true;
                        buffered = await input.readAll();
                        reading = false;
                    }
                    output = await adapter.compress(buffered, spec.level);
                }

                const elapsedMs = performance.now() - started;
                outcomes.push({ ok: true, codec: spec.codec, level: spec.level, sizeBytes: output.byteLength, elapsedMs, data: output, path: null });
                this.logger?.debug?.(`[orchestrator] ${input.id} ${spec.codec}: ${originalSize} -> ${output.byteLength} bytes in ${elapsedMs.toFixed(1)}ms`);
            } catch (err) {
                const readFailed = reading || err instanceof InputStreamError;
                const error = this.classify(err, readFailed, spec.codec, input.id);
                if (readFailed) return this.itemFailure(input, originalSize, error, failFast, outcomes, config);
                if (failFast) throw error;
                outcomes.push(this.failure(spec, started, error, input.id));
            }
        }

        return ItemResult.settle({ id: input.id, originalSize, outcomes, requiredCodecs: config.algorithms.requiredCodecs() });
    }

    /**
     * Sink variant: each codec's output goes straight into `sinks.get(codec)`.
     * Sinks are written to but never ended. A sink whose codec fails is
     * destroyed, so whoever owns it can tell partial output from complete.
     * A sink that rejects a write fails the item with WriteFailedError.
     *
     * Outcomes carry sizes only: no data, no path.
     */
    async compressItemInto(
        input: CompressionInput,
        config: ItemConfig,
        failFast: boolean,
        sinks: ReadonlyMap<CodecId, Writable>,
        options: CompressItemOptions = {},
    ): Promise<ItemResult> {
        const preflight = await this.checkItem(input, config, options);
        if (preflight.error) return this.itemFailure(input, preflight.originalSize, preflight.error, failFast);

        const { originalSize } = preflight;
        const outcomes: CodecOutcome[] = [];
        let buffered: Uint8Array | null = null;

        for (const spec of config.algorithms) {
            const started = performance.now();
            const sink = sinks.get(spec.codec);
            let reading = false;
            try {
                if (!sink) {
                    throw new CompressionFailedError(`No sink provided for ${spec.codec}`, { codec: spec.codec, itemId: input.id });
                }
                const adapter = this.adapterFor(spec.codec, input.id);
                const forwarder = new SinkForwarder(sink);

                if (adapter.createCompressStream) {
                    const opened = input.openStream();
                    let source = opened === null ? null : tagSourceErrors(opened);
                    if (source === null) {
                        if (buffered === null) {
                            reading = true;
                            buffered = await input.readAll();
                            reading = false;
                        }
                        source = Readable.from([Buffer.from(buffered)]);
                    }
                    await pipeline(source, adapter.createCompressStream(spec.level), forwarder);
                } else {
                    if (buffered === null) {
                        reading = true;
                        buffered = await input.readAll();
                        reading = false;
                    }
                    const output = await adapter.compress(buffered, spec.level);
                    await pipeline(Readable.from([Buffer.from(output)]), forwarder);
                }

                const elapsedMs = performance.now() - started;
                outcomes.push({ ok: true, codec: spec.codec, level: spec.level, sizeBytes: forwarder.bytes, elapsedMs, data: null, path: null });
                this.logger?.debug?.(`[orchestrator] ${input.id} ${spec.codec}: streamed ${forwarder.bytes} bytes in ${elapsedMs.toFixed(1)}ms`);
            } catch (err) {
                const itemLevel = reading || err instanceof InputStreamError || err instanceof SinkWriteError;
                const error =
                    err instanceof SinkWriteError
                        ? new WriteFailedError(`Failed to write output for ${input.id}: ${err.message}`, { codec: spec.codec, itemId: input.id }, err.origin)
                        : this.classify(err, itemLevel, spec.codec, input.id);
                sink?.destroy();
                if (itemLevel) return this.itemFailure(input, originalSize, error, failFast, outcomes, config);
                if (failFast) throw error;
                outcomes.push(this.failure(spec, started, error, input.id));
            }
        }

        return ItemResult.settle({ id: input.id, originalSize, outcomes, requiredCodecs: config.algorithms.requiredCodecs() });
    }

    /**
     * Registered and available adapter for `codec`. Otherwise throws
     * CodecUnavailableError.
     */
    private adapterFor(codec: CodecId, itemId: string): CodecAdapter {
        const adapter = this.registry.get(codec);
        if (!adapter) {
            throw new CodecUnavailableError(`No adapter registered for ${codec}`, { codec, itemId });
        }
        if (!adapter.isAvailable()) {
            throw new CodecUnavailableError(`Codec ${codec} is not available (requires ${adapter.meta.requiredLibrary})`, { codec, itemId });
        }
        return adapter;
    }

    /** Read failures belong to the item and carry no codec. */
    private classify(err: unknown, readFailed: boolean, codec: CodecId, itemId: string): CompressionError {
        if (!readFailed) return toCompressionError(err, `${codec} compression failed`, { codec, itemId });
        const origin = err instanceof InputStreamError ? err.origin : err;
        return toCompressionError(origin, `Failed to read input ${itemId}`, { itemId });
    }

    private failure(spec: AlgorithmSpec, started: number, error: CompressionError, itemId: string): CodecOutcome {
        this.logger?.warn?.(`[orchestrator] ${itemId} ${spec.codec} failed: ${error.message}`);
        return { ok: false, codec: spec.codec, level: spec.level, elapsedMs: performance.now() - started, error };
    }

    private itemFailure(
        input: CompressionInput,
        originalSize: number,
        error: CompressionError,
        failFast: boolean,
        outcomes: readonly CodecOutcome[] = [],
        config?: ItemConfig,
    ): ItemResult {
        if (failFast) throw error;
        this.logger?.warn?.(`[orchestrator] ${input.id} failed: ${error.message}`);
        if (outcomes.length === 0) return ItemResult.failed(input.id, originalSize, error);
        return ItemResult.settle({
            id: input.id,
            originalSize,
            outcomes,
            requiredCodecs: config?.algorithms.requiredCodecs() ?? [],
            itemError: error,
        });
    }
}
