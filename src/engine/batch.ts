import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { CodecId } from '../codecs/meta.js';
import { loadRuntimeConfig, type RuntimeConfig } from '../config.js';
import {
    CompressionError,
    ErrorCode,
    InvalidConfigurationError,
    WriteFailedError,
} from '../errors.js';
import { FileInput, type CompressionInput } from '../model/input.js';
import type { ItemConfig } from '../model/item-config.js';
import { inMemory } from '../model/output-target.js';
import { AtomicOutputWriter, type WriteAllOptions } from '../output/atomic-writer.js';
import { BatchResult } from '../results/batch-result.js';
import { ItemResult, type CodecSuccess } from '../results/item-result.js';
import type { DirectoryTarget, Logger, MemoryTarget, OutputTarget, StreamTarget } from '../types.js';
import { CompressionOrchestrator } from './orchestrator.js';
import { mapBounded } from './worker-pool.js';

function loadExtensionList(file: URL): readonly string[] {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (!Array.isArray(parsed)) throw new Error(`Expected a JSON array in ${file.pathname}`);
    const list: string[] = [];
    for (const entry of parsed) {
        if (typeof entry !== 'string') throw new Error(`Expected only strings in ${file.pathname}`);
        list.push(entry.toLowerCase());
    }
    return Object.freeze(list);
}

/** Extensions of formats that are already compressed (images, fonts, media, archives). */
export const PRECOMPRESSED_EXTENSIONS: readonly string[] = loadExtensionList(
    new URL('../../data/precompressed-extensions.json', import.meta.url),
);

export type ConfigResolver = (id: string) => ItemConfig | undefined;

export interface BatchRunOptions {
    /** Defaults to in-memory output with the runtime memory limit. */
    output?: OutputTarget;
    /** Items compressed in parallel. Defaults to the runtime concurrency. */
    concurrency?: number;
    /** File inputs with these extensions (no dot, any case) are left out of the run. */
    skipExtensions?: readonly string[];
}

export interface BatchCoordinatorOptions {
    orchestrator?: CompressionOrchestrator;
    writer?: AtomicOutputWriter;
    runtime?: RuntimeConfig;
    logger?: Logger | null;
}

function extensionOf(filePath: string): string {
    return path.extname(filePath).slice(1).toLowerCase();
}

function asWriteError(err: unknown, itemId: string): CompressionError {
    if (err instanceof CompressionError) return err;
    const detail = err instanceof Error ? err.message : String(err);
    return new WriteFailedError(`Failed to write output for ${itemId}: ${detail}`, { itemId }, err);
}

/**
 * Runs a batch of inputs through the orchestrator and hands outputs to the
 * chosen target. Items are independent; results come back in input order
 * whatever order they finish in.
 *
 * Under `failFast` the first item-level error stops the run and is thrown;
 * no partial BatchResult is returned. Outputs already published for other
 * items stay where they are.
 */
export class BatchCoordinator {
    private readonly orchestrator: CompressionOrchestrator;
    private readonly writer: AtomicOutputWriter;
    private readonly runtime: RuntimeConfig;
    private readonly logger: Logger | null;

    constructor(options: BatchCoordinatorOptions = {}) {
        this.logger = options.logger ?? null;
        this.orchestrator = options.orchestrator ?? new CompressionOrchestrator({ logger: this.logger });
        this.writer = options.writer ?? new AtomicOutputWriter({ logger: this.logger });
        this.runtime = options.runtime ?? loadRuntimeConfig(process.env, this.logger);
    }

    async run(
        inputs: readonly CompressionInput[],
        configFor: ConfigResolver,
        failFast: boolean,
        options: BatchRunOptions = {},
    ): Promise<BatchResult> {
        if (inputs.length === 0) {
            throw new InvalidConfigurationError('No inputs to compress', ErrorCode.NO_ITEMS);
        }

        const seen = new Set<string>();
        for (const input of inputs) {
            if (seen.has(input.id)) {
                throw new InvalidConfigurationError(`Duplicate input id: ${input.id}`, ErrorCode.DUPLICATE_IDENTIFIER, { itemId: input.id });
            }
            seen.add(input.id);
        }

        const selected = this.filterByExtension(inputs, options.skipExtensions ?? []);
        const configs = selected.map((input) => {
            const config = configFor(input.id);
            if (!config) {
                throw new InvalidConfigurationError(`No configuration for input ${input.id}`, ErrorCode.INVALID_ALGORITHM_SPEC, { itemId: input.id });
            }
            return config;
        });

        const output = options.output ?? inMemory(this.runtime.memoryLimitBytes);
        const concurrency = options.concurrency ?? this.runtime.concurrency;
        this.logger?.info?.(`[batch] Compressing ${selected.length} of ${inputs.length} items to ${output.mode}, concurrency ${concurrency}`);

        const results = await mapBounded(selected, concurrency, (input, index) => this.processItem(input, configs[index], failFast, output));

        const batch = new BatchResult(results);
        this.logger?.info?.(`[batch] ${batch.size} items, ${batch.successes().length} succeeded, ${batch.failures().length} failed`);
        return batch;
    }

    private filterByExtension(inputs: readonly CompressionInput[], skip: readonly string[]): CompressionInput[] {
        if (skip.length === 0) return [...inputs];
        const skipped = new Set(skip.map((ext) => ext.replace(/^\./, '').toLowerCase()));
        return inputs.filter((input) => {
            if (!(input instanceof FileInput)) return true;
            if (!skipped.has(extensionOf(input.path))) return true;
            this.logger?.debug?.(`[batch] Skipping ${input.path}`);
            return false;
        });
    }

    private processItem(input: CompressionInput, config: ItemConfig, failFast: boolean, output: OutputTarget): Promise<ItemResult> {
        switch (output.mode) {
            case 'memory':
                return this.toMemory(input, config, failFast, output);
            case 'directory':
                return output.streaming ? this.toDirectoryStreaming(input, config, failFast, output) : this.toDirectory(input, config, failFast, output);
            case 'stream':
                return this.toStream(input, config, failFast, output);
        }
    }

    private toMemory(input: CompressionInput, config: ItemConfig, failFast: boolean, output: MemoryTarget): Promise<ItemResult> {
        return this.orchestrator.compressItem(input, config, failFast, {
            outputMode: 'memory',
            maxInMemoryBytes: output.maxBytesPerItem,
        });
    }

    private async toDirectory(input: CompressionInput, config: ItemConfig, failFast: boolean, output: DirectoryTarget): Promise<ItemResult> {
        const result = await this.orchestrator.compressItem(input, config, failFast, { outputMode: 'directory' });
        if (result.itemError) return result;

        const entries = [...result.perCodec.values()]
            .filter((o): o is CodecSuccess => o.ok)
            .flatMap((o) => (o.data === null ? [] : [{ codec: o.codec, data: o.data }]));
        if (entries.length === 0) return result;

        try {
            const paths = await this.writer.writeAll(this.destinationFor(input, output), this.basenameOf(input), entries, writeOptions(output));
            return result.withPublishedPaths(paths, true);
        } catch (err) {
            const error = asWriteError(err, input.id);
            if (failFast) throw error;
            this.logger?.warn?.(`[batch] ${input.id}: ${error.message}`);
            return result.withItemError(error);
        }
    }

    private async toDirectoryStreaming(
        input: CompressionInput,
        config: ItemConfig,
        failFast: boolean,
        output: DirectoryTarget,
    ): Promise<ItemResult> {
        const preflight = await this.orchestrator.checkItem(input, config, { outputMode: 'directory' });
        if (preflight.error) {
            if (failFast) throw preflight.error;
            return ItemResult.failed(input.id, preflight.originalSize, preflight.error);
        }

        const produced: { result: ItemResult | null } = { result: null };
        try {
            const paths = await this.writer.writeAllWithSinks(
                this.destinationFor(input, output),
                this.basenameOf(input),
                config.algorithms.codecs(),
                writeOptions(output),
                async (sinks) => {
                    produced.result = await this.orchestrator.compressItemInto(input, config, failFast, sinks, { outputMode: 'directory' });
                },
            );
            if (!produced.result) throw new WriteFailedError(`No output produced for ${input.id}`, { itemId: input.id });
            return produced.result.withPublishedPaths(paths);
        } catch (err) {
            const error = asWriteError(err, input.id);
            if (failFast) throw error;
            this.logger?.warn?.(`[batch] ${input.id}: ${error.message}`);
            return produced.result ? produced.result.withItemError(error) : ItemResult.failed(input.id, preflight.originalSize, error);
        }
    }

    /**
     * Sinks come from the target's factory, one per codec. Every sink opened
     * here is ended here, after the item is done; a sink destroyed because
     * its codec failed is left as is.
     */
    private async toStream(input: CompressionInput, config: ItemConfig, failFast: boolean, output: StreamTarget): Promise<ItemResult> {
        const preflight = await this.orchestrator.checkItem(input, config, { outputMode: 'stream' });
        if (preflight.error) {
            if (failFast) throw preflight.error;
            return ItemResult.failed(input.id, preflight.originalSize, preflight.error);
        }

        const sinks = new Map<CodecId, Writable>();
        try {
            for (const codec of config.algorithms.codecs()) sinks.set(codec, output.openSink(input.id, codec));
        } catch (err) {
            for (const sink of sinks.values()) sink.destroy();
            const error = asWriteError(err, input.id);
            if (failFast) throw error;
            return ItemResult.failed(input.id, preflight.originalSize, error);
        }

        let result: ItemResult;
        try {
            result = await this.orchestrator.compressItemInto(input, config, failFast, sinks, { outputMode: 'stream' });
        } catch (err) {
            for (const sink of sinks.values()) sink.destroy();
            throw err;
        }

        try {
            await Promise.all(
                [...sinks.values()].filter((sink) => !sink.destroyed).map(async (sink) => {
                    sink.end();
                    await finished(sink);
                }),
            );
        } catch (err) {
            const error = asWriteError(err, input.id);
            if (failFast) throw error;
            return result.withItemError(error);
        }
        return result;
    }

    private basenameOf(input: CompressionInput): string {
        return input instanceof FileInput ? input.basename : input.id;
    }

    /**
     * Target directory for an item. With keepSourceStructure, a file input's
     * directory relative to the source root is mirrored under the target;
     * files outside the source root go to the target directory itself.
     */
    private destinationFor(input: CompressionInput, output: DirectoryTarget): string {
        if (!output.keepSourceStructure || !(input instanceof FileInput)) return output.path;
        const root = path.resolve(output.sourceRoot ?? process.cwd());
        const relative = path.relative(root, path.dirname(input.path));
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return output.path;
        return path.join(output.path, relative);
    }
}

function writeOptions(output: DirectoryTarget): WriteAllOptions {
    return {
        overwrite: output.overwrite,
        atomicAll: output.atomicAll,
        createDirs: output.createDirs,
        permissions: output.permissions,
    };
}
