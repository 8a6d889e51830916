import type { CodecId } from './codecs/meta.js';
import { CodecRegistry } from './codecs/registry.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config.js';
import { BatchCoordinator, PRECOMPRESSED_EXTENSIONS } from './engine/batch.js';
import { CompressionOrchestrator } from './engine/orchestrator.js';
import { AlgorithmSet } from './model/algorithm-set.js';
import type { CompressionInput } from './model/input.js';
import { ItemConfig } from './model/item-config.js';
import { AtomicOutputWriter } from './output/atomic-writer.js';
import type { BatchResult } from './results/batch-result.js';
import type { ItemResult } from './results/item-result.js';
import type { Logger, OutputTarget, OverwritePolicy } from './types.js';

export interface CompressBatchOptions {
    inputs: readonly CompressionInput[];
    /** Used for every input without an entry in `configs`. */
    config?: ItemConfig;
    configs?: ReadonlyMap<string, ItemConfig>;
    output?: OutputTarget;
    /** Default true. */
    failFast?: boolean;
    concurrency?: number;
    skipExtensions?: readonly string[];
    /** Adds PRECOMPRESSED_EXTENSIONS to `skipExtensions`. */
    skipAlreadyCompressed?: boolean;
    registry?: CodecRegistry;
    runtime?: RuntimeConfig;
    logger?: Logger | null;
}

export interface CompressOneOptions {
    input: CompressionInput;
    codec: CodecId;
    level?: number;
    registry?: CodecRegistry;
    logger?: Logger | null;
}

export interface CompressToFileOptions extends CompressOneOptions {
    path: string;
    /** Default `replace`. */
    overwrite?: OverwritePolicy;
    createDirs?: boolean;
    permissions?: number | null;
}

/**
 * Compresses a batch of inputs. Per-item configs win over the default config;
 * an input with neither is rejected before anything runs.
 */
export async function compressBatch(options: CompressBatchOptions): Promise<BatchResult> {
    const logger = options.logger ?? null;
    const coordinator = new BatchCoordinator({
        orchestrator: new CompressionOrchestrator({ registry: options.registry, logger }),
        writer: new AtomicOutputWriter({ logger }),
        runtime: options.runtime ?? loadRuntimeConfig(process.env, logger),
        logger,
    });

    const skip = [...(options.skipExtensions ?? []), ...(options.skipAlreadyCompressed ? PRECOMPRESSED_EXTENSIONS : [])];
    const configFor = (id: string): ItemConfig | undefined => options.configs?.get(id) ?? options.config;

    return coordinator.run(options.inputs, configFor, options.failFast ?? true, {
        output: options.output,
        concurrency: options.concurrency,
        skipExtensions: skip,
    });
}

/**
 * One input, one codec, output in memory. Errors are thrown.
 */
export async function compressOne(options: CompressOneOptions): Promise<ItemResult> {
    const orchestrator = new CompressionOrchestrator({ registry: options.registry, logger: options.logger });
    const config = new ItemConfig(AlgorithmSet.single(options.codec, options.level));
    return orchestrator.compressItem(options.input, config, true, {
        outputMode: 'memory',
        maxInMemoryBytes: loadRuntimeConfig(process.env, options.logger).memoryLimitBytes,
    });
}

/**
 * Compresses one input with a single codec and writes the output atomically
 * to `path`. Returns the written path, or null when `skip` left an existing
 * file in place.
 */
export async function compressToFile(options: CompressToFileOptions): Promise<string | null> {
    const result = await compressOne(options);
    const writer = new AtomicOutputWriter({ logger: options.logger });
    return writer.writeOne(options.path, result.data(options.codec), {
        overwrite: options.overwrite ?? 'replace',
        createDirs: options.createDirs ?? true,
        permissions: options.permissions ?? null,
    });
}

/** Codecs usable right now, in default priority order. */
export function availableCodecs(registry: CodecRegistry = CodecRegistry.defaults()): CodecId[] {
    return registry.available();
}
