/**
 * tricodec public API
 *
 * @module tricodec
 */

import { availableCodecs, compressBatch, compressOne, compressToFile } from './api.js';
import { negotiate } from './negotiate/accept-encoding.js';
import { AlgorithmSet } from './model/algorithm-set.js';
import { ItemConfig } from './model/item-config.js';
import { BufferInput, FileInput, fileInputs } from './model/input.js';
import { inMemory, toDirectory, toStream } from './model/output-target.js';

export { availableCodecs, compressBatch, compressOne, compressToFile } from './api.js';
export type { CompressBatchOptions, CompressOneOptions, CompressToFileOptions } from './api.js';

export { CODEC_IDS, CODEC_META, codecForContentEncoding, isCodecId } from './codecs/meta.js';
export type { CodecId, CodecMeta } from './codecs/meta.js';
export { BrotliAdapter, DEFAULT_ADAPTERS, GzipAdapter, ZstdAdapter } from './codecs/adapters.js';
export type { CodecAdapter } from './codecs/adapters.js';
export { CodecRegistry } from './codecs/registry.js';

export { COMPRESSION_PRESETS, DEFAULT_CONCURRENCY, DEFAULT_MEMORY_LIMIT_BYTES, loadRuntimeConfig } from './config.js';
export type { CompressionPreset, RuntimeConfig } from './config.js';

export {
    CodecUnavailableError,
    CompressionError,
    CompressionFailedError,
    ErrorCode,
    InvalidConfigurationError,
    PayloadTooLargeError,
    TargetAlreadyExistsError,
    UnsupportedOutputModeError,
    WriteFailedError,
    isCompressionError,
} from './errors.js';
export type { ErrorContext } from './errors.js';

export { AlgorithmSet, algorithmSpec } from './model/algorithm-set.js';
export type { AlgorithmSpec, AlgorithmSpecInput } from './model/algorithm-set.js';
export { ItemConfig } from './model/item-config.js';
export { BufferInput, FileInput, fileInputs } from './model/input.js';
export type { CompressionInput, InputKind } from './model/input.js';
export { inMemory, toDirectory, toStream } from './model/output-target.js';
export type { DirectoryTargetOptions } from './model/output-target.js';

export { CompressionOrchestrator } from './engine/orchestrator.js';
export type { CompressItemOptions, OrchestratorOptions, PreflightResult } from './engine/orchestrator.js';
export { BatchCoordinator, PRECOMPRESSED_EXTENSIONS } from './engine/batch.js';
export type { BatchCoordinatorOptions, BatchRunOptions, ConfigResolver } from './engine/batch.js';
export { AtomicOutputWriter } from './output/atomic-writer.js';
export type { AtomicWriterOptions, FsyncMode, OutputEntry, WriteAllOptions, WriteOptions } from './output/atomic-writer.js';

export { negotiate, parseAcceptEncoding } from './negotiate/accept-encoding.js';
export type { EncodingPreference } from './negotiate/accept-encoding.js';

export { ItemResult, ITEM_ERROR_KEY } from './results/item-result.js';
export type { CodecFailure, CodecOutcome, CodecSuccess, ItemStatus } from './results/item-result.js';
export { BatchResult } from './results/batch-result.js';
export { codecStats, percentile, summarize } from './results/summary.js';
export type { BatchSummary, CodecStats } from './results/summary.js';

export type {
    DirectoryTarget,
    Logger,
    MemoryTarget,
    OutputMode,
    OutputTarget,
    OverwritePolicy,
    SinkFactory,
    StreamTarget,
} from './types.js';

// The tricodec namespace object
export const Tricodec = {
    /** Compresses a batch of inputs. */
    compress: compressBatch,

    /** One input, one codec, in memory. */
    compressOne,

    /** One input, one codec, atomically written to a file. */
    compressToFile,

    /** Picks a codec for an Accept-Encoding header. */
    negotiate,

    availableCodecs,

    input: {
        data: (data: Uint8Array | string, id?: string): BufferInput => (id === undefined ? BufferInput.of(data) : new BufferInput(id, data)),
        file: (path: string, id?: string): FileInput => (id === undefined ? FileInput.of(path) : new FileInput(id, path)),
        files: fileInputs,
    },

    output: {
        inMemory,
        toDirectory,
        toStream,
    },

    AlgorithmSet,
    ItemConfig,
};

export default Tricodec;
