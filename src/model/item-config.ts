import type { CompressionPreset } from '../config.js';
import { ErrorCode, InvalidConfigurationError } from '../errors.js';
import { AlgorithmSet } from './algorithm-set.js';

/**
 * Per-item compression settings. Immutable; safe to share across items and
 * concurrent runs.
 */
export class ItemConfig {
    readonly algorithms: AlgorithmSet;
    /** Inputs larger than this fail as a whole, before any codec runs. */
    readonly maxBytes: number | null;

    constructor(algorithms: AlgorithmSet, maxBytes: number | null = null) {
        if (maxBytes !== null && (!Number.isInteger(maxBytes) || maxBytes < 0)) {
            throw new InvalidConfigurationError(
                `maxBytes must be a non-negative integer, got ${String(maxBytes)}`,
                ErrorCode.INVALID_PAYLOAD,
                { limit: maxBytes },
            );
        }
        this.algorithms = algorithms;
        this.maxBytes = maxBytes;
        Object.freeze(this);
    }

    static defaults(maxBytes: number | null = null): ItemConfig {
        return new ItemConfig(AlgorithmSet.defaults(), maxBytes);
    }

    static fromPreset(preset: CompressionPreset, maxBytes: number | null = null): ItemConfig {
        return new ItemConfig(AlgorithmSet.fromPreset(preset), maxBytes);
    }

    withMaxBytes(maxBytes: number | null): ItemConfig {
        return new ItemConfig(this.algorithms, maxBytes);
    }

    withAlgorithms(algorithms: AlgorithmSet): ItemConfig {
        return new ItemConfig(algorithms, this.maxBytes);
    }
}
