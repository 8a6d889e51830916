import { COMPRESSION_PRESETS, type CompressionPreset } from '../config.js';
import { ErrorCode, InvalidConfigurationError } from '../errors.js';
import { assertCodecId, CODEC_META, validateLevel, type CodecId } from '../codecs/meta.js';

export interface AlgorithmSpec {
    readonly codec: CodecId;
    readonly level: number;
    /** An optional codec never blocks item success. */
    readonly optional: boolean;
}

export interface AlgorithmSpecInput {
    codec: CodecId;
    level?: number;
    optional?: boolean;
}

/**
 * Builds a validated spec. Level defaults to the codec's default level.
 */
export function algorithmSpec(codec: CodecId, level?: number, optional = false): AlgorithmSpec {
    const id = assertCodecId(codec);
    const resolved = level ?? CODEC_META[id].defaultLevel;
    validateLevel(id, resolved);
    return Object.freeze({ codec: id, level: resolved, optional });
}

/**
 * Immutable, ordered set of codec/level pairs, unique by codec.
 * Every level is validated at construction.
 */
export class AlgorithmSet implements Iterable<AlgorithmSpec> {
    private readonly specs: ReadonlyMap<CodecId, AlgorithmSpec>;

    private constructor(specs: ReadonlyMap<CodecId, AlgorithmSpec>) {
        this.specs = specs;
    }

    /**
     * Creates a set from typed pairs. A later entry for the same codec
     * replaces the earlier one but keeps its position.
     */
    static of(entries: ReadonlyArray<AlgorithmSpecInput | AlgorithmSpec>): AlgorithmSet {
        if (entries.length === 0) {
            throw new InvalidConfigurationError('At least one algorithm required', ErrorCode.EMPTY_ALGORITHMS);
        }

        const specs = new Map<CodecId, AlgorithmSpec>();
        for (const entry of entries) {
            const spec = algorithmSpec(entry.codec, entry.level, entry.optional ?? false);
            specs.set(spec.codec, spec);
        }
        return new AlgorithmSet(specs);
    }

    static single(codec: CodecId, level?: number): AlgorithmSet {
        return AlgorithmSet.of([{ codec, level }]);
    }

    /** gzip, brotli and zstd at their default levels. */
    static defaults(): AlgorithmSet {
        return AlgorithmSet.of([{ codec: 'gzip' }, { codec: 'br' }, { codec: 'zstd' }]);
    }

    static fromPreset(preset: CompressionPreset): AlgorithmSet {
        const pairs = COMPRESSION_PRESETS[preset];
        if (!pairs) {
            throw new InvalidConfigurationError(`Unknown preset: ${String(preset)}`, ErrorCode.INVALID_ALGORITHM_SPEC);
        }
        return AlgorithmSet.of(pairs.map(([codec, level]) => ({ codec, level })));
    }

    /**
     * Returns a new set where `other` wins on conflict. Codecs already present
     * keep their position; new codecs are appended in `other`'s order.
     */
    merge(other: AlgorithmSet): AlgorithmSet {
        const merged = new Map(this.specs);
        for (const spec of other) merged.set(spec.codec, spec);
        return new AlgorithmSet(merged);
    }

    /** Returns a copy with `codec` marked optional (or required). */
    withOptional(codec: CodecId, optional = true): AlgorithmSet {
        const current = this.specs.get(codec);
        if (!current) {
            throw new InvalidConfigurationError(`Algorithm not in set: ${codec}`, ErrorCode.INVALID_ALGORITHM_SPEC, { codec });
        }
        const next = new Map(this.specs);
        next.set(codec, Object.freeze({ ...current, optional }));
        return new AlgorithmSet(next);
    }

    has(codec: CodecId): boolean {
        return this.specs.has(codec);
    }

    get(codec: CodecId): AlgorithmSpec | undefined {
        return this.specs.get(codec);
    }

    levelOf(codec: CodecId): number {
        const spec = this.specs.get(codec);
        if (!spec) {
            throw new InvalidConfigurationError(`Algorithm not in set: ${codec}`, ErrorCode.INVALID_ALGORITHM_SPEC, { codec });
        }
        return spec.level;
    }

    codecs(): CodecId[] {
        return [...this.specs.keys()];
    }

    requiredCodecs(): CodecId[] {
        return [...this.specs.values()].filter((s) => !s.optional).map((s) => s.codec);
    }

    get size(): number {
        return this.specs.size;
    }

    toArray(): AlgorithmSpec[] {
        return [...this.specs.values()];
    }

    [Symbol.iterator](): Iterator<AlgorithmSpec> {
        return this.specs.values();
    }
}
