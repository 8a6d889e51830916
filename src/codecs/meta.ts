import { ErrorCode, InvalidConfigurationError } from '../errors.js';

export type CodecId = 'gzip' | 'br' | 'zstd';

/** Default priority order: stronger codecs first. */
export const CODEC_IDS: readonly CodecId[] = ['br', 'zstd', 'gzip'];

export interface CodecMeta {
    /** Output file suffix, without the dot. */
    fileExtension: string;
    /** Token used in Content-Encoding / Accept-Encoding. */
    contentEncoding: string;
    minLevel: number;
    maxLevel: number;
    defaultLevel: number;
    cpuIntensive: boolean;
    /** Library that provides the primitive. */
    requiredLibrary: string;
}

export const CODEC_META: Readonly<Record<CodecId, Readonly<CodecMeta>>> = Object.freeze({
    gzip: Object.freeze({
        fileExtension: 'gz',
        contentEncoding: 'gzip',
        minLevel: 1,
        maxLevel: 9,
        defaultLevel: 6,
        cpuIntensive: false,
        requiredLibrary: 'node:zlib',
    }),
    br: Object.freeze({
        fileExtension: 'br',
        contentEncoding: 'br',
        minLevel: 0,
        maxLevel: 11,
        defaultLevel: 4,
        cpuIntensive: true,
        requiredLibrary: 'node:zlib',
    }),
    zstd: Object.freeze({
        fileExtension: 'zst',
        contentEncoding: 'zstd',
        minLevel: 1,
        maxLevel: 22,
        defaultLevel: 3,
        cpuIntensive: true,
        requiredLibrary: 'zstd-codec',
    }),
});

export function isCodecId(value: unknown): value is CodecId {
    return value === 'gzip' || value === 'br' || value === 'zstd';
}

export function assertCodecId(value: unknown): CodecId {
    if (!isCodecId(value)) {
        throw new InvalidConfigurationError(`Unknown algorithm: ${String(value)}`, ErrorCode.UNKNOWN_ALGORITHM, {
            codec: String(value),
        });
    }
    return value;
}

/**
 * Throws unless `level` is an integer within the codec's range.
 */
export function validateLevel(codec: CodecId, level: number): void {
    const meta = CODEC_META[codec];
    if (!Number.isInteger(level)) {
        throw new InvalidConfigurationError(
            `${codec} level must be an integer, got ${String(level)}`,
            ErrorCode.INVALID_LEVEL_TYPE,
            { codec },
        );
    }
    if (level < meta.minLevel || level > meta.maxLevel) {
        throw new InvalidConfigurationError(
            `${codec} level out of range: level=${level}, allowed=[${meta.minLevel}..${meta.maxLevel}]`,
            ErrorCode.LEVEL_OUT_OF_RANGE,
            { codec },
        );
    }
}

/** Finds the codec whose Content-Encoding token matches, case-insensitively. */
export function codecForContentEncoding(token: string): CodecId | null {
    const needle = token.trim().toLowerCase();
    for (const id of CODEC_IDS) {
        if (CODEC_META[id].contentEncoding === needle) return id;
    }
    return null;
}
