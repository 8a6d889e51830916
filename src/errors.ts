/**
 * Machine-readable error codes. Values are stable across releases.
 */
export enum ErrorCode {
    UNKNOWN_ALGORITHM = 1001,
    ALGORITHM_UNAVAILABLE = 1002,
    LEVEL_OUT_OF_RANGE = 1003,
    FILE_NOT_FOUND = 1004,
    FILE_NOT_READABLE = 1005,
    PAYLOAD_TOO_LARGE = 1006,
    COMPRESSION_FAILED = 1007,
    DECOMPRESSION_FAILED = 1008,
    DUPLICATE_IDENTIFIER = 1009,
    ITEM_NOT_FOUND = 1010,
    INVALID_ALGORITHM_SPEC = 1011,
    EMPTY_ALGORITHMS = 1012,
    INVALID_PAYLOAD = 1013,
    NO_ITEMS = 1014,
    INVALID_LEVEL_TYPE = 1015,
    TARGET_EXISTS = 1016,
    WRITE_FAILED = 1017,
    UNSUPPORTED_OUTPUT_MODE = 1018,
}

export interface ErrorContext {
    path?: string;
    bytesToWrite?: number;
    directoryWritable?: boolean;
    codec?: string;
    itemId?: string;
    limit?: number;
    size?: number;
    basename?: string;
}

export class CompressionError extends Error {
    readonly code: ErrorCode;
    readonly context: Readonly<ErrorContext>;

    constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'CompressionError';
        this.code = code;
        this.context = Object.freeze({ ...context });
    }

    get path(): string | undefined {
        return this.context.path;
    }
}

/** Input is larger than the configured ceiling. */
export class PayloadTooLargeError extends CompressionError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorCode.PAYLOAD_TOO_LARGE, context);
        this.name = 'PayloadTooLargeError';
    }
}

export class CodecUnavailableError extends CompressionError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorCode.ALGORITHM_UNAVAILABLE, context);
        this.name = 'CodecUnavailableError';
    }
}

export class CompressionFailedError extends CompressionError {
    constructor(message: string, context: ErrorContext = {}, cause?: unknown, code: ErrorCode = ErrorCode.COMPRESSION_FAILED) {
        super(message, code, context, cause);
        this.name = 'CompressionFailedError';
    }
}

export class TargetAlreadyExistsError extends CompressionError {
    constructor(target: string) {
        super(`Target already exists: ${target}`, ErrorCode.TARGET_EXISTS, { path: target });
        this.name = 'TargetAlreadyExistsError';
    }
}

export class WriteFailedError extends CompressionError {
    constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
        super(message, ErrorCode.WRITE_FAILED, context, cause);
        this.name = 'WriteFailedError';
    }
}

/**
 * Programmer error detected while building configuration or inputs.
 * Always thrown, regardless of fail-fast mode.
 */
export class InvalidConfigurationError extends CompressionError {
    constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
        super(message, code, context);
        this.name = 'InvalidConfigurationError';
    }
}

export class UnsupportedOutputModeError extends CompressionError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorCode.UNSUPPORTED_OUTPUT_MODE, context);
        this.name = 'UnsupportedOutputModeError';
    }
}

export function isCompressionError(value: unknown, code?: ErrorCode): value is CompressionError {
    if (!(value instanceof CompressionError)) return false;
    return code === undefined || value.code === code;
}

/**
 * Normalizes anything thrown by a codec or stream into a CompressionError.
 */
export function toCompressionError(error: unknown, fallbackMessage: string, context: ErrorContext = {}): CompressionError {
    if (error instanceof CompressionError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new CompressionFailedError(`${fallbackMessage}: ${detail}`, context, error);
}

export function errnoCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    const maybeErrno: NodeJS.ErrnoException = error;
    return maybeErrno.code;
}
