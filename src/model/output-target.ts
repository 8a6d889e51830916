import { DEFAULT_MEMORY_LIMIT_BYTES } from '../config.js';
import { ErrorCode, InvalidConfigurationError } from '../errors.js';
import {
    OVERWRITE_POLICIES,
    type DirectoryTarget,
    type MemoryTarget,
    type OverwritePolicy,
    type SinkFactory,
    type StreamTarget,
} from '../types.js';

export function inMemory(maxBytesPerItem: number = DEFAULT_MEMORY_LIMIT_BYTES): MemoryTarget {
    if (!Number.isInteger(maxBytesPerItem) || maxBytesPerItem <= 0) {
        throw new InvalidConfigurationError(
            `maxBytesPerItem must be a positive integer for in-memory output, got ${String(maxBytesPerItem)}`,
            ErrorCode.INVALID_PAYLOAD,
            { limit: maxBytesPerItem },
        );
    }
    const target: MemoryTarget = { mode: 'memory', maxBytesPerItem };
    return Object.freeze(target);
}

export interface DirectoryTargetOptions {
    keepSourceStructure?: boolean;
    sourceRoot?: string | null;
    overwrite?: OverwritePolicy;
    atomicAll?: boolean;
    createDirs?: boolean;
    permissions?: number | null;
    streaming?: boolean;
}

/**
 * Directory output. Defaults: fail on existing targets, all-or-nothing per
 * item, create missing directories.
 */
export function toDirectory(dir: string, options: DirectoryTargetOptions = {}): DirectoryTarget {
    if (typeof dir !== 'string' || dir.trim() === '') {
        throw new InvalidConfigurationError('Directory required for directory output', ErrorCode.INVALID_PAYLOAD);
    }
    const overwrite = options.overwrite ?? 'fail';
    if (!OVERWRITE_POLICIES.includes(overwrite)) {
        throw new InvalidConfigurationError(`Invalid overwrite policy: ${String(overwrite)}`, ErrorCode.INVALID_PAYLOAD);
    }
    const permissions = options.permissions ?? null;
    if (permissions !== null && (!Number.isInteger(permissions) || permissions < 0 || permissions > 0o7777)) {
        throw new InvalidConfigurationError(`Invalid permissions: ${String(permissions)}`, ErrorCode.INVALID_PAYLOAD);
    }

    const target: DirectoryTarget = {
        mode: 'directory',
        path: dir,
        keepSourceStructure: options.keepSourceStructure ?? false,
        sourceRoot: options.sourceRoot ?? null,
        overwrite,
        atomicAll: options.atomicAll ?? true,
        createDirs: options.createDirs ?? true,
        permissions,
        streaming: options.streaming ?? false,
    };
    return Object.freeze(target);
}

/**
 * Stream output. `openSink` is called once per item and codec; the batch
 * ends every sink it opened once the item is done.
 */
export function toStream(openSink: SinkFactory): StreamTarget {
    if (typeof openSink !== 'function') {
        throw new InvalidConfigurationError('Stream output requires a sink factory', ErrorCode.INVALID_PAYLOAD);
    }
    const target: StreamTarget = { mode: 'stream', openSink };
    return Object.freeze(target);
}
