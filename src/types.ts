import type { Writable } from 'node:stream';
import type { CodecId } from './codecs/meta.js';

/**
 * Optional logging hook. Components never write to the console themselves;
 * each level is optional and a missing hook means silence.
 */
export type Logger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type OutputMode = 'memory' | 'directory' | 'stream';

/**
 * What to do when a target file already exists.
 *
 * - `fail`: raise TargetAlreadyExistsError before anything is staged
 * - `replace`: atomically replace the existing file
 * - `skip`: leave the existing file in place and do not write that output
 */
export type OverwritePolicy = 'fail' | 'replace' | 'skip';

export const OVERWRITE_POLICIES: readonly OverwritePolicy[] = ['fail', 'replace', 'skip'];

export interface MemoryTarget {
    readonly mode: 'memory';
    /** Inputs above this size are rejected before any codec runs. */
    readonly maxBytesPerItem: number;
}

export interface DirectoryTarget {
    readonly mode: 'directory';
    readonly path: string;
    /** Mirror each file input's directory, relative to `sourceRoot`, under `path`. */
    readonly keepSourceStructure: boolean;
    /** Base used by keepSourceStructure. Defaults to the process working directory. */
    readonly sourceRoot: string | null;
    readonly overwrite: OverwritePolicy;
    /** Remove every output of an item published in the same call if a later one fails. */
    readonly atomicAll: boolean;
    readonly createDirs: boolean;
    /** Mode applied after rename, e.g. 0o644. */
    readonly permissions: number | null;
    /** Compress straight into temp-file sinks instead of buffering each output. */
    readonly streaming: boolean;
}

export type SinkFactory = (itemId: string, codec: CodecId) => Writable;

export interface StreamTarget {
    readonly mode: 'stream';
    readonly openSink: SinkFactory;
}

export type OutputTarget = MemoryTarget | DirectoryTarget | StreamTarget;
