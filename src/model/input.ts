import { accessSync, constants as fsConstants, createReadStream, realpathSync, statSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Readable } from 'node:stream';
import { CompressionFailedError, ErrorCode, InvalidConfigurationError, errnoCode } from '../errors.js';
import type { OutputMode } from '../types.js';
import { fastId, toBytes } from '../utils.js';

export type InputKind = 'buffer' | 'file';

/**
 * One item to compress. The orchestrator only borrows an input for the
 * duration of a call; it never mutates or closes anything it did not open.
 */
export interface CompressionInput {
    readonly id: string;
    readonly kind: InputKind;
    readonly allowedOutputModes: readonly OutputMode[];
    sizeBytes(): Promise<number>;
    readAll(): Promise<Uint8Array>;
    /** A fresh stream over the content, or null when the input is not stream-backed. */
    openStream(): Readable | null;
}

function requireId(id: string): string {
    if (typeof id !== 'string' || id === '') {
        throw new InvalidConfigurationError('Input id must be a non-empty string', ErrorCode.INVALID_PAYLOAD);
    }
    return id;
}

export class BufferInput implements CompressionInput {
    static readonly ALLOWED_MODES: readonly OutputMode[] = ['memory', 'stream'];

    readonly id: string;
    readonly kind = 'buffer';
    readonly allowedOutputModes = BufferInput.ALLOWED_MODES;
    private readonly data: Uint8Array;

    constructor(id: string, data: Uint8Array | string) {
        this.id = requireId(id);
        // Own copy: caller mutation after construction is not observed.
        this.data = new Uint8Array(toBytes(data));
        Object.freeze(this);
    }

    /** Id derived from the content hash. */
    static of(data: Uint8Array | string): BufferInput {
        return new BufferInput(fastId(toBytes(data)), data);
    }

    async sizeBytes(): Promise<number> {
        return this.data.byteLength;
    }

    async readAll(): Promise<Uint8Array> {
        return this.data;
    }

    openStream(): null {
        return null;
    }
}

export class FileInput implements CompressionInput {
    static readonly ALLOWED_MODES: readonly OutputMode[] = ['directory', 'memory', 'stream'];

    readonly id: string;
    readonly kind = 'file';
    readonly allowedOutputModes = FileInput.ALLOWED_MODES;
    readonly path: string;

    constructor(id: string, filePath: string) {
        this.id = requireId(id);
        FileInput.validatePath(filePath);
        this.path = path.resolve(filePath);
        Object.freeze(this);
    }

    /** Id derived from the file's real path. */
    static of(filePath: string): FileInput {
        FileInput.validatePath(filePath);
        return new FileInput(fastId(realpathSync(filePath)), filePath);
    }

    private static validatePath(filePath: string): void {
        if (filePath.includes('\0')) {
            throw new InvalidConfigurationError(`Invalid path: ${JSON.stringify(filePath)}`, ErrorCode.FILE_NOT_FOUND, {
                path: filePath,
            });
        }
        let isFile: boolean;
        try {
            isFile = statSync(filePath).isFile();
        } catch {
            throw new InvalidConfigurationError(`File not found: ${filePath}`, ErrorCode.FILE_NOT_FOUND, {
                path: filePath,
            });
        }
        if (!isFile) {
            throw new InvalidConfigurationError(`Path is not a file: ${filePath}`, ErrorCode.FILE_NOT_FOUND, { path: filePath });
        }
        try {
            accessSync(filePath, fsConstants.R_OK);
        } catch {
            throw new InvalidConfigurationError(`File not readable: ${filePath}`, ErrorCode.FILE_NOT_READABLE, {
                path: filePath,
            });
        }
    }

    get basename(): string {
        return path.basename(this.path);
    }

    async sizeBytes(): Promise<number> {
        try {
            const stat = await fs.stat(this.path);
            return stat.size;
        } catch (err) {
            throw new CompressionFailedError(
                `Failed to get file size: ${this.path}`,
                { path: this.path, itemId: this.id },
                err,
                errnoCode(err) === 'ENOENT' ? ErrorCode.FILE_NOT_FOUND : ErrorCode.FILE_NOT_READABLE,
            );
        }
    }

    async readAll(): Promise<Uint8Array> {
        try {
            return new Uint8Array(await fs.readFile(this.path));
        } catch (err) {
            throw new CompressionFailedError(`Failed to read input file: ${this.path}`, { path: this.path, itemId: this.id }, err, ErrorCode.FILE_NOT_READABLE);
        }
    }

    openStream(): Readable {
        return createReadStream(this.path);
    }
}

/**
 * Turns an externally discovered path list into file inputs, ids derived from
 * real paths. Paths resolving to the same file are kept once, first wins.
 */
export function fileInputs(paths: Iterable<string>): FileInput[] {
    const seen = new Set<string>();
    const inputs: FileInput[] = [];
    for (const p of paths) {
        const input = FileInput.of(p);
        if (seen.has(input.id)) continue;
        seen.add(input.id);
        inputs.push(input);
    }
    return inputs;
}
