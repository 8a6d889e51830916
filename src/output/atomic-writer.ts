import * as fs from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { once } from 'node:events';
import * as path from 'node:path';
import { finished } from 'node:stream/promises';
import { CODEC_META, type CodecId } from '../codecs/meta.js';
import {
    CompressionError,
    ErrorCode,
    InvalidConfigurationError,
    TargetAlreadyExistsError,
    WriteFailedError,
    errnoCode,
} from '../errors.js';
import type { Logger, OverwritePolicy } from '../types.js';
import { randomSuffix } from '../utils.js';

export type FsyncMode = 'strict' | 'best_effort';

export interface AtomicWriterOptions {
    logger?: Logger | null;
    /** fsync temp files before rename. `best_effort` ignores EPERM/EINVAL/ENOTSUP. */
    fsyncMode?: FsyncMode;
}

export interface WriteOptions {
    overwrite?: OverwritePolicy;
    createDirs?: boolean;
    /** Mode applied after rename. */
    permissions?: number | null;
}

export interface WriteAllOptions extends WriteOptions {
    /** On a failed rename, remove every target this call already created. */
    atomicAll?: boolean;
}

export interface OutputEntry {
    codec: CodecId;
    data: Uint8Array;
}

/** Receives one writable per codec; temp-file backed until published. */
export type SinkProducer = (sinks: ReadonlyMap<CodecId, WriteStream>) => Promise<void>;

export interface PlannedTarget<K> {
    key: K;
    target: string;
    existed: boolean;
}

export interface StagedTarget<K> extends PlannedTarget<K> {
    tmp: string;
    bytes: number;
}

interface OpenSink<K> extends PlannedTarget<K> {
    tmp: string;
    handle: fs.FileHandle;
    /** Opened with autoClose off so the fd survives 'finish' for fsync; destroying it closes the handle. */
    sink: WriteStream;
}

function isIgnorableFsyncError(error: unknown): boolean {
    const code = errnoCode(error);
    return code === 'EPERM' || code === 'EINVAL' || code === 'ENOTSUP';
}

async function pathExists(p: string): Promise<boolean> {
    try {
        await fs.lstat(p);
        return true;
    } catch (err) {
        if (errnoCode(err) === 'ENOENT') return false;
        throw err;
    }
}

async function isWritable(dir: string): Promise<boolean> {
    try {
        await fs.access(dir, fs.constants.W_OK);
        return true;
    } catch {
        return false;
    }
}

export function validateBasename(basename: string): void {
    if (basename === '' || basename === '.' || basename === '..' || basename.includes('/') || basename.includes('\\') || basename.includes('\0')) {
        throw new InvalidConfigurationError(`Invalid basename: ${basename}`, ErrorCode.INVALID_PAYLOAD, { basename });
    }
}

export function targetFileName(basename: string, codec: CodecId): string {
    return `${basename}.${CODEC_META[codec].fileExtension}`;
}

/**
 * Crash-safe file output. Every payload is written to a uniquely named temp
 * file in the target's own directory and then renamed over the target, so a
 * reader sees either the previous complete file or the new complete file.
 *
 * Multi-target writes stage every payload before the first rename. No state
 * is kept between calls; two writers racing on one path both succeed and the
 * later rename wins.
 */
export class AtomicOutputWriter {
    private readonly logger: Logger | null;
    private readonly fsyncMode: FsyncMode;

    constructor(options: AtomicWriterOptions = {}) {
        this.logger = options.logger ?? null;
        this.fsyncMode = options.fsyncMode ?? 'best_effort';
    }

    /**
     * Ensures `dir` exists and is writable, creating it when allowed.
     * Returns its real path.
     */
    async prepareDirectory(dir: string, createDirs: boolean): Promise<string> {
        let exists: boolean;
        try {
            const stat = await fs.stat(dir);
            if (!stat.isDirectory()) {
                throw new WriteFailedError(`Not a directory: ${dir}`, { path: dir });
            }
            exists = true;
        } catch (err) {
            if (err instanceof CompressionError) throw err;
            if (errnoCode(err) !== 'ENOENT') throw new WriteFailedError(`Cannot access directory: ${dir}`, { path: dir }, err);
            exists = false;
        }

        if (!exists) {
            if (!createDirs) {
                throw new WriteFailedError(`Directory does not exist: ${dir}`, { path: dir });
            }
            try {
                await fs.mkdir(dir, { recursive: true, mode: 0o755 });
            } catch (err) {
                throw new WriteFailedError(
                    `Failed to create directory: ${dir}`,
                    { path: dir, directoryWritable: await isWritable(path.dirname(dir)) },
                    err,
                );
            }
        }

        const real = await fs.realpath(dir);
        if (!(await isWritable(real))) {
            throw new WriteFailedError(`Directory is not writable: ${real}`, { path: real, directoryWritable: false });
        }
        return real;
    }

    /**
     * Atomically writes one file. Default policy is `replace`.
     */
    async writeOne(targetPath: string, data: Uint8Array, options: WriteOptions = {}): Promise<string | null> {
        const policy = options.overwrite ?? 'replace';
        const file = path.basename(targetPath);
        validateBasename(file);

        const realDir = await this.prepareDirectory(path.dirname(targetPath), options.createDirs ?? true);
        const target = path.join(realDir, file);
        const existed = await pathExists(target);

        if (existed) {
            if (policy === 'skip') return null;
            if (policy === 'fail') throw new TargetAlreadyExistsError(target);
        }

        let staged: StagedTarget<string>;
        try {
            staged = await this.stage({ key: target, target, existed }, data);
        } catch (err) {
            throw await this.writeError(err, target, data.byteLength, realDir);
        }
        await this.commit([staged], options.permissions ?? null, false);
        return target;
    }

    /**
     * Writes `<basename>.<ext>` for every entry. Nothing is renamed until every
     * entry is staged; a staging failure removes all temp files of this call
     * and leaves every target untouched.
     *
     * Returns the published paths; entries skipped by the policy are absent.
     */
    async writeAll(
        directory: string,
        basename: string,
        entries: readonly OutputEntry[],
        options: WriteAllOptions = {},
    ): Promise<Map<CodecId, string>> {
        validateBasename(basename);
        const realDir = await this.prepareDirectory(directory, options.createDirs ?? true);
        const dataByCodec = new Map(entries.map((e) => [e.codec, e.data]));
        const plan = await this.plan(realDir, basename, [...dataByCodec.keys()], options.overwrite ?? 'fail');

        const staged: StagedTarget<CodecId>[] = [];
        for (const planned of plan) {
            const data = dataByCodec.get(planned.key) ?? new Uint8Array(0);
            try {
                staged.push(await this.stage(planned, data));
            } catch (err) {
                await this.discard(staged);
                throw await this.writeError(err, planned.target, data.byteLength, realDir);
            }
        }

        await this.commit(staged, options.permissions ?? null, options.atomicAll ?? true);
        return new Map(staged.map((s) => [s.key, s.target]));
    }

    /**
     * Streaming variant of `writeOne`: the producer writes into a temp-file
     * sink that is published once it returns. An empty sink publishes nothing.
     */
    async writeOneWithSink(
        targetPath: string,
        options: WriteOptions,
        producer: (sink: WriteStream) => Promise<void>,
    ): Promise<string | null> {
        const file = path.basename(targetPath);
        validateBasename(file);
        const realDir = await this.prepareDirectory(path.dirname(targetPath), options.createDirs ?? true);
        const target = path.join(realDir, file);
        const existed = await pathExists(target);
        const policy = options.overwrite ?? 'replace';

        if (existed) {
            if (policy === 'skip') return null;
            if (policy === 'fail') throw new TargetAlreadyExistsError(target);
        }

        const published = await this.runWithSinks(
            [{ key: target, target, existed }],
            realDir,
            { ...options, atomicAll: false },
            async (sinks) => {
                const sink = sinks.get(target);
                if (sink) await producer(sink);
            },
        );
        return published.get(target) ?? null;
    }

    /**
     * Streaming variant of `writeAll`. After the producer returns every sink
     * is flushed; sinks that received no bytes, or that the producer
     * destroyed, are dropped. The rest are published with the same
     * all-or-nothing discipline as `writeAll`.
     */
    async writeAllWithSinks(
        directory: string,
        basename: string,
        codecs: readonly CodecId[],
        options: WriteAllOptions,
        producer: SinkProducer,
    ): Promise<Map<CodecId, string>> {
        validateBasename(basename);
        const realDir = await this.prepareDirectory(directory, options.createDirs ?? true);
        const plan = await this.plan(realDir, basename, codecs, options.overwrite ?? 'fail');
        return this.runWithSinks(plan, realDir, options, producer);
    }

    private async runWithSinks<K>(
        plan: readonly PlannedTarget<K>[],
        realDir: string,
        options: WriteAllOptions,
        producer: (sinks: ReadonlyMap<K, WriteStream>) => Promise<void>,
    ): Promise<Map<K, string>> {
        const open: OpenSink<K>[] = [];
        const sinks = new Map<K, WriteStream>();

        const abandon = async (): Promise<void> => {
            for (const entry of open) {
                await this.release(entry.sink).catch((err: unknown) => {
                    this.logger?.warn?.(`[writer] Failed to close ${entry.tmp}: ${String(err)}`);
                });
            }
            await this.discard(open);
        };

        try {
            for (const planned of plan) {
                const tmp = this.tempPathFor(planned.target);
                const handle = await fs.open(tmp, 'wx', 0o644);
                const sink = handle.createWriteStream({ autoClose: false });
                open.push({ ...planned, tmp, handle, sink });
                sinks.set(planned.key, sink);
            }
        } catch (err) {
            await abandon();
            throw await this.writeError(err, realDir, undefined, realDir);
        }

        try {
            await producer(sinks);
        } catch (err) {
            await abandon();
            throw err;
        }

        const staged: StagedTarget<K>[] = [];
        const dropped: Array<{ tmp: string }> = [];
        try {
            for (const entry of open) {
                if (entry.sink.destroyed) {
                    dropped.push(entry);
                    continue;
                }
                entry.sink.end();
                await finished(entry.sink);
                if (entry.sink.bytesWritten === 0) {
                    await this.release(entry.sink);
                    dropped.push(entry);
                    continue;
                }
                await this.sync(entry.handle);
                await this.release(entry.sink);
                staged.push({ key: entry.key, target: entry.target, existed: entry.existed, tmp: entry.tmp, bytes: entry.sink.bytesWritten });
            }
        } catch (err) {
            await abandon();
            throw await this.writeError(err, realDir, undefined, realDir);
        }

        await this.discard(dropped);
        await this.commit(staged, options.permissions ?? null, options.atomicAll ?? true);
        return new Map(staged.map((s) => [s.key, s.target]));
    }

    /**
     * Resolves targets and applies the overwrite policy. `fail` conflicts are
     * raised here, before anything is staged; `skip` drops the entry.
     */
    private async plan(realDir: string, basename: string, codecs: readonly CodecId[], policy: OverwritePolicy): Promise<PlannedTarget<CodecId>[]> {
        const plan: PlannedTarget<CodecId>[] = [];
        for (const codec of codecs) {
            const target = path.join(realDir, targetFileName(basename, codec));
            const existed = await pathExists(target);
            if (existed) {
                if (policy === 'skip') {
                    this.logger?.debug?.(`[writer] Skipping existing ${target}`);
                    continue;
                }
                if (policy === 'fail') throw new TargetAlreadyExistsError(target);
            }
            plan.push({ key: codec, target, existed });
        }
        return plan;
    }

    private tempPathFor(target: string): string {
        return `${target}.tmp.${randomSuffix()}`;
    }

    /**
     * Writes `data` to a fresh temp file next to the target.
     */
    protected async stage<K>(planned: PlannedTarget<K>, data: Uint8Array): Promise<StagedTarget<K>> {
        const tmp = this.tempPathFor(planned.target);
        const handle = await fs.open(tmp, 'wx', 0o644);
        try {
            await handle.writeFile(data);
            await this.sync(handle);
        } catch (err) {
            await this.closeQuietly(handle, tmp);
            await this.unlinkQuietly(tmp);
            throw err;
        }
        await handle.close();
        return { ...planned, tmp, bytes: data.byteLength };
    }

    protected async sync(handle: fs.FileHandle): Promise<void> {
        try {
            await handle.sync();
        } catch (error) {
            if (this.fsyncMode === 'strict' || !isIgnorableFsyncError(error)) {
                throw error;
            }
            this.logger?.warn?.('[writer] fsync not supported on this filesystem. Continuing without durable sync.');
        }
    }

    /**
     * Renames every staged file into place. If a rename fails, remaining temp
     * files are removed and, with `atomicAll`, so is every target this call
     * created. A target that existed before and was already replaced cannot
     * be restored and is left with its new content.
     */
    protected async commit<K>(staged: readonly StagedTarget<K>[], permissions: number | null, atomicAll: boolean): Promise<void> {
        const renamed: StagedTarget<K>[] = [];
        for (let i = 0; i < staged.length; i++) {
            const entry = staged[i];
            try {
                await this.rename(entry.tmp, entry.target);
            } catch (err) {
                await this.discard(staged.slice(i));
                if (atomicAll) await this.rollback(renamed);
                throw new WriteFailedError(
                    `Failed to move temp file to target: ${entry.target}`,
                    { path: entry.target, directoryWritable: await isWritable(path.dirname(entry.target)) },
                    err,
                );
            }
            renamed.push(entry);
            this.logger?.debug?.(`[writer] Published ${entry.target} (${entry.bytes} bytes)`);
        }

        if (permissions === null) return;
        for (const entry of renamed) {
            await fs.chmod(entry.target, permissions).catch((err: unknown) => {
                this.logger?.warn?.(`[writer] chmod ${permissions.toString(8)} failed for ${entry.target}: ${String(err)}`);
            });
        }
    }

    protected async rename(from: string, to: string): Promise<void> {
        await fs.rename(from, to);
    }

    private async rollback(renamed: ReadonlyArray<{ target: string; existed: boolean }>): Promise<void> {
        for (const entry of renamed) {
            if (entry.existed) {
                this.logger?.warn?.(`[writer] Cannot roll back ${entry.target}: its previous version was already replaced`);
                continue;
            }
            await this.unlinkQuietly(entry.target);
        }
    }

    /** Destroys `sink`, which closes its file handle, and waits for 'close'. */
    private async release(sink: WriteStream): Promise<void> {
        if (sink.closed) return;
        const closed = once(sink, 'close');
        sink.destroy();
        await closed;
    }

    private async closeQuietly(handle: fs.FileHandle, tmp: string): Promise<void> {
        await handle.close().catch((err: unknown) => {
            this.logger?.warn?.(`[writer] Failed to close ${tmp}: ${String(err)}`);
        });
    }

    private async discard(entries: ReadonlyArray<{ tmp: string }>): Promise<void> {
        for (const entry of entries) await this.unlinkQuietly(entry.tmp);
    }

    private async unlinkQuietly(p: string): Promise<void> {
        try {
            await fs.unlink(p);
        } catch (err) {
            if (errnoCode(err) !== 'ENOENT') {
                this.logger?.warn?.(`[writer] Failed to remove ${p}: ${String(err)}`);
            }
        }
    }

    private async writeError(err: unknown, target: string, bytesToWrite: number | undefined, realDir: string): Promise<CompressionError> {
        if (err instanceof CompressionError) return err;
        return new WriteFailedError(
            `Failed to write temp file for: ${target}`,
            { path: target, bytesToWrite, directoryWritable: await isWritable(realDir) },
            err,
        );
    }
}
