import { createHash, randomBytes } from 'node:crypto';

/**
 * Fast, deterministic hex id for a path or payload.
 */
export function fastId(input: string | Uint8Array): string {
    return createHash('sha1').update(input).digest('hex');
}

/** Random hex suffix for temp files. */
export function randomSuffix(bytes: number = 6): string {
    return randomBytes(bytes).toString('hex');
}

export function toBytes(data: Uint8Array | string): Uint8Array {
    if (typeof data === 'string') return new Uint8Array(Buffer.from(data, 'utf8'));
    return data;
}
