import { CODEC_META, type CodecId } from '../codecs/meta.js';

export interface EncodingPreference {
    /** Lower-cased coding name, `*` or `identity`. */
    name: string;
    /** 0..1 */
    weight: number;
}

const WILDCARD = '*';
const IDENTITY = 'identity';

// 0, 0.x.., 1, 1.0.. with at most three fractional digits.
const QVALUE = /^(?:0(?:\.\d{0,3})?|1(?:\.0{0,3})?)$/;

function parseWeight(raw: string): number {
    const value = raw.trim();
    return QVALUE.test(value) ? Number(value) : 1.0;
}

/**
 * Parses an Accept-Encoding style header. Lenient: a malformed weight counts
 * as 1.0 instead of rejecting the header; empty tokens are ignored; a name
 * listed twice keeps its last weight.
 */
export function parseAcceptEncoding(header: string): EncodingPreference[] {
    const byName = new Map<string, number>();

    for (const part of header.split(',')) {
        const [rawName, ...params] = part.split(';');
        const name = rawName.trim().toLowerCase();
        if (name === '') continue;

        let weight = 1.0;
        for (const param of params) {
            const eq = param.indexOf('=');
            if (eq === -1) continue;
            if (param.slice(0, eq).trim().toLowerCase() !== 'q') continue;
            weight = parseWeight(param.slice(eq + 1));
        }
        byName.set(name, weight);
    }

    return [...byName].map(([name, weight]) => ({ name, weight }));
}

/**
 * Picks the codec to answer a request with, or null for "send uncompressed".
 *
 * Each available codec is scored by its explicit entry, else by `*`, else it
 * is not acceptable. Candidates are ordered by weight, ties going to the
 * earlier entry in `available`. An explicitly accepted `identity` wins over
 * any codec that does not strictly outscore it.
 */
export function negotiate(header: string, available: readonly CodecId[]): CodecId | null {
    const prefs = new Map(parseAcceptEncoding(header).map((p) => [p.name, p.weight]));
    const wildcard = prefs.get(WILDCARD);

    const scored: Array<{ codec: CodecId; weight: number }> = [];
    for (const codec of available) {
        const explicit = prefs.get(CODEC_META[codec].contentEncoding);
        const weight = explicit ?? wildcard;
        if (weight === undefined || weight <= 0) continue;
        scored.push({ codec, weight });
    }

    // Array.prototype.sort is stable, so equal weights keep `available` order.
    scored.sort((a, b) => b.weight - a.weight);
    const best = scored[0];
    if (!best) return null;

    const identity = prefs.get(IDENTITY);
    if (identity !== undefined && identity > 0 && best.weight <= identity) return null;

    return best.codec;
}
