import { DEFAULT_ADAPTERS, type CodecAdapter } from './adapters.js';
import { CODEC_IDS, type CodecId } from './meta.js';

/**
 * Immutable lookup of codec adapters by id. `with()` returns a new registry,
 * so one instance can be shared by concurrent batches.
 */
export class CodecRegistry {
    private readonly adapters: ReadonlyMap<CodecId, CodecAdapter>;

    constructor(adapters: Iterable<CodecAdapter> = DEFAULT_ADAPTERS) {
        const map = new Map<CodecId, CodecAdapter>();
        for (const adapter of adapters) map.set(adapter.id, adapter);
        this.adapters = map;
    }

    static defaults(): CodecRegistry {
        return new CodecRegistry(DEFAULT_ADAPTERS);
    }

    get(id: CodecId): CodecAdapter | undefined {
        return this.adapters.get(id);
    }

    has(id: CodecId): boolean {
        return this.adapters.has(id);
    }

    /** Returns a registry where `adapter` replaces any adapter with the same id. */
    with(adapter: CodecAdapter): CodecRegistry {
        const next = new Map(this.adapters);
        next.set(adapter.id, adapter);
        return new CodecRegistry(next.values());
    }

    /**
     * Codecs whose adapter is registered and reports itself available,
     * in default priority order.
     */
    available(): CodecId[] {
        return CODEC_IDS.filter((id) => this.adapters.get(id)?.isAvailable() === true);
    }
}
