import { CompressionError, ErrorCode } from '../errors.js';
import type { ItemResult } from './item-result.js';
import { summarize, type BatchSummary } from './summary.js';

/**
 * Results of a batch run, iterated in input order. Never mutated once returned.
 */
export class BatchResult implements Iterable<ItemResult> {
    private readonly items: readonly ItemResult[];
    private readonly byId: ReadonlyMap<string, ItemResult>;

    constructor(items: readonly ItemResult[]) {
        this.items = Object.freeze([...items]);
        this.byId = new Map(items.map((item) => [item.id, item]));
        Object.freeze(this);
    }

    get size(): number {
        return this.items.length;
    }

    get(id: string): ItemResult {
        const item = this.byId.get(id);
        if (!item) throw new CompressionError(`No result for ID: ${id}`, ErrorCode.ITEM_NOT_FOUND, { itemId: id });
        return item;
    }

    has(id: string): boolean {
        return this.byId.has(id);
    }

    first(): ItemResult {
        const item = this.items[0];
        if (!item) throw new CompressionError('No results available', ErrorCode.NO_ITEMS);
        return item;
    }

    ids(): string[] {
        return this.items.map((item) => item.id);
    }

    /** True when every item succeeded with no codec errors at all. */
    allOk(): boolean {
        return this.items.every((item) => item.isOk());
    }

    successes(): ItemResult[] {
        return this.items.filter((item) => item.success);
    }

    failures(): ItemResult[] {
        return this.items.filter((item) => !item.success);
    }

    toArray(): ItemResult[] {
        return [...this.items];
    }

    summary(): BatchSummary {
        return summarize(this);
    }

    [Symbol.iterator](): Iterator<ItemResult> {
        return this.items[Symbol.iterator]();
    }
}
