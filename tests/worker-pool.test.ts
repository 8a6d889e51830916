import { mapBounded } from '../src/engine/worker-pool.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapBounded', () => {
    it('never runs more than the limit at once', async () => {
        let active = 0;
        let peak = 0;

        const results = await mapBounded([1, 2, 3, 4, 5, 6], 2, async (n) => {
            active++;
            peak = Math.max(peak, active);
            await sleep(5);
            active--;
            return n * 10;
        });

        expect(results).toEqual([10, 20, 30, 40, 50, 60]);
        expect(peak).toBe(2);
    });

    it('waits for in-flight work and rethrows the first error', async () => {
        const started: number[] = [];
        const settled: number[] = [];

        const run = mapBounded([0, 1, 2, 3], 2, async (n) => {
            started.push(n);
            if (n === 0) throw new Error('first');
            await sleep(20);
            settled.push(n);
            return n;
        });

        await expect(run).rejects.toThrow('first');
        expect(started).toEqual([0, 1]);
        expect(settled).toEqual([1]);
    });

    it('handles an empty list and rejects a bad limit', async () => {
        expect(await mapBounded([], 3, async () => 1)).toEqual([]);
        await expect(mapBounded([1], 0, async (n) => n)).rejects.toBeInstanceOf(RangeError);
    });
});
