import { describe, expect, it } from 'vitest';
import { mapInOrder } from './concurrency.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapInOrder', () => {
    it('keeps input order and never exceeds the limit', async () => {
        let running = 0;
        let peak = 0;

        const results = await mapInOrder([40, 10, 30, 5, 20], async (ms, index) => {
            running++;
            peak = Math.max(peak, running);
            await sleep(ms);
            running--;
            return `${index}:${ms}`;
        }, 2);

        expect(results).toEqual(['0:40', '1:10', '2:30', '3:5', '4:20']);
        expect(peak).toBe(2);
    });

    it('runs one at a time by default', async () => {
        const order: number[] = [];

        await mapInOrder([3, 1, 2], async (value) => {
            order.push(value);
            await sleep(1);
        });

        expect(order).toEqual([3, 1, 2]);
    });

    it('handles an empty list', async () => {
        await expect(mapInOrder([], async () => 1, 4)).resolves.toEqual([]);
    });
});
