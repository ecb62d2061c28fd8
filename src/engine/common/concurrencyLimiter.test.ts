import { describe, expect, it } from 'vitest';
import { createConcurrencyLimiter, mapLimited } from './concurrencyLimiter';

describe('createConcurrencyLimiter', () => {
	it('never runs more than the limit at once', async () => {
		const runLimited = createConcurrencyLimiter(2);
		let active = 0;
		let peak = 0;

		const results = await mapLimited([1, 2, 3, 4, 5], runLimited, async (value) => {
			active++;
			peak = Math.max(peak, active);
			await new Promise((resolve) => setTimeout(resolve, 5));
			active--;
			return value * 10;
		});

		expect(results).toEqual([10, 20, 30, 40, 50]);
		expect(peak).toBe(2);
	});

	it('releases the slot when a task throws', async () => {
		const runLimited = createConcurrencyLimiter(1);

		await expect(runLimited(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
		await expect(runLimited(async () => 'next')).resolves.toBe('next');
	});
});
