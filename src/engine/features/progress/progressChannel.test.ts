import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProgressChannel } from './progressChannel';

describe('ProgressChannel', () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it('notifies at most once per window and delivers the newest value on the trailing edge', () => {
		const channel = new ProgressChannel<number, string>({ throttleMs: 100, now: () => Date.now() });
		const seen: number[] = [];
		channel.onProgress((value) => seen.push(value));

		channel.publish(1);
		vi.advanceTimersByTime(10);
		channel.publish(2);
		vi.advanceTimersByTime(10);
		channel.publish(3);

		expect(seen).toEqual([1]);
		expect(channel.latest()).toBe(3);

		vi.advanceTimersByTime(80);
		expect(seen).toEqual([1, 3]);
	});

	it('flushes the last snapshot before the outcome and completes once', async () => {
		const channel = new ProgressChannel<number, string>({ throttleMs: 100, now: () => Date.now() });
		const events: string[] = [];
		channel.onProgress((value) => events.push(`progress ${value}`));
		channel.onComplete((outcome) => events.push(`complete ${outcome}`));

		channel.publish(1);
		vi.advanceTimersByTime(10);
		channel.publish(2);

		expect(channel.complete('done')).toBe(true);
		expect(channel.complete('again')).toBe(false);
		channel.publish(3);
		vi.runAllTimers();

		expect(events).toEqual(['progress 1', 'progress 2', 'complete done']);
		expect(channel.isCompleted).toBe(true);
		await expect(channel.outcome).resolves.toBe('done');
	});

	it('replays the outcome to late subscribers', async () => {
		const channel = new ProgressChannel<number, string>();
		channel.complete('finished');
		const listener = vi.fn();

		channel.onComplete(listener);
		await Promise.resolve();

		expect(listener).toHaveBeenCalledWith('finished');
	});

	it('notifies on every publish without a throttle', () => {
		const channel = new ProgressChannel<number, string>();
		const listener = vi.fn();
		channel.onProgress(listener);

		channel.publish(1);
		channel.publish(2);

		expect(listener.mock.calls).toEqual([[1], [2]]);
	});
});
