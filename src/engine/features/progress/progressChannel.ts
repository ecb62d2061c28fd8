import { EventEmitter } from 'events';
import type { Disposable } from '../../types';
import { toDisposable } from '../../common/disposableStore';

export interface ProgressChannelOptions {
	/** Minimum spacing between progress notifications; 0 notifies on every publish */
	throttleMs?: number;
	now?: () => number;
}

/**
 * One-writer / one-reader channel between a worker task and the control side.
 *
 * Progress is latest-value-wins: the worker overwrites a single slot and
 * listeners are notified at most once per throttle window; the reader can also
 * poll `latest()` on its own render tick. The outcome is delivered exactly once,
 * including to listeners that subscribe after completion.
 */
export class ProgressChannel<P, R> {
	private readonly emitter = new EventEmitter();
	private readonly throttleMs: number;
	private readonly now: () => number;
	private latestValue: P | undefined;
	private lastNotified = Number.NEGATIVE_INFINITY;
	private pendingFlush: NodeJS.Timeout | undefined;
	private hasUnnotified = false;
	private settled: { value: R } | undefined;
	private resolveOutcome: ((value: R) => void) | undefined;

	/** Resolves with the outcome once the worker completes the channel */
	readonly outcome: Promise<R>;

	constructor(options: ProgressChannelOptions = {}) {
		this.throttleMs = Math.max(0, options.throttleMs ?? 0);
		this.now = options.now ?? Date.now;
		this.outcome = new Promise<R>((resolve) => {
			this.resolveOutcome = resolve;
		});
	}

	get isCompleted(): boolean {
		return this.settled !== undefined;
	}

	latest(): P | undefined {
		return this.latestValue;
	}

	/**
	 * Overwrites the current snapshot. Ignored after completion.
	 */
	publish(progress: P): void {
		if (this.settled) return;
		this.latestValue = progress;
		this.hasUnnotified = true;

		const elapsed = this.now() - this.lastNotified;
		if (elapsed >= this.throttleMs) {
			this.notify();
			return;
		}

		// Trailing edge: make sure the newest value is eventually seen.
		if (!this.pendingFlush) {
			this.pendingFlush = setTimeout(() => {
				this.pendingFlush = undefined;
				this.notify();
			}, this.throttleMs - elapsed);
		}
	}

	/**
	 * Delivers the outcome. Returns false when the channel was already completed.
	 */
	complete(outcome: R): boolean {
		if (this.settled) return false;

		// Flush the last snapshot before the outcome so listeners end on the final state.
		this.clearPendingFlush();
		this.notify();

		this.settled = { value: outcome };
		this.resolveOutcome?.(outcome);
		this.resolveOutcome = undefined;
		this.emitter.emit('complete', outcome);
		this.emitter.removeAllListeners('progress');
		this.emitter.removeAllListeners('complete');
		return true;
	}

	onProgress(listener: (progress: P) => void): Disposable {
		if (this.settled) return toDisposable(() => {});
		this.emitter.on('progress', listener);
		return toDisposable(() => this.emitter.off('progress', listener));
	}

	onComplete(listener: (outcome: R) => void): Disposable {
		const settled = this.settled;
		if (settled) {
			// Replay for late subscribers.
			queueMicrotask(() => listener(settled.value));
			return toDisposable(() => {});
		}
		this.emitter.once('complete', listener);
		return toDisposable(() => this.emitter.off('complete', listener));
	}

	dispose(): void {
		this.clearPendingFlush();
		this.emitter.removeAllListeners();
	}

	private notify(): void {
		if (!this.hasUnnotified || this.latestValue === undefined) return;
		this.hasUnnotified = false;
		this.lastNotified = this.now();
		this.emitter.emit('progress', this.latestValue);
	}

	private clearPendingFlush(): void {
		if (this.pendingFlush) {
			clearTimeout(this.pendingFlush);
			this.pendingFlush = undefined;
		}
	}
}
