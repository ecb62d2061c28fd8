import { EventEmitter } from 'events';
import type { Disposable } from '../types';
import { toDisposable } from './disposableStore';

/**
 * Read side of a cancellation flag. The worker polls `isCancellationRequested`
 * at its check points; listeners are for code that waits on something else.
 */
export interface CancellationToken {
	readonly isCancellationRequested: boolean;
	onCancellationRequested(listener: () => void): Disposable;
}

const noopDisposable: Disposable = { dispose: () => {} };

/**
 * Token that is never cancelled.
 */
export const NEVER_CANCELLED: CancellationToken = Object.freeze({
	isCancellationRequested: false,
	onCancellationRequested: () => noopDisposable,
});

/** `CancellationToken.None`: the token that never fires */
export const CancellationToken = Object.freeze({ None: NEVER_CANCELLED });

class MutableToken implements CancellationToken {
	private cancelled = false;
	private readonly emitter = new EventEmitter();

	get isCancellationRequested(): boolean {
		return this.cancelled;
	}

	onCancellationRequested(listener: () => void): Disposable {
		if (this.cancelled) {
			// Late subscribers still hear about it, asynchronously like the emit path.
			const handle = setTimeout(listener, 0);
			return toDisposable(() => clearTimeout(handle));
		}
		this.emitter.once('cancel', listener);
		return toDisposable(() => this.emitter.off('cancel', listener));
	}

	cancel(): void {
		if (this.cancelled) return;
		this.cancelled = true;
		this.emitter.emit('cancel');
		this.emitter.removeAllListeners();
	}

	dispose(): void {
		this.emitter.removeAllListeners();
	}
}

/**
 * Write side of a cancellation flag. Owned by the control side.
 */
export class CancellationTokenSource implements Disposable {
	private readonly mutableToken = new MutableToken();
	private parentSubscription: Disposable | undefined;

	constructor(parent?: CancellationToken) {
		if (parent?.isCancellationRequested) {
			this.mutableToken.cancel();
		} else if (parent) {
			this.parentSubscription = parent.onCancellationRequested(() => this.cancel());
		}
	}

	get token(): CancellationToken {
		return this.mutableToken;
	}

	cancel(): void {
		this.mutableToken.cancel();
	}

	dispose(): void {
		this.parentSubscription?.dispose();
		this.parentSubscription = undefined;
		this.mutableToken.dispose();
	}
}
