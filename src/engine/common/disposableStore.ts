import type { Disposable } from '../types';

/**
 * Minimal disposable container that disposes items in reverse order of registration.
 */
export class DisposableStore implements Disposable {
	private readonly disposables: Disposable[] = [];
	private disposed = false;

	/**
	 * Registers a disposable and returns it for convenience.
	 * Once the store itself is disposed, anything added is disposed right away.
	 * @param disposable - Disposable to register.
	 * @returns The same disposable.
	 */
	add<T extends Disposable>(disposable: T): T {
		if (this.disposed) disposable.dispose();
		else this.disposables.push(disposable);
		return disposable;
	}

	/**
	 * Disposes and clears all tracked disposables.
	 * @returns void
	 */
	clear(): void {
		// Dispose in reverse order to match typical "create -> dispose" lifetimes.
		while (this.disposables.length) {
			this.disposables.pop()?.dispose();
		}
	}

	get size(): number {
		return this.disposables.length;
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	dispose(): void {
		this.disposed = true;
		this.clear();
	}
}

/**
 * Wraps a callback as a disposable.
 */
export function toDisposable(dispose: () => void): Disposable {
	let disposed = false;
	return {
		dispose: () => {
			if (disposed) return;
			disposed = true;
			dispose();
		},
	};
}
