import type {
	FileOperationManager,
	OperationEndEvent,
	OperationProgressEvent,
	OperationStartEvent,
} from '../fileOperationManager';
import type { Disposable, OperationKind } from '../types';
import { DisposableStore, toDisposable } from './disposableStore';

export interface OperationEventHandlers {
	onOperationStart?: (event: OperationStartEvent) => void;
	onProgress?: (event: OperationProgressEvent) => void;
	onOperationEnd?: (event: OperationEndEvent) => void;
}

export interface OperationEventFilter {
	/** Operations whose events reach the handlers; every operation when omitted */
	operations?: ReadonlyArray<OperationKind>;
}

/**
 * Attaches handlers to a manager's events, optionally narrowed to some operations.
 * Only the handlers given are attached; `dispose()` detaches them all.
 */
export class OperationEventSubscription implements Disposable {
	private readonly listeners = new DisposableStore();

	constructor(manager: FileOperationManager, handlers: OperationEventHandlers, filter: OperationEventFilter = {}) {
		const wanted = filter.operations ? new Set<OperationKind>(filter.operations) : undefined;
		const accepts = (operation: OperationKind): boolean => wanted === undefined || wanted.has(operation);
		const { onOperationStart, onProgress, onOperationEnd } = handlers;

		if (onOperationStart) {
			this.listen(manager, 'operationStart', (event: OperationStartEvent) => {
				if (accepts(event.operation)) onOperationStart(event);
			});
		}
		if (onProgress) {
			this.listen(manager, 'progress', (event: OperationProgressEvent) => {
				if (accepts(event.progress.operation)) onProgress(event);
			});
		}
		if (onOperationEnd) {
			this.listen(manager, 'operationEnd', (event: OperationEndEvent) => {
				if (accepts(event.operation)) onOperationEnd(event);
			});
		}
	}

	get isDisposed(): boolean {
		return this.listeners.isDisposed;
	}

	private listen<E>(manager: FileOperationManager, eventName: string, listener: (event: E) => void): void {
		manager.on(eventName, listener);
		this.listeners.add(toDisposable(() => manager.off(eventName, listener)));
	}

	dispose(): void {
		this.listeners.dispose();
	}
}
