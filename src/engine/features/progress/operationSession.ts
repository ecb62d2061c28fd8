import { CancellationTokenSource, type CancellationToken } from '../../common/cancellation';

export interface CancellableSessionOptions<T> {
	task: (cancellationToken: CancellationToken) => Promise<T>;
	/** Cancelling the parent cancels the session too */
	parentToken?: CancellationToken;
}

export interface CancellableSession<T> {
	cancellationSource: CancellationTokenSource;
	run: () => Promise<T>;
	dispose: () => void;
}

/**
 * Creates a cancellable session: a task bound to its own token source, so the
 * control side can cancel it while the task only ever sees the read side.
 *
 * Single responsibility: token source + task wiring.
 * @param options - Session options.
 * @param options.task - Task to execute with the session's cancellation token.
 * @param options.parentToken - Optional upstream token.
 * @returns Session handle with run/dispose.
 */
export function createCancellableSession<T>({ task, parentToken }: CancellableSessionOptions<T>): CancellableSession<T> {
	const cancellationSource = new CancellationTokenSource(parentToken);

	return {
		cancellationSource,
		run: () => task(cancellationSource.token),
		dispose: () => cancellationSource.dispose(),
	};
}
