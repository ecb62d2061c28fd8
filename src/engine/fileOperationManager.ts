import { EventEmitter } from 'events';
import type { CancellationToken } from './common/cancellation';
import { configManager } from './common/configManager';
import { DisposableStore } from './common/disposableStore';
import { toEntryError, toErrorMessage } from './common/errors';
import { nodeFileSystem, type FileSystem } from './common/fileSystem';
import { noopLogger, type Logger } from './common/logger';
import { copyEntries, deleteEntries, moveEntries } from './features/fileOps/bulkOperations';
import type { DeleteParams, TransferParams } from './features/fileOps/operationTypes';
import { createCancellableSession, type CancellableSession } from './features/progress/operationSession';
import { ProgressChannel } from './features/progress/progressChannel';
import { createSubsequenceMatcher } from './features/search/nameMatcher';
import { searchFiles } from './features/search/searchEngine';
import { calculateSizes, type MultiSizeResult } from './features/sizeCalc/sizeCalculator';
import type {
	EntryError,
	OperationKind,
	OperationProgress,
	OperationResult,
	OperationStatus,
	SearchResult,
} from './types';

export interface RequestOutcome<R> {
	id: number;
	operation: OperationKind;
	status: OperationStatus;
	/** Absent when the request was rejected or the task failed unexpectedly */
	result?: R;
	error?: EntryError;
}

export type SizeOutcome = RequestOutcome<MultiSizeResult>;
export type SearchOutcome = RequestOutcome<SearchResult>;
export type BulkOutcome = RequestOutcome<OperationResult>;

export interface OperationStartEvent {
	id: number;
	operation: OperationKind;
}

export interface OperationProgressEvent {
	id: number;
	progress: OperationProgress;
}

export type OperationEndEvent = RequestOutcome<MultiSizeResult | SearchResult | OperationResult>;

export interface SearchRequest {
	rootPath: string;
	query: string;
	/** Subsequence ("fuzzy") matching instead of substring */
	fuzzy?: boolean;
	caseSensitive?: boolean;
	maxResults?: number;
}

type TransferRequest = Omit<TransferParams, 'cancellationToken' | 'onProgress' | 'fs' | 'logger'>;
type DeleteRequest = Omit<DeleteParams, 'cancellationToken' | 'onProgress' | 'fs' | 'logger'>;

/** Size and search each run one at a time per kind; bulk operations share one slot */
type Lane = 'size' | 'search' | 'bulk';

interface ActiveRequest {
	id: number;
	session: CancellableSession<unknown>;
}

function laneOf(operation: OperationKind): Lane {
	return operation === 'size' || operation === 'search' ? operation : 'bulk';
}

function statusOfSize(result: MultiSizeResult): OperationStatus {
	if (result.partial) return 'cancelled';
	return result.results.some((r) => r.errors.length > 0) ? 'partiallyCompleted' : 'completed';
}

function statusOfSearch(result: SearchResult): OperationStatus {
	if (result.partial) return 'cancelled';
	return result.errors.length > 0 ? 'partiallyCompleted' : 'completed';
}

export interface FileOperationManagerOptions {
	fs?: FileSystem;
	logger?: Logger;
}

/**
 * Control side of the engine: dispatches requests to worker tasks and relays
 * their throttled progress and final outcome as events.
 *
 * Events: `operationStart`, `progress`, `operationEnd` (exactly once per request).
 */
export class FileOperationManager extends EventEmitter {
	private readonly fs: FileSystem;
	private readonly logger: Logger;
	private readonly active = new Map<Lane, ActiveRequest>();
	private nextId = 0;

	constructor(options: FileOperationManagerOptions = {}) {
		super();
		this.fs = options.fs ?? nodeFileSystem;
		this.logger = options.logger ?? noopLogger;
	}

	/**
	 * Dispose and cleanup
	 */
	dispose(): void {
		this.cancelCurrent();
		this.removeAllListeners();
	}

	/**
	 * Check if a copy, move or delete is running
	 */
	isBusy(): boolean {
		return this.active.has('bulk');
	}

	/**
	 * Cancels the running request of one kind, or every running request.
	 */
	cancelCurrent(operation?: OperationKind): void {
		const lanes: Lane[] = operation ? [laneOf(operation)] : ['size', 'search', 'bulk'];
		for (const lane of lanes) {
			this.active.get(lane)?.session.cancellationSource.cancel();
		}
	}

	/**
	 * Sizes of one or more roots. A newer size request cancels this one.
	 */
	computeSize(rootPaths: ReadonlyArray<string>): Promise<SizeOutcome> {
		const { maxDepth, symlinkPolicy } = configManager.getTraversalConfig();
		const { concurrentOperations } = configManager.getOperationConfig();
		return this.execute(
			'size',
			(cancellationToken, onProgress) =>
				calculateSizes(rootPaths, {
					cancellationToken,
					onProgress,
					maxDepth,
					symlinkPolicy,
					concurrentOperations,
					fs: this.fs,
					logger: this.logger,
				}),
			statusOfSize
		);
	}

	/**
	 * Name search under one root. A newer search cancels this one.
	 */
	search(request: SearchRequest): Promise<SearchOutcome> {
		const { maxDepth, symlinkPolicy } = configManager.getTraversalConfig();
		const searchConfig = configManager.getSearchConfig();
		return this.execute(
			'search',
			(cancellationToken, onProgress) =>
				searchFiles({
					rootPath: request.rootPath,
					query: request.query,
					matcher: request.fuzzy ? createSubsequenceMatcher(request.query) : undefined,
					caseSensitive: request.caseSensitive ?? searchConfig.caseSensitive,
					maxResults: request.maxResults ?? searchConfig.maxResults,
					cancellationToken,
					onProgress,
					maxDepth,
					symlinkPolicy,
					fs: this.fs,
					logger: this.logger,
				}),
			statusOfSearch
		);
	}

	copy(request: TransferRequest): Promise<BulkOutcome> {
		return this.execute(
			'copy',
			(cancellationToken, onProgress) =>
				copyEntries({ ...request, cancellationToken, onProgress, fs: this.fs, logger: this.logger }),
			(result) => result.status
		);
	}

	move(request: TransferRequest): Promise<BulkOutcome> {
		return this.execute(
			'move',
			(cancellationToken, onProgress) =>
				moveEntries({ ...request, cancellationToken, onProgress, fs: this.fs, logger: this.logger }),
			(result) => result.status
		);
	}

	delete(request: DeleteRequest): Promise<BulkOutcome> {
		return this.execute(
			'delete',
			(cancellationToken, onProgress) =>
				deleteEntries({ ...request, cancellationToken, onProgress, fs: this.fs, logger: this.logger }),
			(result) => result.status
		);
	}

	/**
	 * Runs one request as its own task: start event, throttled progress, then the
	 * outcome exactly once. Unexpected exceptions become an `aborted` outcome.
	 */
	private async execute<R>(
		operation: OperationKind,
		task: (cancellationToken: CancellationToken, onProgress: (progress: OperationProgress) => void) => Promise<R>,
		statusOf: (result: R) => OperationStatus
	): Promise<RequestOutcome<R>> {
		const lane = laneOf(operation);
		const id = ++this.nextId;
		this.emit('operationStart', { id, operation } satisfies OperationStartEvent);

		if (lane === 'bulk' && this.active.has('bulk')) {
			const rejected: RequestOutcome<R> = {
				id,
				operation,
				status: 'aborted',
				error: { path: '', kind: 'InvalidInput', message: 'Another file operation is already running' },
			};
			this.emit('operationEnd', rejected);
			return rejected;
		}
		if (lane !== 'bulk') this.cancelCurrent(operation);

		const channel = new ProgressChannel<OperationProgress, RequestOutcome<R>>({
			throttleMs: configManager.getOperationConfig().progressThrottleMs,
		});
		const subscriptions = new DisposableStore();
		subscriptions.add(channel.onProgress((progress) => this.emit('progress', { id, progress } satisfies OperationProgressEvent)));
		subscriptions.add(channel.onComplete((outcome) => this.emit('operationEnd', outcome)));

		const session = createCancellableSession({
			task: (cancellationToken) => task(cancellationToken, (progress) => channel.publish(progress)),
		});
		this.active.set(lane, { id, session });

		let outcome: RequestOutcome<R>;
		try {
			const result = await session.run();
			outcome = { id, operation, status: statusOf(result), result };
		} catch (error) {
			this.logger.error('request failed', { operation, error: toErrorMessage(error) });
			outcome = { id, operation, status: 'aborted', error: toEntryError('', error) };
		} finally {
			if (this.active.get(lane)?.id === id) this.active.delete(lane);
			session.dispose();
		}

		channel.complete(outcome);
		subscriptions.dispose();
		channel.dispose();
		return outcome;
	}
}
