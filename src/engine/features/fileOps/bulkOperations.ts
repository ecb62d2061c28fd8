import * as path from 'path';
import { NEVER_CANCELLED } from '../../common/cancellation';
import { configManager } from '../../common/configManager';
import { FileOpError, toEntryError, toErrorMessage } from '../../common/errors';
import { nodeFileSystem } from '../../common/fileSystem';
import { formatDuration } from '../../../shared/formatters';
import { noopLogger } from '../../common/logger';
import type { BulkOperationKind, OperationResult, OperationStatus } from '../../types';
import { executePlan, type ExecutionOutcome } from './executor';
import { OperationStateMachine } from './operationState';
import type { BulkOperationOptions, DeleteParams, OperationPlan, TransferParams } from './operationTypes';
import { buildPlan } from './planner';
import { checkDeleteRequest, checkTransferRequest, type CheckedSource } from './preflight';

function emptyResult(operation: BulkOperationKind, status: OperationStatus): OperationResult {
	return {
		operation,
		status,
		entriesCompleted: 0,
		entriesTotal: 0,
		bytesDone: 0,
		bytesTotal: 0,
		errors: [],
		skipped: [],
		excludedSymlinks: [],
		crossDeviceFallbacks: 0,
	};
}

function planResult(operation: BulkOperationKind, status: OperationStatus, plan: OperationPlan): OperationResult {
	return {
		...emptyResult(operation, status),
		entriesTotal: plan.totals.entries,
		bytesTotal: plan.totals.bytes,
		errors: [...plan.errors],
		skipped: [...plan.skipped],
		excludedSymlinks: [...plan.excludedSymlinks],
	};
}

function finalStatus(execution: ExecutionOutcome, plan: OperationPlan): OperationStatus {
	if (execution.fatal) return 'aborted';
	if (execution.cancelled) return 'cancelled';
	return plan.errors.length + execution.errors.length > 0 ? 'partiallyCompleted' : 'completed';
}

/**
 * Shared driver: pre-flight, planning, execution, result. Never throws for
 * filesystem conditions; every outcome is an `OperationResult`.
 */
async function runBulkOperation(
	operation: BulkOperationKind,
	options: BulkOperationOptions & Partial<Pick<TransferParams, 'resolveConflict' | 'onSensitiveSymlinks'>>,
	sourceCount: number,
	preflight: () => Promise<CheckedSource[]>,
	destinationDir?: string
): Promise<OperationResult> {
	const {
		cancellationToken = NEVER_CANCELLED,
		onProgress,
		onStateChange,
		fs = nodeFileSystem,
		logger = noopLogger,
	} = options;
	const config = {
		...configManager.getOperationConfig(),
		maxDepth: configManager.getTraversalConfig().maxDepth,
		...options.config,
	};
	const state = new OperationStateMachine(onStateChange);
	const startedAt = Date.now();

	state.transition('planning');
	logger.info('operation: start', { operation, sources: sourceCount, destinationDir });
	try {
		if (cancellationToken.isCancellationRequested) {
			state.transition('cancelled');
			return emptyResult(operation, 'cancelled');
		}

		const sources = await preflight();
		const outcome = await buildPlan({
			operation,
			sources,
			destinationDir,
			resolveConflict: options.resolveConflict,
			onSensitiveSymlinks: options.onSensitiveSymlinks,
			cancellationToken,
			onProgress,
			maxDepth: config.maxDepth,
			concurrentOperations: config.concurrentOperations,
			fs,
			logger,
		});

		if (outcome.type === 'cancelled') {
			state.transition('cancelled');
			return planResult(operation, 'cancelled', outcome.plan);
		}
		if (outcome.type === 'aborted') {
			state.transition('aborted');
			return { ...planResult(operation, 'aborted', outcome.plan), abortReason: outcome.reason };
		}

		const { plan } = outcome;
		state.transition('executing');
		const execution = await executePlan(plan, {
			cancellationToken,
			onProgress,
			allowCrossDevice: config.allowCrossDevice,
			chunkSize: config.copyChunkSize,
			fs,
			logger,
		});

		const status = finalStatus(execution, plan);
		state.transition(status);
		const result: OperationResult = {
			...planResult(operation, status, plan),
			entriesCompleted: execution.entriesCompleted,
			bytesDone: execution.bytesDone,
			errors: [...plan.errors, ...execution.errors],
			crossDeviceFallbacks: execution.crossDeviceFallbacks,
			abortReason: execution.fatal?.message,
		};

		logger.info('operation: end', {
			operation,
			status,
			entries: result.entriesCompleted,
			bytes: result.bytesDone,
			errors: result.errors.length,
			duration: formatDuration(Date.now() - startedAt),
		});
		return result;
	} catch (error) {
		// Rejected request or an unexpected failure: report it instead of throwing.
		logger.error('operation: aborted', { operation, error: toErrorMessage(error) });
		if (!state.isTerminal) state.transition('aborted');
		const entryError = error instanceof FileOpError ? error.toEntryError() : toEntryError('', error);
		return { ...emptyResult(operation, 'aborted'), errors: [entryError], abortReason: entryError.message };
	}
}

/**
 * Copies `sources` into `destinationDir`, merging into existing directories.
 * Collisions go through `resolveConflict`; without it they are skipped and reported.
 * @param params - Sources, destination, callbacks, cancellation token and progress sink.
 * @returns The operation result; never rejects for filesystem conditions.
 */
export async function copyEntries(params: TransferParams): Promise<OperationResult> {
	const fs = params.fs ?? nodeFileSystem;
	return runBulkOperation(
		'copy',
		params,
		params.sources.length,
		() => checkTransferRequest(fs, 'copy', params.sources, params.destinationDir),
		path.resolve(params.destinationDir)
	);
}

/**
 * Moves `sources` into `destinationDir`. Each root is renamed in one step when
 * possible; across devices entries are copied and then removed from the source.
 */
export async function moveEntries(params: TransferParams): Promise<OperationResult> {
	const fs = params.fs ?? nodeFileSystem;
	return runBulkOperation(
		'move',
		params,
		params.sources.length,
		() => checkTransferRequest(fs, 'move', params.sources, params.destinationDir),
		path.resolve(params.destinationDir)
	);
}

/**
 * Deletes `sources` recursively, children before parents. Symlinks are removed, not followed.
 */
export async function deleteEntries(params: DeleteParams): Promise<OperationResult> {
	const fs = params.fs ?? nodeFileSystem;
	return runBulkOperation('delete', params, params.sources.length, () => checkDeleteRequest(fs, params.sources));
}
