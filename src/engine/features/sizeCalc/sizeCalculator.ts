import { NEVER_CANCELLED, type CancellationToken } from '../../common/cancellation';
import { createConcurrencyLimiter, mapLimited } from '../../common/concurrencyLimiter';
import type { FileSystem } from '../../common/fileSystem';
import { noopLogger, type Logger } from '../../common/logger';
import type { DirCalcResult, OperationProgress, SymlinkPolicy } from '../../types';
import { walkTree } from '../traversal/walkTree';

export interface SizeCalcParams {
	rootPath: string;
	cancellationToken?: CancellationToken;
	onProgress?: (progress: OperationProgress) => void;
	symlinkPolicy?: SymlinkPolicy;
	maxDepth?: number;
	fs?: FileSystem;
	logger?: Logger;
}

export interface MultiSizeResult {
	results: DirCalcResult[];
	totalSize: number;
	fileCount: number;
	dirCount: number;
	partial: boolean;
}

function sizeProgress(result: DirCalcResult, currentPath: string): OperationProgress {
	return {
		operation: 'size',
		phase: 'scanning',
		currentPath,
		bytesDone: result.totalSize,
		bytesTotal: 0,
		entriesDone: result.fileCount + result.dirCount,
		entriesTotal: 0,
		currentFileBytesDone: 0,
		currentFileBytesTotal: 0,
	};
}

/**
 * Aggregates size, file and directory counts under one root.
 * Files and symlinks count as files (symlinks with their own size); sockets and
 * FIFOs are ignored. Every diagnostic lands in `errors`; cancellation returns the
 * partial aggregate.
 * @param params - Root, cancellation, progress callback and walk options.
 * @returns Aggregate for the root.
 */
export async function calculateDirectorySize({
	rootPath,
	cancellationToken = NEVER_CANCELLED,
	onProgress,
	symlinkPolicy,
	maxDepth,
	fs,
	logger = noopLogger,
}: SizeCalcParams): Promise<DirCalcResult> {
	const result: DirCalcResult = {
		rootPath,
		totalSize: 0,
		fileCount: 0,
		dirCount: 0,
		errors: [],
		partial: false,
	};

	for await (const event of walkTree({ rootPath, symlinkPolicy, maxDepth, cancellationToken, fs, logger })) {
		switch (event.type) {
			case 'enterDir':
				if (event.depth > 0) result.dirCount++;
				onProgress?.(sizeProgress(result, event.path));
				break;
			case 'file':
				if (event.entry.kind === 'file' || event.entry.kind === 'symlink') {
					result.fileCount++;
					result.totalSize += event.entry.size;
				}
				break;
			case 'leaveDir':
				break;
			case 'diagnostic':
				if (event.kind === 'Cancelled') {
					result.partial = true;
					result.partialReason = 'cancelled';
				} else {
					result.errors.push({ path: event.path, kind: event.kind, message: event.message });
				}
				break;
		}
	}

	logger.debug('size: done', {
		rootPath,
		totalSize: result.totalSize,
		fileCount: result.fileCount,
		errors: result.errors.length,
		partial: result.partial,
	});

	return result;
}

/**
 * Measures several roots (a panel selection) with bounded concurrency.
 * Progress reports the running total over all roots.
 */
export async function calculateSizes(
	rootPaths: ReadonlyArray<string>,
	params: Omit<SizeCalcParams, 'rootPath'> & { concurrentOperations?: number }
): Promise<MultiSizeResult> {
	const { concurrentOperations = 4, onProgress, ...rest } = params;
	const runLimited = createConcurrencyLimiter(concurrentOperations);
	const running = new Map<string, OperationProgress>();

	const results = await mapLimited(rootPaths, runLimited, (rootPath) =>
		calculateDirectorySize({
			...rest,
			rootPath,
			onProgress: onProgress
				? (progress) => {
						running.set(rootPath, progress);
						let bytesDone = 0;
						let entriesDone = 0;
						for (const item of running.values()) {
							bytesDone += item.bytesDone;
							entriesDone += item.entriesDone;
						}
						onProgress({ ...progress, bytesDone, entriesDone });
					}
				: undefined,
		})
	);

	return {
		results,
		totalSize: results.reduce((sum, r) => sum + r.totalSize, 0),
		fileCount: results.reduce((sum, r) => sum + r.fileCount, 0),
		dirCount: results.reduce((sum, r) => sum + r.dirCount, 0),
		partial: results.some((r) => r.partial),
	};
}
