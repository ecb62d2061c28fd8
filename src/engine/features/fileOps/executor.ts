import type { CancellationToken } from '../../common/cancellation';
import {
	FileOpError,
	getErrorCode,
	isCrossDeviceError,
	isVolumeFullError,
	toEntryError,
	toErrorMessage,
} from '../../common/errors';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';
import { ancestorsWithinRoot, isPathWithinRoot } from '../../common/pathUtils';
import type { EntryError, OperationProgress } from '../../types';
import { copyFileAtomic } from './fileCopy';
import type { OperationPlan, PlanEntry, PlanRoot } from './operationTypes';

export interface ExecuteOptions {
	cancellationToken: CancellationToken;
	onProgress?: (progress: OperationProgress) => void;
	allowCrossDevice: boolean;
	chunkSize: number;
	fs: FileSystem;
	logger: Logger;
}

export interface ExecutionOutcome {
	entriesCompleted: number;
	bytesDone: number;
	errors: EntryError[];
	crossDeviceFallbacks: number;
	cancelled: boolean;
	fatal?: FileOpError;
}

const ACTIONABLE = new Set<PlanEntry['disposition']>(['create', 'merge', 'overwrite', 'remove']);

/**
 * Mutable bookkeeping shared by the copy, move and delete loops.
 */
class ExecutionContext {
	readonly outcome: ExecutionOutcome = {
		entriesCompleted: 0,
		bytesDone: 0,
		errors: [],
		crossDeviceFallbacks: 0,
		cancelled: false,
	};
	/** Source directories whose subtree is no longer processed */
	private readonly failedDirectories: string[] = [];
	/** Directories created at the destination; their metadata is applied last */
	readonly createdDirectories: PlanEntry[] = [];

	constructor(
		readonly plan: OperationPlan,
		readonly options: ExecuteOptions
	) {}

	get fs(): FileSystem {
		return this.options.fs;
	}

	/**
	 * True when the loop must stop: a fatal error happened or cancellation was requested.
	 */
	shouldStop(): boolean {
		if (this.outcome.fatal) return true;
		if (this.options.cancellationToken.isCancellationRequested) {
			this.outcome.cancelled = true;
			return true;
		}
		return false;
	}

	isBlocked(entry: PlanEntry): boolean {
		return this.failedDirectories.some((directory) => isPathWithinRoot(entry.sourcePath, directory));
	}

	report(currentPath: string, currentFileBytesDone = 0, currentFileBytesTotal = 0): void {
		this.options.onProgress?.({
			operation: this.plan.operation,
			phase: 'executing',
			currentPath,
			bytesDone: this.outcome.bytesDone + currentFileBytesDone,
			bytesTotal: this.plan.totals.bytes,
			entriesDone: this.outcome.entriesCompleted,
			entriesTotal: this.plan.totals.entries,
			currentFileBytesDone,
			currentFileBytesTotal,
		});
	}

	complete(entry: PlanEntry): void {
		this.outcome.entriesCompleted++;
		this.outcome.bytesDone += entry.size;
		this.report(entry.sourcePath);
	}

	/**
	 * Records a per-entry failure, or escalates it when the destination itself is gone or full.
	 */
	async fail(entry: PlanEntry, error: unknown): Promise<void> {
		const fatal = await this.fatalCause(error);
		if (fatal) {
			this.outcome.fatal = fatal;
			this.outcome.errors.push(fatal.toEntryError(entry.destinationPath ?? entry.sourcePath));
			this.options.logger.error('exec: aborted', { path: entry.sourcePath, reason: fatal.message });
			return;
		}

		this.outcome.errors.push(toEntryError(entry.sourcePath, error));
		if (entry.kind === 'directory') this.failedDirectories.push(entry.sourcePath);
		this.options.logger.warn('exec: entry failed', { path: entry.sourcePath, error: toErrorMessage(error) });
	}

	private async fatalCause(error: unknown): Promise<FileOpError | undefined> {
		if (isVolumeFullError(error)) {
			return new FileOpError('IOFailure', `Destination volume is full: ${toErrorMessage(error)}`, {
				fatal: true,
				cause: error,
			});
		}
		const destinationDir = this.plan.destinationDir;
		if (destinationDir && getErrorCode(error) === 'ENOENT') {
			try {
				await this.fs.stat(destinationDir);
			} catch {
				return new FileOpError('NotFound', `Destination was removed: ${destinationDir}`, {
					path: destinationDir,
					fatal: true,
					cause: error,
				});
			}
		}
		return undefined;
	}
}

function destinationOf(entry: PlanEntry): string {
	if (entry.destinationPath === undefined) {
		throw new FileOpError('InvalidInput', `No destination planned for ${entry.sourcePath}`, { path: entry.sourcePath });
	}
	return entry.destinationPath;
}

/**
 * Clears what sits at the destination when the new entry cannot simply replace it by rename.
 */
async function clearForOverwrite(ctx: ExecutionContext, entry: PlanEntry, destination: string): Promise<void> {
	if (entry.disposition !== 'overwrite') return;
	if (entry.kind !== 'file' || entry.existingKind === 'directory') {
		await ctx.fs.rm(destination);
	}
}

async function createDirectory(ctx: ExecutionContext, entry: PlanEntry, destination: string): Promise<void> {
	if (entry.disposition === 'merge') return;
	await clearForOverwrite(ctx, entry, destination);
	try {
		await ctx.fs.mkdir(destination);
	} catch (error) {
		// Appeared since planning: merge into it.
		if (getErrorCode(error) !== 'EEXIST' || !(await ctx.fs.lstat(destination)).isDirectory()) throw error;
	}
	ctx.createdDirectories.push(entry);
}

/**
 * Recreates one non-directory entry at its destination by copying.
 */
async function copyLeaf(ctx: ExecutionContext, entry: PlanEntry, destination: string): Promise<void> {
	const { fs, logger, chunkSize } = ctx.options;
	await clearForOverwrite(ctx, entry, destination);

	switch (entry.kind) {
		case 'file':
			await copyFileAtomic({
				sourcePath: entry.sourcePath,
				destinationPath: destination,
				mode: entry.mode,
				atimeMs: entry.atimeMs,
				mtimeMs: entry.mtimeMs,
				chunkSize,
				onChunk: (copied) => ctx.report(entry.sourcePath, copied, entry.size),
				fs,
				logger,
			});
			return;
		case 'symlink':
			await fs.symlink(entry.linkTarget ?? (await fs.readlink(entry.sourcePath)), destination);
			return;
		default:
			throw new FileOpError('IOFailure', `Cannot copy special file: ${entry.sourcePath}`, { path: entry.sourcePath });
	}
}

/**
 * Stamps created directories with their source mode and times, deepest first,
 * once nothing else will be written into them.
 */
async function finishDirectories(ctx: ExecutionContext): Promise<void> {
	for (const entry of [...ctx.createdDirectories].reverse()) {
		const destination = destinationOf(entry);
		try {
			await ctx.fs.chmod(destination, entry.mode & 0o7777);
			await ctx.fs.utimes(destination, new Date(entry.atimeMs), new Date(entry.mtimeMs));
		} catch (error) {
			ctx.outcome.errors.push(toEntryError(destination, error));
		}
	}
}

async function executeCopy(ctx: ExecutionContext): Promise<void> {
	for (const entry of ctx.plan.entries) {
		if (!ACTIONABLE.has(entry.disposition) || ctx.isBlocked(entry)) continue;
		if (ctx.shouldStop()) break;

		try {
			const destination = destinationOf(entry);
			if (entry.kind === 'directory') await createDirectory(ctx, entry, destination);
			else await copyLeaf(ctx, entry, destination);
			ctx.complete(entry);
		} catch (error) {
			await ctx.fail(entry, error);
		}
	}
	await finishDirectories(ctx);
}

function rootEntries(plan: OperationPlan, root: PlanRoot): PlanEntry[] {
	return plan.entries.slice(root.firstEntry, root.firstEntry + root.entryCount);
}

function crossDeviceRefused(root: PlanRoot): FileOpError {
	return new FileOpError('CrossDeviceMove', `Source and destination are on different devices: ${root.sourcePath}`, {
		path: root.sourcePath,
	});
}

/**
 * Removes emptied source directories of a root, children before parents.
 * A directory that still holds something simply stays.
 */
async function removeEmptiedSources(ctx: ExecutionContext, entries: PlanEntry[]): Promise<void> {
	const directories = entries.filter((entry) => entry.kind === 'directory' && ACTIONABLE.has(entry.disposition));
	for (const entry of directories.reverse()) {
		try {
			await ctx.fs.rmdir(entry.sourcePath);
		} catch (error) {
			const code = getErrorCode(error);
			if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT') continue;
			ctx.outcome.errors.push(toEntryError(entry.sourcePath, error));
		}
	}
}

type RootMove = 'moved' | 'perEntry' | 'crossDevice' | 'failed';

/**
 * One atomic rename of the whole root when nothing under it needs individual treatment.
 */
async function moveWholeRoot(ctx: ExecutionContext, root: PlanRoot, entries: PlanEntry[]): Promise<RootMove> {
	const [first] = entries;
	if (!first || first.disposition !== 'create' || entries.some((entry) => !ACTIONABLE.has(entry.disposition))) {
		return 'perEntry';
	}

	try {
		await ctx.fs.rename(root.sourcePath, destinationOf(first));
	} catch (error) {
		if (isCrossDeviceError(error)) return 'crossDevice';
		await ctx.fail(first, error);
		return 'failed';
	}

	for (const entry of entries) {
		ctx.outcome.entriesCompleted++;
		ctx.outcome.bytesDone += entry.size;
	}
	ctx.report(root.sourcePath);
	return 'moved';
}

async function executeMove(ctx: ExecutionContext): Promise<void> {
	const { allowCrossDevice, logger } = ctx.options;

	for (const root of ctx.plan.roots) {
		if (ctx.shouldStop()) break;
		const entries = rootEntries(ctx.plan, root);

		const whole = await moveWholeRoot(ctx, root, entries);
		if (whole === 'moved' || whole === 'failed') continue;

		let crossDevice = whole === 'crossDevice';
		if (crossDevice) {
			if (!allowCrossDevice) {
				ctx.outcome.errors.push(crossDeviceRefused(root).toEntryError());
				continue;
			}
			ctx.outcome.crossDeviceFallbacks++;
			logger.info('exec: cross-device move, copying instead', { path: root.sourcePath });
		}

		let refused = false;
		for (const entry of entries) {
			if (!ACTIONABLE.has(entry.disposition) || ctx.isBlocked(entry)) continue;
			if (ctx.shouldStop()) break;

			try {
				const destination = destinationOf(entry);
				if (entry.kind === 'directory') {
					await createDirectory(ctx, entry, destination);
					ctx.complete(entry);
					continue;
				}

				if (!crossDevice) {
					try {
						await clearForOverwrite(ctx, entry, destination);
						await ctx.fs.rename(entry.sourcePath, destination);
						ctx.complete(entry);
						continue;
					} catch (error) {
						if (!isCrossDeviceError(error)) throw error;
						if (!allowCrossDevice) {
							refused = true;
							break;
						}
						crossDevice = true;
						ctx.outcome.crossDeviceFallbacks++;
						logger.info('exec: cross-device move, copying instead', { path: root.sourcePath });
					}
				}

				await copyLeaf(ctx, entry, destination);
				await ctx.fs.unlink(entry.sourcePath);
				ctx.complete(entry);
			} catch (error) {
				await ctx.fail(entry, error);
			}
		}

		if (refused) {
			ctx.outcome.errors.push(crossDeviceRefused(root).toEntryError());
			continue;
		}
		if (!ctx.outcome.cancelled && !ctx.outcome.fatal) await removeEmptiedSources(ctx, entries);
	}
	await finishDirectories(ctx);
}

async function executeDelete(ctx: ExecutionContext): Promise<void> {
	const retained = new Set<string>();

	for (const entry of ctx.plan.entries) {
		if (entry.disposition !== 'remove' || retained.has(entry.sourcePath)) continue;
		if (ctx.shouldStop()) break;

		try {
			if (entry.kind === 'directory') await ctx.fs.rmdir(entry.sourcePath);
			else await ctx.fs.unlink(entry.sourcePath);
			ctx.complete(entry);
		} catch (error) {
			await ctx.fail(entry, error);
			const root = ctx.plan.roots[entry.rootIndex];
			for (const ancestor of ancestorsWithinRoot(entry.sourcePath, root.sourcePath)) retained.add(ancestor);
		}
	}
}

/**
 * Carries out a resolved plan. Per-entry failures are collected; cancellation is
 * honored between entries; a full or vanished destination stops everything.
 * @param plan - Plan produced by `buildPlan`.
 * @param options - Token, progress sink, limits and fs port.
 * @returns Counters and errors of the run.
 */
export async function executePlan(plan: OperationPlan, options: ExecuteOptions): Promise<ExecutionOutcome> {
	const ctx = new ExecutionContext(plan, options);
	ctx.report('');

	switch (plan.operation) {
		case 'copy':
			await executeCopy(ctx);
			break;
		case 'move':
			await executeMove(ctx);
			break;
		case 'delete':
			await executeDelete(ctx);
			break;
	}

	return ctx.outcome;
}
