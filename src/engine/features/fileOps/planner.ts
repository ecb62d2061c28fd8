import * as path from 'path';
import type { CancellationToken } from '../../common/cancellation';
import { createConcurrencyLimiter, mapLimited } from '../../common/concurrencyLimiter';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';
import { ancestorsWithinRoot, joinRelative } from '../../common/pathUtils';
import type { BulkOperationKind, FileOpErrorKind, OperationProgress } from '../../types';
import type { EntryInfo } from '../traversal/traversalTypes';
import { walkTree } from '../traversal/walkTree';
import { existingKindAt, resolveConflicts } from './conflictResolution';
import type { ConflictResolver, OperationPlan, PlanEntry, PlanRoot, SensitiveSymlinkHandler } from './operationTypes';
import { isSensitiveLinkTarget, type CheckedSource } from './preflight';

export interface PlanRequest {
	operation: BulkOperationKind;
	sources: ReadonlyArray<CheckedSource>;
	destinationDir?: string;
	resolveConflict?: ConflictResolver;
	onSensitiveSymlinks?: SensitiveSymlinkHandler;
	cancellationToken: CancellationToken;
	onProgress?: (progress: OperationProgress) => void;
	maxDepth: number;
	concurrentOperations: number;
	fs: FileSystem;
	logger: Logger;
}

export type PlanOutcome =
	| { type: 'planned'; plan: OperationPlan }
	| { type: 'cancelled'; plan: OperationPlan }
	| { type: 'aborted'; plan: OperationPlan; reason: string };

function planEntry(
	entry: EntryInfo,
	rootIndex: number,
	relativePath: string,
	destinationPath: string | undefined,
	disposition: PlanEntry['disposition']
): PlanEntry {
	return {
		sourcePath: entry.path,
		relativePath,
		rootIndex,
		destinationPath,
		kind: entry.kind,
		size: entry.kind === 'directory' ? 0 : entry.size,
		mode: entry.mode,
		atimeMs: entry.atimeMs,
		mtimeMs: entry.mtimeMs,
		linkTarget: entry.linkTarget,
		disposition,
	};
}

function planningProgress(operation: BulkOperationKind, plan: OperationPlan, currentPath: string): OperationProgress {
	return {
		operation,
		phase: 'planning',
		currentPath,
		bytesDone: 0,
		bytesTotal: 0,
		entriesDone: plan.entries.length,
		entriesTotal: 0,
		currentFileBytesDone: 0,
		currentFileBytesTotal: 0,
	};
}

type WalkOutcome = 'done' | 'cancelled' | { kind: FileOpErrorKind; reason: string };

/**
 * Walks one source root (opaque symlinks) and appends its entries to the plan:
 * pre-order for copy and move, post-order for delete.
 */
async function walkSource(
	request: PlanRequest,
	plan: OperationPlan,
	source: CheckedSource,
	rootIndex: number
): Promise<WalkOutcome> {
	const { operation, cancellationToken, maxDepth, fs, logger, onProgress } = request;
	const rootName = path.basename(source.sourcePath);
	const openDirectories: PlanEntry[] = [];
	const failedPaths: string[] = [];

	for await (const event of walkTree({
		rootPath: source.sourcePath,
		symlinkPolicy: 'opaque',
		maxDepth,
		cancellationToken,
		fs,
		logger,
	})) {
		if (event.type === 'diagnostic') {
			if (event.kind === 'Cancelled') return 'cancelled';
			if (event.relativePath === '') return { kind: event.kind, reason: event.message };
			plan.errors.push({ path: event.path, kind: event.kind, message: event.message });
			failedPaths.push(event.path);
			continue;
		}

		const relativePath = joinRelative(rootName, event.relativePath);
		const destinationPath = source.destinationPath ? joinRelative(source.destinationPath, event.relativePath) : undefined;

		switch (event.type) {
			case 'enterDir': {
				const entry = planEntry(event.entry, rootIndex, relativePath, destinationPath, 'create');
				if (operation === 'delete') {
					entry.disposition = 'remove';
					openDirectories.push(entry);
				} else {
					plan.entries.push(entry);
				}
				onProgress?.(planningProgress(operation, plan, event.path));
				break;
			}
			case 'leaveDir': {
				const entry = openDirectories.pop();
				if (entry) plan.entries.push(entry);
				break;
			}
			case 'file': {
				const entry = planEntry(event.entry, rootIndex, relativePath, destinationPath, 'create');
				if (operation === 'delete') entry.disposition = 'remove';
				else if (operation === 'copy' && entry.kind === 'other') {
					entry.disposition = 'skip';
					plan.skipped.push({ path: entry.sourcePath, reason: 'unsupported' });
				}
				plan.entries.push(entry);
				break;
			}
		}
	}

	if (operation === 'delete' && failedPaths.length > 0) {
		// Directories above an entry that stays can never become empty.
		const retained = new Set(failedPaths.flatMap((failed) => ancestorsWithinRoot(failed, source.sourcePath)));
		for (const entry of plan.entries) {
			if (entry.rootIndex === rootIndex && entry.kind === 'directory' && retained.has(entry.sourcePath)) {
				entry.disposition = 'retain';
			}
		}
	}

	return 'done';
}

async function applySensitiveSymlinks(request: PlanRequest, plan: OperationPlan): Promise<'done' | 'cancelled'> {
	const sensitive = plan.entries.filter(
		(entry) =>
			entry.kind === 'symlink' &&
			entry.disposition !== 'skip' &&
			entry.linkTarget !== undefined &&
			isSensitiveLinkTarget(entry.sourcePath, entry.linkTarget)
	);
	if (sensitive.length === 0) return 'done';

	const paths = sensitive.map((entry) => entry.sourcePath);
	const decision = request.onSensitiveSymlinks ? await request.onSensitiveSymlinks(paths) : 'exclude';
	request.logger.info('plan: sensitive symlinks found', { count: sensitive.length, decision });

	if (decision === 'cancel') return 'cancelled';
	if (decision === 'exclude') {
		for (const entry of sensitive) {
			entry.disposition = 'skip';
			plan.excludedSymlinks.push(entry.sourcePath);
			plan.skipped.push({ path: entry.sourcePath, reason: 'excluded' });
		}
	}
	return 'done';
}

/**
 * Looks at every planned destination (bounded concurrency) and marks merges and collisions.
 */
async function detectCollisions(request: PlanRequest, plan: OperationPlan): Promise<void> {
	const runLimited = createConcurrencyLimiter(request.concurrentOperations);
	const candidates = plan.entries.filter((entry) => entry.disposition === 'create' && entry.destinationPath);

	const existing = await mapLimited(candidates, runLimited, (entry) =>
		existingKindAt(request.fs, entry.destinationPath ?? '', request.logger)
	);

	candidates.forEach((entry, index) => {
		const existingKind = existing[index];
		if (existingKind === undefined) return;
		if (entry.kind === 'directory' && existingKind === 'directory') {
			entry.disposition = 'merge';
			return;
		}
		entry.disposition = 'conflict';
		entry.existingKind = existingKind;
	});
}

function computeTotals(plan: OperationPlan): void {
	let bytes = 0;
	let entries = 0;
	for (const entry of plan.entries) {
		if (entry.disposition === 'skip' || entry.disposition === 'retain' || entry.disposition === 'conflict') continue;
		entries++;
		bytes += entry.size;
	}
	plan.totals = { bytes, entries };
}

/**
 * Builds the full plan for a bulk operation without mutating anything.
 * @param request - Checked sources, callbacks and limits.
 * @returns The plan, or why planning stopped.
 */
export async function buildPlan(request: PlanRequest): Promise<PlanOutcome> {
	const { operation, sources, logger } = request;
	const plan: OperationPlan = {
		operation,
		destinationDir: request.destinationDir,
		roots: [],
		entries: [],
		totals: { bytes: 0, entries: 0 },
		errors: [],
		conflicts: [],
		skipped: [],
		excludedSymlinks: [],
	};

	for (let rootIndex = 0; rootIndex < sources.length; rootIndex++) {
		const source = sources[rootIndex];
		const firstEntry = plan.entries.length;
		const outcome = await walkSource(request, plan, source, rootIndex);
		if (outcome === 'cancelled') return { type: 'cancelled', plan };
		if (outcome !== 'done') {
			plan.errors.push({ path: source.sourcePath, kind: outcome.kind, message: outcome.reason });
			return { type: 'aborted', plan, reason: `Cannot read ${source.sourcePath}: ${outcome.reason}` };
		}
		const root: PlanRoot = {
			sourcePath: source.sourcePath,
			destinationPath: source.destinationPath,
			kind: source.kind,
			firstEntry,
			entryCount: plan.entries.length - firstEntry,
		};
		plan.roots.push(root);
	}

	if (operation !== 'delete') {
		if ((await applySensitiveSymlinks(request, plan)) === 'cancelled') return { type: 'cancelled', plan };
		await detectCollisions(request, plan);
		const resolution = await resolveConflicts(plan, {
			resolveConflict: request.resolveConflict,
			cancellationToken: request.cancellationToken,
			fs: request.fs,
			logger,
		});
		if (resolution === 'cancelled') return { type: 'cancelled', plan };
	}

	computeTotals(plan);
	logger.debug('plan: ready', {
		operation,
		entries: plan.totals.entries,
		bytes: plan.totals.bytes,
		errors: plan.errors.length,
		conflicts: plan.conflicts.length,
	});
	return { type: 'planned', plan };
}
