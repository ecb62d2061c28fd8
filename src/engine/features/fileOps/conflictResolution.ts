import * as path from 'path';
import type { CancellationToken } from '../../common/cancellation';
import { getErrorCode } from '../../common/errors';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';
import { isPathWithinRoot } from '../../common/pathUtils';
import type { ConflictResolution, EntryKind } from '../../types';
import { kindOf } from '../traversal/entryInfo';
import type { ConflictResolver, OperationPlan, PlanDisposition, PlanEntry } from './operationTypes';

/**
 * Kind of whatever exists at `target`, or undefined when nothing does.
 * Other lstat failures are treated as absent; execution reports the real error.
 */
export async function existingKindAt(fs: FileSystem, target: string, logger: Logger): Promise<EntryKind | undefined> {
	try {
		return kindOf(await fs.lstat(target));
	} catch (error) {
		const code = getErrorCode(error);
		if (code !== 'ENOENT' && code !== 'ENOTDIR') {
			logger.debug('plan: cannot inspect destination', { path: target, code });
		}
		return undefined;
	}
}

/**
 * Builds `name (n).ext` candidates; directories keep their full name as the stem.
 */
export function numberedName(name: string, n: number, isDirectory: boolean): string {
	const ext = isDirectory ? '' : path.extname(name);
	const stem = ext ? name.slice(0, -ext.length) : name;
	return `${stem} (${n})${ext}`;
}

/**
 * First `name (n).ext` in `directory` that neither exists nor is already taken by the plan.
 */
export async function uniqueDestination(
	fs: FileSystem,
	destinationPath: string,
	isDirectory: boolean,
	reserved: ReadonlySet<string>,
	logger: Logger
): Promise<string> {
	const directory = path.dirname(destinationPath);
	const name = path.basename(destinationPath);
	for (let n = 1; ; n++) {
		const candidate = path.join(directory, numberedName(name, n, isDirectory));
		if (reserved.has(candidate)) continue;
		if ((await existingKindAt(fs, candidate, logger)) === undefined) return candidate;
	}
}

/**
 * Index one past the last descendant of `entries[index]` (entries are in pre-order).
 */
export function subtreeEnd(entries: ReadonlyArray<PlanEntry>, index: number): number {
	const root = entries[index];
	let end = index + 1;
	if (root.kind !== 'directory') return end;
	while (end < entries.length && isPathWithinRoot(entries[end].sourcePath, root.sourcePath)) end++;
	return end;
}

function setSubtree(entries: PlanEntry[], index: number, disposition: PlanDisposition): void {
	const end = subtreeEnd(entries, index);
	for (let i = index + 1; i < end; i++) {
		if (entries[i].disposition !== 'skip') {
			entries[i].disposition = disposition;
			entries[i].existingKind = undefined;
		}
	}
}

export interface ResolveConflictsOptions {
	resolveConflict?: ConflictResolver;
	cancellationToken: CancellationToken;
	fs: FileSystem;
	logger: Logger;
}

/**
 * Walks the plan's collisions in order and applies the caller's decisions.
 * Skipping a directory skips its subtree; overwriting or renaming it turns its
 * subtree into fresh creations under the new destination.
 * @returns 'cancelled' when the resolver asked to cancel, otherwise 'resolved'.
 */
export async function resolveConflicts(
	plan: OperationPlan,
	{ resolveConflict, cancellationToken, fs, logger }: ResolveConflictsOptions
): Promise<'resolved' | 'cancelled'> {
	const { entries } = plan;
	const pending = entries.flatMap((entry, index) => (entry.disposition === 'conflict' ? [index] : []));
	const total = pending.length;
	const reserved = new Set(entries.flatMap((entry) => (entry.destinationPath ? [entry.destinationPath] : [])));
	let standing: 'overwrite' | 'skip' | undefined;

	for (let n = 0; n < pending.length; n++) {
		const index = pending[n];
		const entry = entries[index];
		// An ancestor's decision already settled this one.
		if (entry.disposition !== 'conflict') continue;
		if (cancellationToken.isCancellationRequested) return 'cancelled';

		const destinationPath = entry.destinationPath ?? '';
		const existingKind = entry.existingKind ?? 'file';

		if (!standing && !resolveConflict) {
			plan.errors.push({
				path: destinationPath,
				kind: 'DestinationCollision',
				message: `Destination already exists: ${destinationPath}`,
			});
			entry.disposition = 'skip';
			setSubtree(entries, index, 'skip');
			continue;
		}

		const info = {
			sourcePath: entry.sourcePath,
			destinationPath,
			relativePath: entry.relativePath,
			sourceKind: entry.kind,
			existingKind,
			index: n + 1,
			total,
		};

		let decision: ConflictResolution = standing ?? (resolveConflict ? await resolveConflict(info) : 'skip');
		if (decision === 'cancel') return 'cancelled';
		if (decision === 'overwriteAll') {
			standing = 'overwrite';
			decision = 'overwrite';
		} else if (decision === 'skipAll') {
			standing = 'skip';
			decision = 'skip';
		}
		logger.debug('plan: conflict resolved', { path: destinationPath, decision });

		switch (decision) {
			case 'skip':
				entry.disposition = 'skip';
				setSubtree(entries, index, 'skip');
				plan.skipped.push({ path: entry.sourcePath, reason: 'conflict' });
				plan.conflicts.push({ ...info, resolution: 'skip' });
				break;
			case 'overwrite':
				entry.disposition = 'overwrite';
				if (entry.kind === 'directory') setSubtree(entries, index, 'create');
				plan.conflicts.push({ ...info, resolution: 'overwrite' });
				break;
			case 'rename': {
				const renamed = await uniqueDestination(fs, destinationPath, entry.kind === 'directory', reserved, logger);
				reserved.add(renamed);
				entry.destinationPath = renamed;
				entry.disposition = 'create';
				entry.existingKind = undefined;
				const end = subtreeEnd(entries, index);
				for (let i = index + 1; i < end; i++) {
					const child = entries[i];
					if (child.destinationPath) {
						child.destinationPath = renamed + child.destinationPath.slice(destinationPath.length);
						reserved.add(child.destinationPath);
					}
				}
				setSubtree(entries, index, 'create');
				plan.conflicts.push({ ...info, resolution: 'rename', renamedTo: renamed });
				break;
			}
		}
	}

	return 'resolved';
}
