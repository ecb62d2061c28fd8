import * as path from 'path';
import { FileOpError, getErrorCode, toEntryError } from '../../common/errors';
import { validateFilename } from '../../common/filenameRules';
import { nodeFileSystem, type FileSystem } from '../../common/fileSystem';
import { noopLogger, type Logger } from '../../common/logger';
import type { EntryError } from '../../types';

export type SingleEntryResult = { ok: true; path: string } | { ok: false; error: EntryError };

export interface SingleEntryOptions {
	fs?: FileSystem;
	logger?: Logger;
}

function failure(target: string, error: unknown): SingleEntryResult {
	return { ok: false, error: toEntryError(target, error) };
}

async function exists(fs: FileSystem, target: string): Promise<boolean> {
	try {
		await fs.lstat(target);
		return true;
	} catch (error) {
		const code = getErrorCode(error);
		if (code === 'ENOENT' || code === 'ENOTDIR') return false;
		throw error;
	}
}

/**
 * Creates a directory along with any missing parents.
 * An existing entry of any kind at the final path is a `DestinationCollision`.
 */
export async function createDirectory(
	directoryPath: string,
	{ fs = nodeFileSystem, logger = noopLogger }: SingleEntryOptions = {}
): Promise<SingleEntryResult> {
	const target = path.resolve(directoryPath);
	const invalid = validateFilename(path.basename(target));
	if (invalid) return failure(target, new FileOpError('InvalidInput', invalid, { path: target }));

	try {
		// A recursive mkdir accepts an existing directory, so collisions are checked up front.
		if (await exists(fs, target)) {
			return failure(target, new FileOpError('DestinationCollision', `Already exists: ${target}`, { path: target }));
		}
		await fs.mkdir(target, { recursive: true });
		logger.info('mkdir', { path: target });
		return { ok: true, path: target };
	} catch (error) {
		return failure(target, error);
	}
}

/**
 * Renames an entry within its directory. The new name is validated and must not exist yet.
 */
export async function renameEntry(
	entryPath: string,
	newName: string,
	{ fs = nodeFileSystem, logger = noopLogger }: SingleEntryOptions = {}
): Promise<SingleEntryResult> {
	const source = path.resolve(entryPath);
	const invalid = validateFilename(newName);
	if (invalid) return failure(source, new FileOpError('InvalidInput', invalid, { path: source }));

	const target = path.join(path.dirname(source), newName);
	if (target === source) return { ok: true, path: target };

	try {
		if (!(await exists(fs, source))) {
			return failure(source, new FileOpError('NotFound', `Not found: ${source}`, { path: source }));
		}
		if (await exists(fs, target)) {
			return failure(target, new FileOpError('DestinationCollision', `Already exists: ${target}`, { path: target }));
		}
		await fs.rename(source, target);
		logger.info('rename', { from: source, to: target });
		return { ok: true, path: target };
	} catch (error) {
		return failure(source, error);
	}
}
