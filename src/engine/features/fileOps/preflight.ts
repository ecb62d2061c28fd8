import * as path from 'path';
import { FileOpError, getErrorCode, toErrorMessage } from '../../common/errors';
import type { FileSystem } from '../../common/fileSystem';
import { isPathWithinRoot } from '../../common/pathUtils';
import type { BulkOperationKind, EntryKind } from '../../types';
import { kindOf } from '../traversal/entryInfo';

/** System directories a delete request may never target */
export const PROTECTED_PATHS: ReadonlySet<string> = new Set([
	'/',
	'/bin',
	'/boot',
	'/dev',
	'/etc',
	'/home',
	'/lib',
	'/lib64',
	'/opt',
	'/proc',
	'/root',
	'/sbin',
	'/sys',
	'/tmp',
	'/usr',
	'/var',
]);

/** Link targets under these directories need confirmation before being copied or moved */
export const SENSITIVE_LINK_PREFIXES: ReadonlyArray<string> = ['/etc', '/sys', '/proc', '/boot', '/root', '/var/log'];

export interface CheckedSource {
	/** Absolute source path as given (links not resolved) */
	sourcePath: string;
	kind: EntryKind;
	/** Where the source lands, for copy and move */
	destinationPath?: string;
}

/**
 * Resolves the parent directory through realpath but keeps the final component,
 * so a symlink source is compared as the link itself.
 */
async function realLocation(fs: FileSystem, target: string): Promise<string> {
	const parent = await fs.realpath(path.dirname(target));
	return path.join(parent, path.basename(target));
}

function verbFor(operation: BulkOperationKind): string {
	return operation === 'move' ? 'move' : operation === 'delete' ? 'delete' : 'copy';
}

/**
 * Drops duplicates and sources nested inside another source; the outer one covers them.
 */
export function normalizeSources(sources: ReadonlyArray<string>): string[] {
	const resolved = [...new Set(sources.map((source) => path.resolve(source)))];
	return resolved.filter((candidate) => !resolved.some((other) => other !== candidate && isPathWithinRoot(candidate, other)));
}

async function lstatSource(fs: FileSystem, sourcePath: string): Promise<EntryKind> {
	try {
		return kindOf(await fs.lstat(sourcePath));
	} catch (error) {
		const code = getErrorCode(error);
		if (code === 'ENOENT' || code === 'ENOTDIR') {
			throw new FileOpError('NotFound', `Source not found: ${sourcePath}`, { path: sourcePath, cause: error });
		}
		throw new FileOpError('IOFailure', toErrorMessage(error), { path: sourcePath, cause: error });
	}
}

/**
 * Validates a copy or move request before anything is planned.
 * @throws FileOpError `NotFound` for a missing source or destination, `InvalidInput`
 * when a source is its own destination, contains the destination, or two sources share a name.
 */
export async function checkTransferRequest(
	fs: FileSystem,
	operation: BulkOperationKind,
	sources: ReadonlyArray<string>,
	destinationDir: string
): Promise<CheckedSource[]> {
	const destination = path.resolve(destinationDir);
	let realDestination: string;
	try {
		const stats = await fs.stat(destination);
		if (!stats.isDirectory()) {
			throw new FileOpError('NotFound', `Destination is not a directory: ${destination}`, { path: destination });
		}
		realDestination = await fs.realpath(destination);
	} catch (error) {
		if (error instanceof FileOpError) throw error;
		throw new FileOpError('NotFound', `Destination not found: ${destination}`, { path: destination, cause: error });
	}

	const checked: CheckedSource[] = [];
	const names = new Set<string>();

	for (const sourcePath of normalizeSources(sources)) {
		const kind = await lstatSource(fs, sourcePath);
		const realSource = await realLocation(fs, sourcePath);
		const name = path.basename(sourcePath);

		if (path.dirname(realSource) === realDestination || realSource === realDestination) {
			throw new FileOpError('InvalidInput', `Source and destination are the same: ${sourcePath}`, { path: sourcePath });
		}
		if (kind === 'directory' && isPathWithinRoot(realDestination, realSource)) {
			throw new FileOpError('InvalidInput', `Cannot ${verbFor(operation)} a directory into itself: ${sourcePath}`, {
				path: sourcePath,
			});
		}
		if (names.has(name)) {
			throw new FileOpError('InvalidInput', `Two sources share the name "${name}"`, { path: sourcePath });
		}
		names.add(name);

		checked.push({ sourcePath, kind, destinationPath: path.join(destination, name) });
	}

	return checked;
}

/**
 * Validates a delete request.
 * @throws FileOpError `NotFound` for a missing source, `PermissionDenied` for a protected path.
 */
export async function checkDeleteRequest(fs: FileSystem, sources: ReadonlyArray<string>): Promise<CheckedSource[]> {
	const checked: CheckedSource[] = [];

	for (const sourcePath of normalizeSources(sources)) {
		const kind = await lstatSource(fs, sourcePath);
		const realSource = await realLocation(fs, sourcePath);
		if (PROTECTED_PATHS.has(sourcePath) || PROTECTED_PATHS.has(realSource)) {
			throw new FileOpError('PermissionDenied', `Refusing to delete protected path: ${sourcePath}`, { path: sourcePath });
		}
		checked.push({ sourcePath, kind });
	}

	return checked;
}

/**
 * True when a symlink's target resolves under a sensitive system directory.
 * Relative link text is resolved against the link's own directory.
 */
export function isSensitiveLinkTarget(linkPath: string, linkTarget: string): boolean {
	const resolved = path.resolve(path.dirname(linkPath), linkTarget);
	return SENSITIVE_LINK_PREFIXES.some((prefix) => isPathWithinRoot(resolved, prefix));
}
