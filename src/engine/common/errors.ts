import type { EntryError, FileOpErrorKind } from '../types';

/**
 * Error raised by file operations, tagged with the shared taxonomy.
 */
export class FileOpError extends Error {
	readonly kind: FileOpErrorKind;
	readonly path: string | undefined;
	/** The operation cannot continue (destination full, destination removed) */
	readonly fatal: boolean;

	constructor(kind: FileOpErrorKind, message: string, options: { path?: string; fatal?: boolean; cause?: unknown } = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = 'FileOpError';
		this.kind = kind;
		this.path = options.path;
		this.fatal = options.fatal ?? false;
	}

	toEntryError(fallbackPath = ''): EntryError {
		return { path: this.path ?? fallbackPath, kind: this.kind, message: this.message };
	}
}

/**
 * Returns the Node error code of a thrown value, if any.
 */
export function getErrorCode(error: unknown): string | undefined {
	if (error && typeof error === 'object' && 'code' in error) {
		return typeof error.code === 'string' ? error.code : undefined;
	}
	return undefined;
}

export function isCrossDeviceError(error: unknown): boolean {
	return getErrorCode(error) === 'EXDEV';
}

/**
 * Destination volume out of space or quota.
 */
export function isVolumeFullError(error: unknown): boolean {
	const code = getErrorCode(error);
	return code === 'ENOSPC' || code === 'EDQUOT';
}

/**
 * Maps a thrown filesystem error onto the shared taxonomy.
 */
export function classifyFsError(error: unknown): FileOpErrorKind {
	if (error instanceof FileOpError) return error.kind;

	switch (getErrorCode(error)) {
		case 'ENOENT':
		case 'ENOTDIR':
			return 'NotFound';
		case 'EACCES':
		case 'EPERM':
			return 'PermissionDenied';
		case 'ELOOP':
			return 'CyclicSymlink';
		case 'EXDEV':
			return 'CrossDeviceMove';
		case 'EEXIST':
		case 'ENOTEMPTY':
			return 'DestinationCollision';
		default:
			return 'IOFailure';
	}
}

/**
 * Normalizes any thrown value into a message string.
 */
export function toErrorMessage(value: unknown): string {
	if (value instanceof Error) return value.message || value.name;
	if (typeof value === 'string') return value || 'Unknown error';
	try {
		const json = JSON.stringify(value);
		return json ?? String(value);
	} catch {
		return String(value);
	}
}

/**
 * Builds an entry error from a thrown value.
 */
export function toEntryError(path: string, error: unknown): EntryError {
	if (error instanceof FileOpError) return error.toEntryError(path);
	return { path, kind: classifyFsError(error), message: toErrorMessage(error) };
}
