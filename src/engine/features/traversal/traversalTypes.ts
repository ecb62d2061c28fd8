import type { CancellationToken } from '../../common/cancellation';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';
import type { EntryKind, FileOpErrorKind, SymlinkPolicy } from '../../types';

export const DEFAULT_MAX_DEPTH = 256;

/**
 * Stable name of a filesystem object, independent of the path used to reach it.
 */
export interface EntryIdentity {
	dev: number;
	ino: number;
}

export interface SymlinkTarget {
	kind: Exclude<EntryKind, 'symlink'>;
	size: number;
	identity: EntryIdentity;
}

export interface EntryInfo {
	path: string;
	/** NFC-normalized base name, the form used for matching and display */
	name: string;
	kind: EntryKind;
	/** Size of the object itself (`lstat`) */
	size: number;
	mtimeMs: number;
	atimeMs: number;
	mode: number;
	identity: EntryIdentity;
	/** Raw link text (symlinks only) */
	linkTarget?: string;
	/** Resolved target metadata; absent for broken links */
	target?: SymlinkTarget;
	/** Error code of resolving the target (`ENOENT`, `ELOOP`, ...) when `target` is absent */
	targetErrorCode?: string;
}

export type DiagnosticKind = Extract<
	FileOpErrorKind,
	'NotFound' | 'PermissionDenied' | 'CyclicSymlink' | 'DepthExceeded' | 'Cancelled' | 'IOFailure'
>;

interface VisitBase {
	path: string;
	/** Path relative to the walk root ('' for the root itself) */
	relativePath: string;
	depth: number;
}

export type VisitEvent =
	| (VisitBase & { type: 'enterDir'; entry: EntryInfo })
	| (VisitBase & { type: 'file'; entry: EntryInfo })
	| (VisitBase & { type: 'leaveDir' })
	| (VisitBase & { type: 'diagnostic'; kind: DiagnosticKind; message: string });

export type DiagnosticEvent = Extract<VisitEvent, { type: 'diagnostic' }>;

export interface TraversalOptions {
	rootPath: string;
	symlinkPolicy?: SymlinkPolicy;
	/** Deepest directory level that is still entered (the root is level 0) */
	maxDepth?: number;
	cancellationToken?: CancellationToken;
	fs?: FileSystem;
	logger?: Logger;
}
