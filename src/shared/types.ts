/**
 * Shared types for panefs
 *
 * These types are used by both the engine and the panel views.
 * This file is the single source of truth for shared type definitions.
 */

// ============================================================================
// Entries & Diagnostics
// ============================================================================

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

/**
 * Error taxonomy shared by traversal diagnostics and operation results.
 */
export type FileOpErrorKind =
	| 'NotFound'
	| 'PermissionDenied'
	| 'CyclicSymlink'
	| 'DepthExceeded'
	| 'Cancelled'
	| 'DestinationCollision'
	| 'CrossDeviceMove'
	| 'IOFailure'
	| 'PartialFailure'
	| 'InvalidInput';

export interface EntryError {
	/** Absolute path of the entry that failed */
	path: string;
	kind: FileOpErrorKind;
	message: string;
}

// ============================================================================
// Operations & Progress
// ============================================================================

export type OperationKind = 'size' | 'search' | 'copy' | 'move' | 'delete';

export type BulkOperationKind = Extract<OperationKind, 'copy' | 'move' | 'delete'>;

export type OperationPhase = 'planning' | 'scanning' | 'executing' | 'finished';

export type OperationStatus = 'completed' | 'partiallyCompleted' | 'cancelled' | 'aborted';

export interface OperationProgress {
	operation: OperationKind;
	phase: OperationPhase;
	/** Path currently being processed */
	currentPath: string;
	bytesDone: number;
	/** Zero while the total is still unknown */
	bytesTotal: number;
	entriesDone: number;
	/** Zero while the total is still unknown */
	entriesTotal: number;
	currentFileBytesDone: number;
	currentFileBytesTotal: number;
}

// ============================================================================
// Results
// ============================================================================

export interface DirCalcResult {
	/** Root path that was measured */
	rootPath: string;
	/** Bytes of all files and symlinks */
	totalSize: number;
	fileCount: number;
	/** Directories below the root */
	dirCount: number;
	errors: EntryError[];
	/** Whether the walk stopped before the end */
	partial: boolean;
	partialReason?: 'cancelled';
}

export interface SearchMatch {
	/** Path relative to the search root */
	relativePath: string;
	/** Absolute path */
	path: string;
	/** NFC-normalized entry name */
	name: string;
	kind: EntryKind;
	/** Matched range in `name` (UTF-16 offsets into `name` itself) */
	matchStart: number;
	matchEnd: number;
}

export interface SearchResult {
	rootPath: string;
	query: string;
	matches: SearchMatch[];
	/** The result cap was reached and the walk was stopped */
	limitReached: boolean;
	partial: boolean;
	partialReason?: 'cancelled';
	errors: EntryError[];
}

export interface SkippedEntry {
	path: string;
	reason: 'conflict' | 'excluded' | 'unsupported';
}

export interface OperationResult {
	operation: BulkOperationKind;
	status: OperationStatus;
	entriesCompleted: number;
	entriesTotal: number;
	bytesDone: number;
	bytesTotal: number;
	errors: EntryError[];
	skipped: SkippedEntry[];
	/** Sensitive symlinks that were left out of a copy or move */
	excludedSymlinks: string[];
	/** Source roots that were moved by copy-then-delete */
	crossDeviceFallbacks: number;
	abortReason?: string;
}

// ============================================================================
// Conflicts
// ============================================================================

export type ConflictResolution = 'overwrite' | 'skip' | 'rename' | 'overwriteAll' | 'skipAll' | 'cancel';

export interface ConflictInfo {
	sourcePath: string;
	destinationPath: string;
	relativePath: string;
	sourceKind: EntryKind;
	existingKind: EntryKind;
	/** One-based position among all collisions of the plan */
	index: number;
	total: number;
}

export type SensitiveSymlinkDecision = 'exclude' | 'include' | 'cancel';
