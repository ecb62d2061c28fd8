import type { CancellationToken } from '../../common/cancellation';
import type { OperationConfig } from '../../common/configManager';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';
import type {
	BulkOperationKind,
	ConflictInfo,
	ConflictResolution,
	EntryError,
	EntryKind,
	OperationProgress,
	SensitiveSymlinkDecision,
	SkippedEntry,
} from '../../types';

/**
 * What execution does with a planned entry.
 * - create: destination absent
 * - merge: directory onto an existing directory
 * - overwrite: replace whatever exists at the destination
 * - skip: not processed (conflict decision, excluded link, unsupported kind, skipped parent)
 * - remove: delete only; entry is removed
 * - retain: delete only; directory kept because something below it stays
 * - conflict: transient, collision awaiting a decision
 */
export type PlanDisposition = 'create' | 'merge' | 'overwrite' | 'remove' | 'skip' | 'retain' | 'conflict';

export interface PlanEntry {
	sourcePath: string;
	/** Path relative to the source root's parent, so it starts with the root's own name */
	relativePath: string;
	rootIndex: number;
	destinationPath?: string;
	kind: EntryKind;
	size: number;
	mode: number;
	atimeMs: number;
	mtimeMs: number;
	linkTarget?: string;
	existingKind?: EntryKind;
	disposition: PlanDisposition;
}

export interface PlanRoot {
	sourcePath: string;
	destinationPath?: string;
	kind: EntryKind;
	/** Range of this root's entries in `OperationPlan.entries` */
	firstEntry: number;
	entryCount: number;
}

export interface ResolvedConflict extends ConflictInfo {
	resolution: Exclude<ConflictResolution, 'overwriteAll' | 'skipAll' | 'cancel'>;
	/** Destination after a rename */
	renamedTo?: string;
}

export interface OperationPlan {
	operation: BulkOperationKind;
	destinationDir?: string;
	roots: PlanRoot[];
	/** Pre-order for copy and move, post-order for delete */
	entries: PlanEntry[];
	totals: { bytes: number; entries: number };
	errors: EntryError[];
	conflicts: ResolvedConflict[];
	skipped: SkippedEntry[];
	excludedSymlinks: string[];
}

export type ConflictResolver = (conflict: ConflictInfo) => ConflictResolution | Promise<ConflictResolution>;

export type SensitiveSymlinkHandler = (
	paths: string[]
) => SensitiveSymlinkDecision | Promise<SensitiveSymlinkDecision>;

export type OperationState =
	| 'idle'
	| 'planning'
	| 'executing'
	| 'completed'
	| 'partiallyCompleted'
	| 'cancelled'
	| 'aborted';

export interface BulkOperationOptions {
	cancellationToken?: CancellationToken;
	onProgress?: (progress: OperationProgress) => void;
	onStateChange?: (state: OperationState) => void;
	config?: Partial<OperationConfig> & { maxDepth?: number };
	fs?: FileSystem;
	logger?: Logger;
}

export interface TransferParams extends BulkOperationOptions {
	sources: ReadonlyArray<string>;
	destinationDir: string;
	resolveConflict?: ConflictResolver;
	onSensitiveSymlinks?: SensitiveSymlinkHandler;
}

export interface DeleteParams extends BulkOperationOptions {
	sources: ReadonlyArray<string>;
}
