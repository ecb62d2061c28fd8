/**
 * Engine-specific types for panefs
 *
 * Re-exports shared types and defines engine-only types.
 */

// Re-export all shared types
export type {
	EntryKind,
	FileOpErrorKind,
	EntryError,
	OperationKind,
	BulkOperationKind,
	OperationPhase,
	OperationStatus,
	OperationProgress,
	DirCalcResult,
	SearchMatch,
	SearchResult,
	SkippedEntry,
	OperationResult,
	ConflictResolution,
	ConflictInfo,
	SensitiveSymlinkDecision,
} from '../shared/types';

// ============================================================================
// Engine-only Types
// ============================================================================

export interface Disposable {
	dispose(): void;
}

export type SymlinkPolicy = 'opaque' | 'follow';
