/**
 * Types for panel views
 *
 * Re-exports shared types from the single source of truth.
 */

export type {
	ConflictInfo,
	ConflictResolution,
	DirCalcResult,
	EntryError,
	EntryKind,
	OperationKind,
	OperationProgress,
	OperationResult,
	OperationStatus,
	SearchMatch,
	SearchResult,
} from '../shared/types';
