/**
 * Public surface of the traversal and file-operation engine.
 */

export * from './types';

export { CancellationToken, CancellationTokenSource, NEVER_CANCELLED } from './common/cancellation';
export { ConfigManager, configManager, DEFAULT_SETTINGS } from './common/configManager';
export type { EngineSettings, LogConfig, OperationConfig, SearchConfig, TraversalConfig } from './common/configManager';
export { DisposableStore, toDisposable } from './common/disposableStore';
export { FileOpError, classifyFsError, toEntryError, toErrorMessage } from './common/errors';
export { nodeFileSystem } from './common/fileSystem';
export type { FileSystem } from './common/fileSystem';
export { validateFilename } from './common/filenameRules';
export { formatBytes, formatDuration, formatPercent, formatPermissions } from '../shared/formatters';
export { RotatingFileLogger, createConsoleLogger, formatLogLine, noopLogger } from './common/logger';
export type { LogFields, LogLevel, Logger, RotatingFileLoggerOptions } from './common/logger';
export { OperationEventSubscription } from './common/operationEvents';
export type { OperationEventFilter, OperationEventHandlers } from './common/operationEvents';

export { walkTree } from './features/traversal/walkTree';
export { DEFAULT_MAX_DEPTH } from './features/traversal/traversalTypes';
export type { EntryIdentity, EntryInfo, TraversalOptions, VisitEvent } from './features/traversal/traversalTypes';
export { calculateDirectorySize, calculateSizes } from './features/sizeCalc/sizeCalculator';
export type { MultiSizeResult, SizeCalcParams } from './features/sizeCalc/sizeCalculator';
export { DEFAULT_MAX_RESULTS, searchFiles } from './features/search/searchEngine';
export type { SearchParams } from './features/search/searchEngine';
export { createSubsequenceMatcher, createSubstringMatcher } from './features/search/nameMatcher';
export type { MatchRange, NameMatcher } from './features/search/nameMatcher';
export { copyEntries, deleteEntries, moveEntries } from './features/fileOps/bulkOperations';
export { createDirectory, renameEntry } from './features/fileOps/singleEntryOps';
export type { SingleEntryResult } from './features/fileOps/singleEntryOps';
export { OperationStateMachine } from './features/fileOps/operationState';
export type {
	ConflictResolver,
	DeleteParams,
	OperationPlan,
	OperationState,
	PlanEntry,
	SensitiveSymlinkHandler,
	TransferParams,
} from './features/fileOps/operationTypes';
export { ProgressChannel } from './features/progress/progressChannel';
export { createCancellableSession } from './features/progress/operationSession';

export { FileOperationManager } from './fileOperationManager';
export type {
	BulkOutcome,
	OperationEndEvent,
	OperationProgressEvent,
	OperationStartEvent,
	RequestOutcome,
	SearchOutcome,
	SearchRequest,
	SizeOutcome,
} from './fileOperationManager';
