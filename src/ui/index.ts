export { ConflictPrompt } from './components/ConflictPrompt';
export { EmptyState } from './components/EmptyState';
export { EntryRow } from './components/EntryRow';
export { HighlightedName } from './components/HighlightedName';
export { IconButton } from './components/IconButton';
export { MetricsHeader } from './components/MetricsHeader';
export { OperationProgressPanel } from './components/OperationProgressPanel';
export { OperationResultBanner } from './components/OperationResultBanner';
export { SearchResultsList } from './components/SearchResultsList';
export { SizeSummary } from './components/SizeSummary';
export { useOperationPanel } from './hooks/useOperationPanel';
export type { OperationPanelState } from './hooks/useOperationPanel';
export { baseName, highlightSegments, parentPath, progressPercent, progressSummary } from './utils';
export type { HighlightSegment } from './utils';
