/**
 * Utility functions for panel views
 *
 * Re-exports shared formatters from the single source of truth.
 */

import { formatBytes as formatBytesShared, formatPercent } from '../shared/formatters';
import { truncateWithRanges, type KeptRange, type TruncatePosition } from '../shared/truncate';
import type { OperationKind, OperationProgress, OperationStatus } from './types';

export const formatBytes = formatBytesShared;

function lastSeparator(pathText: string): number {
	return Math.max(pathText.lastIndexOf('/'), pathText.lastIndexOf('\\'));
}

/** Last path component (views never import Node's `path`) */
export function baseName(pathText: string): string {
	return pathText.slice(lastSeparator(pathText) + 1);
}

/** Everything before the last path component; '' for a bare name */
export function parentPath(pathText: string): string {
	const index = lastSeparator(pathText);
	return index <= 0 ? pathText.slice(0, Math.max(0, index + 1)) : pathText.slice(0, index);
}

export interface HighlightSegment {
	text: string;
	highlighted: boolean;
}

/**
 * Truncates `text` to `maxWidth` cells and splits what remains into plain and
 * highlighted runs, keeping the match range attached to the characters that survived.
 */
export function highlightSegments(
	text: string,
	match: KeptRange | undefined,
	maxWidth: number,
	position: TruncatePosition = 'end'
): HighlightSegment[] {
	const truncated = truncateWithRanges(text, maxWidth, { position });
	const heads = truncated.kept.filter((range) => range.start === 0);
	const tails = truncated.kept.filter((range) => range.start !== 0);
	const segments: HighlightSegment[] = [];

	const push = (start: number, end: number, highlighted: boolean): void => {
		if (end > start) segments.push({ text: text.slice(start, end), highlighted });
	};
	const clamp = (value: number, range: KeptRange): number => Math.min(Math.max(value, range.start), range.end);

	const pushRange = (range: KeptRange): void => {
		if (!match) {
			push(range.start, range.end, false);
			return;
		}
		const from = clamp(match.start, range);
		const to = clamp(match.end, range);
		push(range.start, from, false);
		push(from, to, true);
		push(to, range.end, false);
	};

	heads.forEach(pushRange);
	if (truncated.ellipsis) segments.push({ text: truncated.ellipsis, highlighted: false });
	tails.forEach(pushRange);
	return segments;
}

const OPERATION_LABELS: Record<OperationKind, string> = {
	size: 'Calculating size',
	search: 'Searching',
	copy: 'Copying',
	move: 'Moving',
	delete: 'Deleting',
};

export function operationLabel(operation: OperationKind): string {
	return OPERATION_LABELS[operation];
}

const STATUS_LABELS: Record<OperationStatus, string> = {
	completed: 'Completed',
	partiallyCompleted: 'Completed with errors',
	cancelled: 'Cancelled',
	aborted: 'Aborted',
};

export function statusLabel(status: OperationStatus): string {
	return STATUS_LABELS[status];
}

/**
 * Percentage for the progress bar: bytes when the total is known, entries otherwise.
 */
export function progressPercent(progress: OperationProgress): string {
	if (progress.bytesTotal > 0) return formatPercent(progress.bytesDone, progress.bytesTotal);
	return formatPercent(progress.entriesDone, progress.entriesTotal);
}

/**
 * One-line counter, e.g. `3 / 10 items · 1.5 KB / 4.0 KB`.
 */
export function progressSummary(progress: OperationProgress): string {
	const items =
		progress.entriesTotal > 0
			? `${progress.entriesDone.toLocaleString()} / ${progress.entriesTotal.toLocaleString()} items`
			: `${progress.entriesDone.toLocaleString()} items`;
	if (progress.bytesTotal > 0) {
		return `${items} · ${formatBytes(progress.bytesDone)} / ${formatBytes(progress.bytesTotal)}`;
	}
	return progress.bytesDone > 0 ? `${items} · ${formatBytes(progress.bytesDone)}` : items;
}
