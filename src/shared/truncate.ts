/**
 * Display-safe truncation.
 *
 * Every path or file name that reaches a panel goes through these helpers.
 * Cuts only happen between grapheme clusters, and widths are measured in
 * terminal cells (wide characters count twice).
 */

import { displayWidth, toGraphemeCells, type GraphemeCell } from './charWidth';

export { displayWidth } from './charWidth';

export type TruncatePosition = 'end' | 'start' | 'middle';

export interface TruncateOptions {
	/** Which part is replaced by the ellipsis: the end (default), the start (paths) or the middle */
	position?: TruncatePosition;
	ellipsis?: string;
}

export interface KeptRange {
	/** UTF-16 offsets into the original text */
	start: number;
	end: number;
}

export interface TruncatedText {
	text: string;
	truncated: boolean;
	/** Ranges of the original text that survive, in display order */
	kept: KeptRange[];
	/** Ellipsis inserted between `kept[0]` and `kept[1]` (middle), before `kept[0]` (start) or after it (end) */
	ellipsis: string;
	width: number;
}

const DEFAULT_ELLIPSIS = '…';

function takeHead(cells: ReadonlyArray<GraphemeCell>, budget: number): { end: number; width: number; count: number } {
	let width = 0;
	let count = 0;
	for (const cell of cells) {
		if (width + cell.width > budget) break;
		width += cell.width;
		count++;
	}
	return { end: count > 0 ? cells[count - 1].end : 0, width, count };
}

function takeTail(
	cells: ReadonlyArray<GraphemeCell>,
	budget: number,
	floor: number
): { start: number; width: number } {
	let width = 0;
	let index = cells.length;
	while (index > floor) {
		const cell = cells[index - 1];
		if (width + cell.width > budget) break;
		width += cell.width;
		index--;
	}
	return { start: index < cells.length ? cells[index].start : cells.length > 0 ? cells[cells.length - 1].end : 0, width };
}

function nonEmpty(ranges: KeptRange[]): KeptRange[] {
	return ranges.filter((range) => range.end > range.start);
}

/**
 * Truncates `text` to at most `maxWidth` terminal cells and reports which parts of
 * the original survived, so callers can re-project offsets (e.g. a search match).
 * Never throws: widths of zero, negative or NaN produce an empty string.
 * @param text - Any string.
 * @param maxWidth - Maximum width in terminal cells.
 * @param options - Ellipsis position and marker.
 * @returns Truncated text with its kept ranges.
 */
export function truncateWithRanges(text: string, maxWidth: number, options: TruncateOptions = {}): TruncatedText {
	const position = options.position ?? 'end';
	const ellipsis = options.ellipsis ?? DEFAULT_ELLIPSIS;
	const limit = Number.isNaN(maxWidth) ? 0 : Math.floor(maxWidth);

	if (limit <= 0) {
		return { text: '', truncated: text.length > 0, kept: [], ellipsis: '', width: 0 };
	}

	const cells = toGraphemeCells(text);
	const totalWidth = cells.reduce((sum, cell) => sum + cell.width, 0);
	if (totalWidth <= limit) {
		return { text, truncated: false, kept: nonEmpty([{ start: 0, end: text.length }]), ellipsis: '', width: totalWidth };
	}

	const ellipsisWidth = displayWidth(ellipsis);

	// Not even room for the marker: show what fits, without it.
	if (limit < ellipsisWidth) {
		if (position === 'start') {
			const tail = takeTail(cells, limit, 0);
			return { text: text.slice(tail.start), truncated: true, kept: nonEmpty([{ start: tail.start, end: text.length }]), ellipsis: '', width: tail.width };
		}
		const head = takeHead(cells, limit);
		return { text: text.slice(0, head.end), truncated: true, kept: nonEmpty([{ start: 0, end: head.end }]), ellipsis: '', width: head.width };
	}

	const budget = limit - ellipsisWidth;

	if (position === 'start') {
		const tail = takeTail(cells, budget, 0);
		return {
			text: ellipsis + text.slice(tail.start),
			truncated: true,
			kept: nonEmpty([{ start: tail.start, end: text.length }]),
			ellipsis,
			width: tail.width + ellipsisWidth,
		};
	}

	if (position === 'middle') {
		const head = takeHead(cells, Math.ceil(budget / 2));
		const tail = takeTail(cells, budget - head.width, head.count);
		return {
			text: text.slice(0, head.end) + ellipsis + text.slice(tail.start),
			truncated: true,
			kept: nonEmpty([
				{ start: 0, end: head.end },
				{ start: tail.start, end: text.length },
			]),
			ellipsis,
			width: head.width + ellipsisWidth + tail.width,
		};
	}

	const head = takeHead(cells, budget);
	return {
		text: text.slice(0, head.end) + ellipsis,
		truncated: true,
		kept: nonEmpty([{ start: 0, end: head.end }]),
		ellipsis,
		width: head.width + ellipsisWidth,
	};
}

/**
 * Shortens `text` to fit `maxWidth` terminal cells, cutting only at character boundaries.
 */
export function truncateDisplay(text: string, maxWidth: number, options?: TruncateOptions): string {
	return truncateWithRanges(text, maxWidth, options).text;
}

/**
 * Shortens a path keeping its tail (the file name stays visible).
 */
export function truncatePath(pathText: string, maxWidth: number): string {
	return truncateWithRanges(pathText, maxWidth, { position: 'start' }).text;
}
