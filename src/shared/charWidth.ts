/**
 * Terminal cell width of grapheme clusters.
 *
 * East Asian wide / fullwidth blocks and emoji take two cells, marks and
 * zero-width characters take none. Ranges outside this table count as one cell.
 */

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
	[0x1100, 0x115f], // Hangul Jamo initials
	[0x2e80, 0x303e], // CJK radicals, punctuation
	[0x3041, 0x33ff], // Kana, CJK compatibility
	[0x3400, 0x4dbf], // CJK extension A
	[0x4e00, 0x9fff], // CJK unified ideographs
	[0xa000, 0xa4cf], // Yi
	[0xa960, 0xa97f], // Hangul Jamo extended A
	[0xac00, 0xd7a3], // Hangul syllables
	[0xf900, 0xfaff], // CJK compatibility ideographs
	[0xfe10, 0xfe19], // vertical forms
	[0xfe30, 0xfe6f], // CJK compatibility forms
	[0xff00, 0xff60], // fullwidth forms
	[0xffe0, 0xffe6],
	[0x1f300, 0x1f64f], // pictographs, emoticons
	[0x1f900, 0x1f9ff], // supplemental symbols and pictographs
	[0x20000, 0x2fffd], // CJK extensions B..F
	[0x30000, 0x3fffd],
];

const ZERO_WIDTH = /^[\p{Mn}\p{Me}\u200B-\u200F\u2060\uFEFF]+$/u;
const EMOJI_PRESENTATION = /\p{Emoji_Presentation}|\uFE0F/u;

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function isWideCodePoint(codePoint: number): boolean {
	for (const [start, end] of WIDE_RANGES) {
		if (codePoint < start) return false;
		if (codePoint <= end) return true;
	}
	return false;
}

function isControl(codePoint: number): boolean {
	return codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0);
}

/**
 * Returns the number of terminal cells a single grapheme cluster occupies (0, 1 or 2).
 */
export function graphemeWidth(grapheme: string): number {
	const codePoint = grapheme.codePointAt(0);
	if (codePoint === undefined || isControl(codePoint)) return 0;
	if (ZERO_WIDTH.test(grapheme)) return 0;
	if (EMOJI_PRESENTATION.test(grapheme)) return 2;
	return isWideCodePoint(codePoint) ? 2 : 1;
}

export interface GraphemeCell {
	/** UTF-16 offset of the grapheme in the source text */
	start: number;
	end: number;
	width: number;
}

/**
 * Splits text into grapheme clusters with their offsets and widths.
 */
export function toGraphemeCells(text: string): GraphemeCell[] {
	const cells: GraphemeCell[] = [];
	for (const { segment, index } of graphemeSegmenter.segment(text)) {
		cells.push({ start: index, end: index + segment.length, width: graphemeWidth(segment) });
	}
	return cells;
}

/**
 * Measures the terminal width of a string.
 */
export function displayWidth(text: string): number {
	let width = 0;
	for (const { segment } of graphemeSegmenter.segment(text)) {
		width += graphemeWidth(segment);
	}
	return width;
}
