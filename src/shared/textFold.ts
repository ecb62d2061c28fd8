/**
 * Case folding with a position map back to the source text.
 *
 * Lower-casing can change string length ('İ' becomes two code units), so an
 * offset found in the folded copy is only meaningful after it is mapped back.
 */

export interface FoldedText {
	folded: string;
	/**
	 * `positions[i]` is the offset in the source of the character that produced
	 * folded unit `i`; the extra last element is the source length.
	 */
	positions: number[];
}

export function foldWithPositions(text: string): FoldedText {
	let folded = '';
	const positions: number[] = [];
	let offset = 0;

	for (const char of text) {
		const lower = char.toLowerCase();
		for (let i = 0; i < lower.length; i++) positions.push(offset);
		folded += lower;
		offset += char.length;
	}
	positions.push(text.length);

	return { folded, positions };
}

/**
 * Maps a `[start, end)` range of the folded text back to the source, widening it
 * to whole source characters.
 */
export function toSourceRange(fold: FoldedText, start: number, end: number): { start: number; end: number } {
	const sourceStart = fold.positions[start];
	if (end <= start) return { start: sourceStart, end: sourceStart };

	// The last matched unit may sit inside a multi-unit expansion; step past the whole source character.
	const lastSource = fold.positions[end - 1];
	let next = end;
	while (next < fold.positions.length - 1 && fold.positions[next] === lastSource) next++;

	return { start: sourceStart, end: fold.positions[next] };
}
