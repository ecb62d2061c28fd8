import { foldWithPositions, toSourceRange } from '../../../shared/textFold';

export interface MatchRange {
	/** UTF-16 offsets into the name that was matched */
	start: number;
	end: number;
}

/**
 * Decides whether an (NFC-normalized) entry name matches and where.
 */
export type NameMatcher = (name: string) => MatchRange | undefined;

/**
 * Substring match. Case-insensitive matching folds a copy of the name and maps
 * the hit back to offsets in the name itself.
 */
export function createSubstringMatcher(query: string, options: { caseSensitive?: boolean } = {}): NameMatcher {
	const needle = query.normalize('NFC');

	if (options.caseSensitive) {
		return (name) => {
			const index = name.indexOf(needle);
			return index < 0 ? undefined : { start: index, end: index + needle.length };
		};
	}

	const foldedNeedle = foldWithPositions(needle).folded;
	return (name) => {
		const fold = foldWithPositions(name);
		const index = fold.folded.indexOf(foldedNeedle);
		return index < 0 ? undefined : toSourceRange(fold, index, index + foldedNeedle.length);
	};
}

/**
 * Characters of the query appear in the name in order (case-insensitive);
 * the reported range spans the first to the last matched character.
 */
export function createSubsequenceMatcher(query: string): NameMatcher {
	const pattern = [...foldWithPositions(query.normalize('NFC')).folded];

	return (name) => {
		if (pattern.length === 0) return { start: 0, end: 0 };
		const fold = foldWithPositions(name);
		const units = fold.folded;

		let cursor = 0;
		let first = -1;
		let lastEnd = -1;
		for (const char of pattern) {
			const index = units.indexOf(char, cursor);
			if (index < 0) return undefined;
			if (first < 0) first = index;
			cursor = index + char.length;
			lastEnd = cursor;
		}
		return toSourceRange(fold, first, lastEnd);
	};
}
