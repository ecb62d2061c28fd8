import { describe, expect, it } from 'vitest';
import { createSubsequenceMatcher, createSubstringMatcher } from './nameMatcher';

describe('createSubstringMatcher', () => {
	it('matches case-insensitively by default', () => {
		expect(createSubstringMatcher('PORT')('Report.txt')).toEqual({ start: 2, end: 6 });
	});

	it('respects case when asked to', () => {
		const match = createSubstringMatcher('report', { caseSensitive: true });
		expect(match('Report.txt')).toBeUndefined();
		expect(match('report.txt')).toEqual({ start: 0, end: 6 });
	});

	it('normalizes the query to the same form as names', () => {
		// decomposed query, composed name
		expect(createSubstringMatcher('cafe\u0301')('Mon caf\u00e9.txt')).toEqual({ start: 4, end: 8 });
	});

	it('reports offsets into the original name when folding changes its length', () => {
		expect(createSubstringMatcher('y')('X\u0130Y')).toEqual({ start: 2, end: 3 });
	});

	it('matches multi-byte names', () => {
		expect(createSubstringMatcher('나')('가나.txt')).toEqual({ start: 1, end: 2 });
	});
});

describe('createSubsequenceMatcher', () => {
	it('spans the first to the last matched character', () => {
		expect(createSubsequenceMatcher('rpt')('Report.txt')).toEqual({ start: 0, end: 6 });
	});

	it('fails when the characters are not in order', () => {
		expect(createSubsequenceMatcher('xyz')('Report.txt')).toBeUndefined();
	});
});
