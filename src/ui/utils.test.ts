import { describe, expect, it } from 'vitest';
import type { OperationProgress } from './types';
import { baseName, highlightSegments, parentPath, progressPercent, progressSummary } from './utils';

function progress(overrides: Partial<OperationProgress>): OperationProgress {
	return {
		operation: 'copy',
		phase: 'executing',
		currentPath: '',
		bytesDone: 0,
		bytesTotal: 0,
		entriesDone: 0,
		entriesTotal: 0,
		currentFileBytesDone: 0,
		currentFileBytesTotal: 0,
		...overrides,
	};
}

describe('baseName / parentPath', () => {
	it('split on either separator', () => {
		expect(baseName('docs/a/report.txt')).toBe('report.txt');
		expect(baseName('C:\\data\\x.bin')).toBe('x.bin');
		expect(parentPath('docs/a/report.txt')).toBe('docs/a');
		expect(parentPath('report.txt')).toBe('');
		expect(parentPath('/report.txt')).toBe('/');
	});
});

describe('highlightSegments', () => {
	it('keeps the visible part of a match when the tail is cut', () => {
		expect(highlightSegments('quarterly-report.txt', { start: 10, end: 16 }, 12)).toEqual([
			{ text: 'quarterly-', highlighted: false },
			{ text: 'r', highlighted: true },
			{ text: '…', highlighted: false },
		]);
	});

	it('splits a match across a middle ellipsis', () => {
		expect(highlightSegments('abcdefghij', { start: 1, end: 9 }, 5, 'middle')).toEqual([
			{ text: 'a', highlighted: false },
			{ text: 'b', highlighted: true },
			{ text: '…', highlighted: false },
			{ text: 'i', highlighted: true },
			{ text: 'j', highlighted: false },
		]);
	});

	it('returns one plain run without a match', () => {
		expect(highlightSegments('notes.md', undefined, 20)).toEqual([{ text: 'notes.md', highlighted: false }]);
	});
});

describe('progress helpers', () => {
	it('prefers bytes for the percentage', () => {
		expect(progressPercent(progress({ bytesDone: 512, bytesTotal: 1024, entriesDone: 9, entriesTotal: 10 }))).toBe('50%');
		expect(progressPercent(progress({ entriesDone: 1, entriesTotal: 4 }))).toBe('25%');
	});

	it('summarizes counts and sizes', () => {
		expect(progressSummary(progress({ entriesDone: 3, entriesTotal: 10, bytesDone: 1536, bytesTotal: 4096 }))).toBe(
			'3 / 10 items · 1.5 KB / 4.0 KB'
		);
		expect(progressSummary(progress({ entriesDone: 7 }))).toBe('7 items');
	});
});
