import { describe, expect, it } from 'vitest';
import { validateFilename } from './filenameRules';

describe('validateFilename', () => {
	it('accepts ordinary names', () => {
		expect(validateFilename('report (2).txt')).toBeUndefined();
		expect(validateFilename('가나.txt')).toBeUndefined();
	});

	it.each([
		['', 'Filename cannot be empty'],
		['a/b', 'Filename cannot contain path separators'],
		['a\\b', 'Filename cannot contain path separators'],
		['..', 'Invalid filename'],
		['a\u0007b', 'Filename cannot contain control characters'],
		[' lead', 'Filename cannot start or end with whitespace'],
		['-rf', 'Filename cannot start with hyphen'],
		['x'.repeat(256), 'Filename too long (max 255 bytes)'],
	])('rejects %j', (name, message) => {
		expect(validateFilename(name)).toBe(message);
	});

	it('counts the limit in UTF-8 bytes', () => {
		// 3 bytes each
		expect(validateFilename('가'.repeat(85))).toBeUndefined();
		expect(validateFilename('가'.repeat(86))).toBe('Filename too long (max 255 bytes)');
	});
});
