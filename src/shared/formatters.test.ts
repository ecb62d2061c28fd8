import { describe, expect, it } from 'vitest';
import { formatBytes, formatDuration, formatPercent, formatPermissions } from './formatters';

describe('formatBytes', () => {
	it('formats with binary units', () => {
		expect(formatBytes(512)).toBe('512 B');
		expect(formatBytes(1536)).toBe('1.5 KB');
		expect(formatBytes(1024 * 1024)).toBe('1.0 MB');
	});

	it('treats invalid and non-positive sizes as zero', () => {
		expect(formatBytes(0)).toBe('0 B');
		expect(formatBytes(-5)).toBe('0 B');
		expect(formatBytes(Number.NaN)).toBe('0 B');
	});
});

describe('formatPermissions', () => {
	it('renders permission triplets', () => {
		expect(formatPermissions(0o755)).toBe('rwxr-xr-x');
		expect(formatPermissions(0o100640)).toBe('rw-r-----');
	});
});

describe('formatPercent', () => {
	it('floors and clamps', () => {
		expect(formatPercent(1, 3)).toBe('33%');
		expect(formatPercent(10, 5)).toBe('100%');
		expect(formatPercent(5, 0)).toBe('0%');
	});
});

describe('formatDuration', () => {
	it('uses milliseconds below one second', () => {
		expect(formatDuration(850)).toBe('850ms');
	});

	it('uses seconds with one decimal below a minute', () => {
		expect(formatDuration(1400)).toBe('1.4s');
		expect(formatDuration(12000)).toBe('12.0s');
	});

	it('uses minutes and padded seconds above', () => {
		expect(formatDuration(125_000)).toBe('2m 05s');
	});
});
