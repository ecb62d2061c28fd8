import { readdir } from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancellationTokenSource } from '../../common/cancellation';
import { makeTempDir, removeTempDir, withFaults, writeTree } from '../../../test/fsFixtures';
import { createSubsequenceMatcher } from './nameMatcher';
import { searchFiles } from './searchEngine';

describe('searchFiles', () => {
	let tmp: string;

	beforeEach(async () => {
		tmp = await makeTempDir();
	});

	afterEach(async () => {
		await removeTempDir(tmp);
	});

	it('finds a Korean name next to a cycle and stops at the cap', async () => {
		const docs = path.join(tmp, 'docs');
		await writeTree(docs, { a: { '가나.txt': 'x', loop: { symlink: docs } } });

		for (const symlinkPolicy of ['opaque', 'follow'] as const) {
			const result = await searchFiles({ rootPath: docs, query: '가', maxResults: 1, symlinkPolicy });

			expect(result.matches).toEqual([
				{
					relativePath: path.join('a', '가나.txt'),
					path: path.join(docs, 'a', '가나.txt'),
					name: '가나.txt',
					kind: 'file',
					matchStart: 0,
					matchEnd: 1,
				},
			]);
			expect(result.limitReached).toBe(true);
		}
	});

	it('reports the cycle when following links without a cap in the way', async () => {
		const docs = path.join(tmp, 'docs');
		await writeTree(docs, { a: { '가나.txt': 'x', loop: { symlink: docs } } });

		const result = await searchFiles({ rootPath: docs, query: '가', symlinkPolicy: 'follow' });

		expect(result.matches.map((match) => match.relativePath)).toEqual([path.join('a', '가나.txt')]);
		expect(result.limitReached).toBe(false);
		expect(result.errors.map((error) => error.kind)).toEqual(['CyclicSymlink']);
	});

	it('returns exactly N matches and stops reading', async () => {
		const root = path.join(tmp, 'root');
		const layout: Record<string, { [name: string]: string }> = {};
		for (let i = 0; i < 8; i++) layout[`d${i}`] = { [`match-${i}.txt`]: 'x', [`other-${i}.txt`]: 'y' };
		await writeTree(root, layout);
		const listed: string[] = [];
		const fs = withFaults({
			readdir: async (target) => {
				listed.push(target);
				return readdir(target);
			},
		});

		const capped = await searchFiles({ rootPath: root, query: 'match', maxResults: 3, fs });
		expect(capped.matches).toHaveLength(3);
		expect(capped.limitReached).toBe(true);

		listed.length = 0;
		const first = await searchFiles({ rootPath: root, query: 'match', maxResults: 1, fs });
		expect(first.matches).toHaveLength(1);
		// the root and the one directory holding the first match
		expect(listed).toHaveLength(2);
	});

	it('returns every match when there are fewer than the cap', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { 'Alpha.txt': 'a', sub: { 'alphabet.md': 'b', 'beta.txt': 'c' } });

		const result = await searchFiles({ rootPath: root, query: 'ALPHA', maxResults: 10 });

		expect(result.matches.map((match) => match.name).sort()).toEqual(['Alpha.txt', 'alphabet.md']);
		expect(result.limitReached).toBe(false);
		expect(result.partial).toBe(false);
	});

	it('matches directories but never the search root itself', async () => {
		const root = path.join(tmp, 'notes');
		await writeTree(root, { notes: { 'x.txt': 'x' } });

		const result = await searchFiles({ rootPath: root, query: 'notes' });

		expect(result.matches.map((match) => [match.relativePath, match.kind])).toEqual([['notes', 'directory']]);
	});

	it('finds nothing when the search root is a file', async () => {
		await writeTree(tmp, { 'notes.txt': 'n' });

		const result = await searchFiles({ rootPath: path.join(tmp, 'notes.txt'), query: 'notes' });

		expect(result.matches).toEqual([]);
		expect(result.errors).toEqual([]);
		expect(result.partial).toBe(false);
	});

	it('accepts a custom matcher', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { 'Report.txt': 'r', 'readme.md': 'm' });

		const result = await searchFiles({ rootPath: root, query: 'rpt', matcher: createSubsequenceMatcher('rpt') });

		expect(result.matches.map((match) => [match.name, match.matchStart, match.matchEnd])).toEqual([['Report.txt', 0, 6]]);
	});

	it('returns nothing for a cap of zero', async () => {
		const result = await searchFiles({ rootPath: tmp, query: 'x', maxResults: 0 });

		expect(result.matches).toEqual([]);
		expect(result.limitReached).toBe(true);
	});

	it('marks the result partial when cancelled', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { 'a.txt': 'a' });
		const source = new CancellationTokenSource();
		source.cancel();

		const result = await searchFiles({ rootPath: root, query: 'a', cancellationToken: source.token });

		expect(result.partial).toBe(true);
		expect(result.partialReason).toBe('cancelled');
		expect(result.matches).toEqual([]);
	});
});
