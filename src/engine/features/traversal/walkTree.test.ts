import { readdir } from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancellationTokenSource } from '../../common/cancellation';
import { fsError, makeTempDir, removeTempDir, withFaults, writeTree } from '../../../test/fsFixtures';
import type { TraversalOptions, VisitEvent } from './traversalTypes';
import { walkTree } from './walkTree';

async function collect(options: TraversalOptions): Promise<VisitEvent[]> {
	const events: VisitEvent[] = [];
	for await (const event of walkTree(options)) events.push(event);
	return events;
}

function relativePaths(events: VisitEvent[], type: VisitEvent['type']): string[] {
	return events
		.filter((event) => event.type === type)
		.map((event) => event.relativePath)
		.sort();
}

function diagnostics(events: VisitEvent[]): Array<{ kind: string; relativePath: string }> {
	return events.flatMap((event) =>
		event.type === 'diagnostic' ? [{ kind: event.kind, relativePath: event.relativePath }] : []
	);
}

describe('walkTree', () => {
	let tmp: string;

	beforeEach(async () => {
		tmp = await makeTempDir();
	});

	afterEach(async () => {
		await removeTempDir(tmp);
	});

	it('visits every entry of an acyclic tree exactly once', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { a: { 'x.txt': '1', b: { 'y.txt': '22' } }, 'z.txt': '333' });

		const events = await collect({ rootPath: root });

		expect(relativePaths(events, 'file')).toEqual([path.join('a', 'b', 'y.txt'), path.join('a', 'x.txt'), 'z.txt']);
		expect(relativePaths(events, 'enterDir')).toEqual(['', 'a', path.join('a', 'b')]);
		expect(relativePaths(events, 'leaveDir')).toEqual(['', 'a', path.join('a', 'b')]);
		expect(diagnostics(events)).toEqual([]);
	});

	it('reports depth from the root', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { a: { b: { 'f.txt': 'x' } } });

		const events = await collect({ rootPath: root });
		const file = events.find((event) => event.type === 'file');

		expect(file?.depth).toBe(3);
		expect(events[0]).toMatchObject({ type: 'enterDir', relativePath: '', depth: 0 });
	});

	it('treats symlinks as leaves under the opaque policy', async () => {
		const docs = path.join(tmp, 'docs');
		await writeTree(docs, { a: { 'f.txt': 'x', loop: { symlink: docs } } });

		const events = await collect({ rootPath: docs });
		const loop = events.find((event) => event.relativePath === path.join('a', 'loop'));

		expect(loop?.type).toBe('file');
		expect(loop?.type === 'file' && loop.entry.kind).toBe('symlink');
		expect(loop?.type === 'file' && loop.entry.linkTarget).toBe(docs);
		expect(diagnostics(events)).toEqual([]);
	});

	it('stops at a symlink cycle under the follow policy', async () => {
		const docs = path.join(tmp, 'docs');
		await writeTree(docs, { a: { 'f.txt': 'x', loop: { symlink: docs } } });

		const events = await collect({ rootPath: docs, symlinkPolicy: 'follow' });

		expect(diagnostics(events)).toEqual([{ kind: 'CyclicSymlink', relativePath: path.join('a', 'loop') }]);
		expect(relativePaths(events, 'file')).toEqual([path.join('a', 'f.txt')]);
	});

	it('reports a self-referencing link as a cycle under the follow policy', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { self: { symlink: 'self' }, 'f.txt': 'x' });

		const events = await collect({ rootPath: root, symlinkPolicy: 'follow' });

		expect(diagnostics(events)).toEqual([{ kind: 'CyclicSymlink', relativePath: 'self' }]);
		expect(relativePaths(events, 'file')).toEqual(['f.txt']);
	});

	it('keeps a self-referencing link as a leaf under the opaque policy', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { self: { symlink: 'self' } });

		const events = await collect({ rootPath: root });
		const self = events.find((event) => event.relativePath === 'self');

		expect(diagnostics(events)).toEqual([]);
		expect(self?.type === 'file' && self.entry.targetErrorCode).toBe('ELOOP');
		expect(self?.type === 'file' && self.entry.target).toBeUndefined();
	});

	it('follows a symlink to a directory outside the current path', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(path.join(tmp, 'elsewhere'), { 'inside.txt': 'x' });
		await writeTree(root, { link: { symlink: path.join(tmp, 'elsewhere') } });

		const events = await collect({ rootPath: root, symlinkPolicy: 'follow' });

		expect(relativePaths(events, 'file')).toEqual([path.join('link', 'inside.txt')]);
		expect(relativePaths(events, 'enterDir')).toEqual(['', 'link']);
	});

	it('enforces the depth limit on every branch', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, {
			left: { 'a.txt': 'a', deep: { 'hidden.txt': 'h' } },
			right: { deep: { 'hidden.txt': 'h' } },
		});

		const events = await collect({ rootPath: root, maxDepth: 1 });

		expect(diagnostics(events).sort((a, b) => a.relativePath.localeCompare(b.relativePath))).toEqual([
			{ kind: 'DepthExceeded', relativePath: path.join('left', 'deep') },
			{ kind: 'DepthExceeded', relativePath: path.join('right', 'deep') },
		]);
		expect(relativePaths(events, 'file')).toEqual([path.join('left', 'a.txt')]);
	});

	it('reports an unreadable directory and keeps walking', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { locked: { 'secret.txt': 's' }, open: { 'ok.txt': 'o' } });
		const locked = path.join(root, 'locked');
		const fs = withFaults({
			readdir: async (target) => {
				if (target === locked) throw fsError('EACCES', 'scandir', target);
				return readdir(target);
			},
		});

		const events = await collect({ rootPath: root, fs });

		expect(diagnostics(events)).toEqual([{ kind: 'PermissionDenied', relativePath: 'locked' }]);
		expect(relativePaths(events, 'file')).toEqual([path.join('open', 'ok.txt')]);
		expect(relativePaths(events, 'enterDir')).toEqual(['', 'open']);
	});

	it('yields a single file event for a file root', async () => {
		const file = path.join(tmp, 'single.txt');
		await writeTree(tmp, { 'single.txt': 'abc' });

		const events = await collect({ rootPath: file });

		expect(events).toHaveLength(1);
		expect(events[0]).toMatchObject({ type: 'file', path: file, relativePath: '', depth: 0 });
		expect(events[0].type === 'file' && events[0].entry.size).toBe(3);
	});

	it('reports a missing root', async () => {
		const events = await collect({ rootPath: path.join(tmp, 'missing') });

		expect(diagnostics(events)).toEqual([{ kind: 'NotFound', relativePath: '' }]);
	});

	it('normalizes names to NFC', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { 'cafe\u0301.txt': 'x' });

		const events = await collect({ rootPath: root });
		const file = events.find((event) => event.type === 'file');

		expect(file?.type === 'file' && file.entry.name).toBe('caf\u00e9.txt');
		expect(file?.path).toBe(path.join(root, 'cafe\u0301.txt'));
	});

	it('ends with a Cancelled diagnostic once cancellation is requested', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { 'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c' });
		const source = new CancellationTokenSource();

		const events: VisitEvent[] = [];
		for await (const event of walkTree({ rootPath: root, cancellationToken: source.token })) {
			events.push(event);
			if (event.type === 'file') source.cancel();
		}

		expect(events.filter((event) => event.type === 'file')).toHaveLength(1);
		expect(events[events.length - 1]).toMatchObject({ type: 'diagnostic', kind: 'Cancelled' });
	});

	it('does nothing when already cancelled', async () => {
		const source = new CancellationTokenSource();
		source.cancel();

		const events = await collect({ rootPath: tmp, cancellationToken: source.token });

		expect(diagnostics(events)).toEqual([{ kind: 'Cancelled', relativePath: '' }]);
		expect(events).toHaveLength(1);
	});

	it('stops reading when the consumer breaks out', async () => {
		const root = path.join(tmp, 'root');
		await writeTree(root, { s1: { 'a.txt': 'a' }, s2: { 'b.txt': 'b' } });
		const listed: string[] = [];
		const fs = withFaults({
			readdir: async (target) => {
				listed.push(target);
				return readdir(target);
			},
		});

		for await (const event of walkTree({ rootPath: root, fs })) {
			if (event.type === 'enterDir') break;
		}

		expect(listed).toEqual([root]);
	});
});
