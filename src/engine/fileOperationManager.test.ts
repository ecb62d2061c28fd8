import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { configManager } from './common/configManager';
import { OperationEventSubscription } from './common/operationEvents';
import { makeTempDir, removeTempDir, writeTree } from '../test/fsFixtures';
import {
	FileOperationManager,
	type OperationEndEvent,
	type OperationProgressEvent,
	type OperationStartEvent,
} from './fileOperationManager';

describe('FileOperationManager', () => {
	let tmp: string;
	let manager: FileOperationManager;

	beforeEach(async () => {
		configManager.update({ progressThrottleMs: 0 });
		tmp = await makeTempDir();
		await writeTree(tmp, { docs: { 'a.txt': 'aaa', 'notes.md': 'nn', sub: { 'b.txt': 'b' } }, dest: {} });
		manager = new FileOperationManager();
	});

	afterEach(async () => {
		manager.dispose();
		configManager.reset();
		await removeTempDir(tmp);
	});

	it('emits start, progress and exactly one end per request', async () => {
		const starts: OperationStartEvent[] = [];
		const progress: OperationProgressEvent[] = [];
		const ends: OperationEndEvent[] = [];
		const subscription = new OperationEventSubscription(manager, {
			onOperationStart: (event) => starts.push(event),
			onProgress: (event) => progress.push(event),
			onOperationEnd: (event) => ends.push(event),
		});

		const outcome = await manager.computeSize([path.join(tmp, 'docs')]);
		subscription.dispose();
		await manager.computeSize([path.join(tmp, 'docs')]);

		expect(outcome.status).toBe('completed');
		expect(outcome.result?.totalSize).toBe(6);
		expect(starts).toEqual([{ id: outcome.id, operation: 'size' }]);
		expect(ends).toEqual([outcome]);
		expect(progress.length).toBeGreaterThan(0);
		expect(progress.every((event) => event.id === outcome.id)).toBe(true);
	});

	it('rejects a second bulk operation while one is running', async () => {
		const first = manager.copy({ sources: [path.join(tmp, 'docs')], destinationDir: path.join(tmp, 'dest') });
		expect(manager.isBusy()).toBe(true);

		const second = await manager.delete({ sources: [path.join(tmp, 'docs')] });

		expect(second).toEqual({
			id: 2,
			operation: 'delete',
			status: 'aborted',
			error: { path: '', kind: 'InvalidInput', message: 'Another file operation is already running' },
		});
		expect((await first).status).toBe('completed');
		expect(manager.isBusy()).toBe(false);
	});

	it('cancels the previous search when a new one starts', async () => {
		const first = manager.search({ rootPath: path.join(tmp, 'docs'), query: 'a' });
		const second = manager.search({ rootPath: path.join(tmp, 'docs'), query: 'b.txt' });

		const [older, newer] = await Promise.all([first, second]);

		expect(older.status).toBe('cancelled');
		expect(older.result?.partial).toBe(true);
		expect(newer.status).toBe('completed');
		expect(newer.result?.matches.map((match) => match.name)).toEqual(['b.txt']);
	});

	it('uses subsequence matching for fuzzy searches', async () => {
		const outcome = await manager.search({ rootPath: path.join(tmp, 'docs'), query: 'nmd', fuzzy: true });

		expect(outcome.result?.matches.map((match) => match.name)).toEqual(['notes.md']);
	});

	it('cancels a running bulk operation on request', async () => {
		const running = manager.copy({ sources: [path.join(tmp, 'docs')], destinationDir: path.join(tmp, 'dest') });
		manager.cancelCurrent('copy');

		const outcome = await running;

		expect(outcome.status).toBe('cancelled');
		expect(outcome.result?.entriesCompleted).toBe(0);
	});
});
