import { readFile } from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { exists, makeTempDir, removeTempDir } from '../../test/fsFixtures';
import { configManager } from './configManager';
import { createConsoleLogger, formatLogLine, RotatingFileLogger } from './logger';

const EPOCH = new Date(0);

describe('formatLogLine', () => {
	it('appends defined fields as JSON', () => {
		expect(formatLogLine(EPOCH, 'warn', 'copy: failed', { path: '/a', code: undefined, bytes: 3 })).toBe(
			'1970-01-01T00:00:00.000Z WARN copy: failed {"path":"/a","bytes":3}'
		);
	});

	it('omits an empty field set', () => {
		expect(formatLogLine(EPOCH, 'info', 'start', { skipped: undefined })).toBe('1970-01-01T00:00:00.000Z INFO start');
	});
});

describe('createConsoleLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('drops lines below the minimum level', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const logger = createConsoleLogger('info');

		logger.debug('hidden');
		logger.info('shown');
		logger.error('bad');

		expect(log).toHaveBeenCalledTimes(1);
		expect(log.mock.calls[0][0]).toMatch(/ INFO shown$/);
		expect(error).toHaveBeenCalledTimes(1);
	});
});

describe('RotatingFileLogger', () => {
	let tmp: string;

	beforeEach(async () => {
		tmp = await makeTempDir();
	});

	afterEach(async () => {
		configManager.reset();
		await removeTempDir(tmp);
	});

	it('rotates into numbered files and keeps at most maxFiles of them', async () => {
		const filePath = path.join(tmp, 'engine.log');
		const logger = new RotatingFileLogger({ filePath, maxBytes: 40, maxFiles: 2, now: () => EPOCH });

		for (const message of ['one', 'two', 'three', 'four']) logger.info(message);
		await logger.flush();

		expect(await readFile(filePath, 'utf8')).toBe('1970-01-01T00:00:00.000Z INFO four\n');
		expect(await readFile(`${filePath}.1`, 'utf8')).toBe('1970-01-01T00:00:00.000Z INFO three\n');
		expect(await readFile(`${filePath}.2`, 'utf8')).toBe('1970-01-01T00:00:00.000Z INFO two\n');
		expect(await exists(`${filePath}.3`)).toBe(false);
		expect(logger.lastError).toBeUndefined();
	});

	it('keeps lines together while under the limit', async () => {
		const filePath = path.join(tmp, 'engine.log');
		const logger = new RotatingFileLogger({ filePath, maxBytes: 1024, maxFiles: 1, now: () => EPOCH, minLevel: 'info' });

		logger.debug('skipped');
		logger.info('a');
		logger.warn('b');
		await logger.flush();

		expect(await readFile(filePath, 'utf8')).toBe(
			'1970-01-01T00:00:00.000Z INFO a\n1970-01-01T00:00:00.000Z WARN b\n'
		);
	});

	it('takes its limits from the log settings when none are given', async () => {
		configManager.update({ logMaxBytes: 1024, logMaxFiles: 1 });
		const filePath = path.join(tmp, 'engine.log');
		const logger = new RotatingFileLogger({ filePath, now: () => EPOCH });

		for (const letter of ['a', 'b', 'c']) logger.info(letter.repeat(1000));
		await logger.flush();

		expect(await readFile(filePath, 'utf8')).toBe(`1970-01-01T00:00:00.000Z INFO ${'c'.repeat(1000)}\n`);
		expect(await readFile(`${filePath}.1`, 'utf8')).toBe(`1970-01-01T00:00:00.000Z INFO ${'b'.repeat(1000)}\n`);
		expect(await exists(`${filePath}.2`)).toBe(false);
	});

	it('records a failed write instead of throwing', async () => {
		const logger = new RotatingFileLogger({
			filePath: path.join(tmp, 'missing-dir', 'engine.log'),
			maxBytes: 1024,
			maxFiles: 1,
		});

		logger.error('lost');
		await logger.flush();

		expect(logger.lastError).toMatch(/ENOENT/);
	});
});
