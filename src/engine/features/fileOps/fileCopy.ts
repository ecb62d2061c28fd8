import * as path from 'path';
import { randomBytes } from 'crypto';
import type { FileHandle } from 'fs/promises';
import { toErrorMessage } from '../../common/errors';
import type { FileSystem } from '../../common/fileSystem';
import type { Logger } from '../../common/logger';

export interface FileCopyParams {
	sourcePath: string;
	destinationPath: string;
	mode: number;
	atimeMs: number;
	mtimeMs: number;
	chunkSize: number;
	/** Called after every chunk with the bytes copied so far */
	onChunk?: (bytesCopied: number) => void;
	fs: FileSystem;
	logger: Logger;
}

/**
 * Hidden sibling the copy is written to before the final rename.
 */
export function temporaryPathFor(destinationPath: string): string {
	const suffix = randomBytes(4).toString('hex');
	return path.join(path.dirname(destinationPath), `.${path.basename(destinationPath)}.panefs-${suffix}.partial`);
}

async function closeHandle(handle: FileHandle | undefined, logger: Logger): Promise<void> {
	if (!handle) return;
	try {
		await handle.close();
	} catch (error) {
		logger.warn('copy: close failed', { error: toErrorMessage(error) });
	}
}

/**
 * Copies one regular file so the destination never shows up half-written:
 * chunks go to a temporary sibling, which is synced, stamped with the source's
 * mode and times, then renamed onto the final name (replacing an existing file).
 * On failure the temporary file is removed and the original error rethrown.
 * @returns Bytes copied.
 */
export async function copyFileAtomic({
	sourcePath,
	destinationPath,
	mode,
	atimeMs,
	mtimeMs,
	chunkSize,
	onChunk,
	fs,
	logger,
}: FileCopyParams): Promise<number> {
	const tempPath = temporaryPathFor(destinationPath);
	let source: FileHandle | undefined;
	let target: FileHandle | undefined;
	let created = false;
	let copied = 0;

	try {
		source = await fs.open(sourcePath, 'r');
		target = await fs.open(tempPath, 'wx', 0o600);
		created = true;

		const buffer = Buffer.allocUnsafe(Math.max(1, chunkSize));
		for (;;) {
			const { bytesRead } = await source.read(buffer, 0, buffer.length, null);
			if (bytesRead === 0) break;

			let written = 0;
			while (written < bytesRead) {
				const { bytesWritten } = await target.write(buffer, written, bytesRead - written);
				written += bytesWritten;
			}
			copied += bytesRead;
			onChunk?.(copied);
		}

		await target.sync();
		await target.close();
		target = undefined;
		await source.close();
		source = undefined;

		await fs.chmod(tempPath, mode & 0o7777);
		await fs.utimes(tempPath, new Date(atimeMs), new Date(mtimeMs));
		await fs.rename(tempPath, destinationPath);
		created = false;
		return copied;
	} catch (error) {
		await closeHandle(target, logger);
		await closeHandle(source, logger);
		if (created) {
			try {
				await fs.rm(tempPath);
			} catch (cleanupError) {
				logger.warn('copy: cannot remove temporary file', { path: tempPath, error: toErrorMessage(cleanupError) });
			}
		}
		throw error;
	}
}
