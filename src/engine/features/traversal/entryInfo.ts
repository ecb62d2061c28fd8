import * as path from 'path';
import type { Stats } from 'fs';
import { getErrorCode } from '../../common/errors';
import type { FileSystem } from '../../common/fileSystem';
import type { EntryKind } from '../../types';
import type { EntryInfo, SymlinkTarget } from './traversalTypes';

export function kindOf(stats: Stats): EntryKind {
	if (stats.isSymbolicLink()) return 'symlink';
	if (stats.isDirectory()) return 'directory';
	if (stats.isFile()) return 'file';
	return 'other';
}

type TargetLookup = { target: SymlinkTarget } | { errorCode: string };

async function describeTarget(fs: FileSystem, linkPath: string): Promise<TargetLookup> {
	try {
		const stats = await fs.stat(linkPath);
		const kind = kindOf(stats);
		// stat() follows links, so the kind can never be 'symlink' here.
		if (kind === 'symlink') return { errorCode: 'ELOOP' };
		return { target: { kind, size: stats.size, identity: { dev: stats.dev, ino: stats.ino } } };
	} catch (error) {
		// Broken or looping link: no target metadata, only the reason.
		return { errorCode: getErrorCode(error) ?? 'EIO' };
	}
}

/**
 * Describes one filesystem object without following it (`lstat`); for symlinks the
 * link text and the target's metadata are attached. Throws when `lstat` fails.
 */
export async function describeEntry(fs: FileSystem, entryPath: string): Promise<EntryInfo> {
	const stats = await fs.lstat(entryPath);
	const kind = kindOf(stats);
	const info: EntryInfo = {
		path: entryPath,
		name: path.basename(entryPath).normalize('NFC'),
		kind,
		size: stats.size,
		mtimeMs: stats.mtimeMs,
		atimeMs: stats.atimeMs,
		mode: stats.mode,
		identity: { dev: stats.dev, ino: stats.ino },
	};

	if (kind === 'symlink') {
		info.linkTarget = await fs.readlink(entryPath);
		const lookup = await describeTarget(fs, entryPath);
		if ('target' in lookup) info.target = lookup.target;
		else info.targetErrorCode = lookup.errorCode;
	}

	return info;
}
