import * as fs from 'fs/promises';
import type { Stats } from 'fs';

/**
 * Filesystem primitives the engine relies on.
 * Everything goes through this port so tests can inject faults (EACCES, EXDEV, ENOSPC).
 */
export interface FileSystem {
	/** Metadata of the link itself */
	lstat(path: string): Promise<Stats>;
	/** Metadata of the link's target */
	stat(path: string): Promise<Stats>;
	readdir(path: string): Promise<string[]>;
	readlink(path: string): Promise<string>;
	realpath(path: string): Promise<string>;
	/** With `recursive`, missing parents are created and an existing directory is not an error */
	mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
	rmdir(path: string): Promise<void>;
	unlink(path: string): Promise<void>;
	/** Recursive, forced removal; used only to clear an entry being overwritten */
	rm(path: string): Promise<void>;
	rename(from: string, to: string): Promise<void>;
	symlink(target: string, path: string): Promise<void>;
	open(path: string, flags: string, mode?: number): Promise<fs.FileHandle>;
	chmod(path: string, mode: number): Promise<void>;
	utimes(path: string, atime: Date, mtime: Date): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
	lstat: (path) => fs.lstat(path),
	stat: (path) => fs.stat(path),
	readdir: (path) => fs.readdir(path),
	readlink: (path) => fs.readlink(path),
	realpath: (path) => fs.realpath(path),
	mkdir: async (path, options) => {
		await fs.mkdir(path, { recursive: options?.recursive ?? false });
	},
	rmdir: (path) => fs.rmdir(path),
	unlink: (path) => fs.unlink(path),
	rm: (path) => fs.rm(path, { recursive: true, force: true }),
	rename: (from, to) => fs.rename(from, to),
	symlink: (target, path) => fs.symlink(target, path),
	open: (path, flags, mode) => fs.open(path, flags, mode),
	chmod: (path, mode) => fs.chmod(path, mode),
	utimes: (path, atime, mtime) => fs.utimes(path, atime, mtime),
};
