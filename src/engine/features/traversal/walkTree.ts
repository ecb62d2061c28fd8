import * as path from 'path';
import { NEVER_CANCELLED } from '../../common/cancellation';
import { classifyFsError, toErrorMessage } from '../../common/errors';
import { nodeFileSystem, type FileSystem } from '../../common/fileSystem';
import { noopLogger } from '../../common/logger';
import { AncestrySet } from './ancestrySet';
import { describeEntry } from './entryInfo';
import {
	DEFAULT_MAX_DEPTH,
	type DiagnosticKind,
	type EntryIdentity,
	type EntryInfo,
	type TraversalOptions,
	type VisitEvent,
} from './traversalTypes';

interface DirectoryFrame {
	path: string;
	relativePath: string;
	depth: number;
	names: string[];
	index: number;
}

function diagnostic(
	kind: DiagnosticKind,
	entryPath: string,
	relativePath: string,
	depth: number,
	message: string
): VisitEvent {
	return { type: 'diagnostic', kind, path: entryPath, relativePath, depth, message };
}

function toDiagnosticKind(error: unknown): DiagnosticKind {
	const kind = classifyFsError(error);
	switch (kind) {
		case 'NotFound':
		case 'PermissionDenied':
		case 'CyclicSymlink':
			return kind;
		default:
			return 'IOFailure';
	}
}

function childRelativePath(parentRelative: string, name: string): string {
	return parentRelative === '' ? name : `${parentRelative}${path.sep}${name}`;
}

/**
 * Walks a directory tree and yields visit events, depth first.
 *
 * - Cycle-safe: a directory whose identity is already on the descent path is
 *   reported as `CyclicSymlink` and not entered.
 * - Depth-bounded: directories deeper than `maxDepth` are reported as `DepthExceeded`.
 * - Error-tolerant: unreadable entries become diagnostics; the walk goes on.
 * - Cancellable: the token is checked before every entry and every descent.
 *
 * The sequence is lazy and single-pass; breaking out of it stops all further I/O.
 * Siblings come in directory-listing order.
 * @param options - Root, symlink policy, depth limit, cancellation, fs port.
 * @returns Async sequence of visit events.
 */
export async function* walkTree(options: TraversalOptions): AsyncGenerator<VisitEvent, void, undefined> {
	const {
		rootPath,
		symlinkPolicy = 'opaque',
		maxDepth = DEFAULT_MAX_DEPTH,
		cancellationToken = NEVER_CANCELLED,
		fs = nodeFileSystem,
		logger = noopLogger,
	} = options;

	const ancestry = new AncestrySet();
	const stack: DirectoryFrame[] = [];

	/**
	 * Identity to check before descending, or undefined when the entry is a leaf.
	 */
	const descentIdentity = (entry: EntryInfo): EntryIdentity | undefined => {
		if (entry.kind === 'directory') return entry.identity;
		if (symlinkPolicy === 'follow' && entry.kind === 'symlink' && entry.target?.kind === 'directory') {
			return entry.target.identity;
		}
		return undefined;
	};

	/**
	 * A link the OS refuses to resolve (`ELOOP`) is a cycle when links are followed.
	 */
	const isLoopingLink = (entry: EntryInfo): boolean =>
		symlinkPolicy === 'follow' && entry.kind === 'symlink' && entry.targetErrorCode === 'ELOOP';

	/**
	 * Runs the pre-descent checks and reads the directory listing.
	 * Yields the `enterDir` event (or a diagnostic) and returns the new frame.
	 */
	async function* enterDirectory(
		entry: EntryInfo,
		identity: EntryIdentity,
		relativePath: string,
		depth: number
	): AsyncGenerator<VisitEvent, DirectoryFrame | undefined, undefined> {
		if (depth > maxDepth) {
			logger.debug('walk: depth limit reached', { path: entry.path, depth });
			yield diagnostic('DepthExceeded', entry.path, relativePath, depth, `Maximum directory depth (${maxDepth}) exceeded`);
			return undefined;
		}

		if (ancestry.has(identity)) {
			logger.debug('walk: cycle detected', { path: entry.path });
			yield diagnostic('CyclicSymlink', entry.path, relativePath, depth, `Circular symlink detected: ${entry.path}`);
			return undefined;
		}

		let names: string[];
		try {
			names = await fs.readdir(entry.path);
		} catch (error) {
			logger.debug('walk: cannot read directory', { path: entry.path, error: toErrorMessage(error) });
			yield diagnostic(toDiagnosticKind(error), entry.path, relativePath, depth, toErrorMessage(error));
			return undefined;
		}

		ancestry.push(identity);
		yield { type: 'enterDir', path: entry.path, relativePath, depth, entry };
		return { path: entry.path, relativePath, depth, names, index: 0 };
	}

	try {
		if (cancellationToken.isCancellationRequested) {
			yield diagnostic('Cancelled', rootPath, '', 0, 'Cancelled');
			return;
		}

		let root: EntryInfo;
		try {
			root = await describeEntry(fs, rootPath);
		} catch (error) {
			yield diagnostic(toDiagnosticKind(error), rootPath, '', 0, toErrorMessage(error));
			return;
		}

		if (isLoopingLink(root)) {
			yield diagnostic('CyclicSymlink', rootPath, '', 0, `Circular symlink detected: ${rootPath}`);
			return;
		}

		const rootIdentity = descentIdentity(root);
		if (!rootIdentity) {
			yield { type: 'file', path: rootPath, relativePath: '', depth: 0, entry: root };
			return;
		}

		const rootFrame = yield* enterDirectory(root, rootIdentity, '', 0);
		if (rootFrame) stack.push(rootFrame);

		while (stack.length > 0) {
			const frame = stack[stack.length - 1];

			if (frame.index >= frame.names.length) {
				stack.pop();
				ancestry.pop();
				yield { type: 'leaveDir', path: frame.path, relativePath: frame.relativePath, depth: frame.depth };
				continue;
			}

			const name = frame.names[frame.index++];
			const childPath = path.join(frame.path, name);
			const relativePath = childRelativePath(frame.relativePath, name);
			const depth = frame.depth + 1;

			// Check point: before each entry read.
			if (cancellationToken.isCancellationRequested) {
				yield diagnostic('Cancelled', childPath, relativePath, depth, 'Cancelled');
				return;
			}

			let entry: EntryInfo;
			try {
				entry = await describeEntry(fs, childPath);
			} catch (error) {
				yield diagnostic(toDiagnosticKind(error), childPath, relativePath, depth, toErrorMessage(error));
				continue;
			}

			if (isLoopingLink(entry)) {
				logger.debug('walk: looping link', { path: childPath });
				yield diagnostic('CyclicSymlink', childPath, relativePath, depth, `Circular symlink detected: ${childPath}`);
				continue;
			}

			const identity = descentIdentity(entry);
			if (!identity) {
				yield { type: 'file', path: childPath, relativePath, depth, entry };
				continue;
			}

			// Check point: before each directory descent.
			if (cancellationToken.isCancellationRequested) {
				yield diagnostic('Cancelled', childPath, relativePath, depth, 'Cancelled');
				return;
			}

			const child = yield* enterDirectory(entry, identity, relativePath, depth);
			if (child) stack.push(child);
		}
	} finally {
		ancestry.clear();
		stack.length = 0;
	}
}
