import { NEVER_CANCELLED, type CancellationToken } from '../../common/cancellation';
import type { FileSystem } from '../../common/fileSystem';
import { noopLogger, type Logger } from '../../common/logger';
import type { OperationProgress, SearchMatch, SearchResult, SymlinkPolicy } from '../../types';
import { walkTree } from '../traversal/walkTree';
import type { EntryInfo } from '../traversal/traversalTypes';
import { createSubstringMatcher, type NameMatcher } from './nameMatcher';

export const DEFAULT_MAX_RESULTS = 1000;

export interface SearchParams {
	rootPath: string;
	query: string;
	/** Overrides the default substring matcher built from `query` */
	matcher?: NameMatcher;
	caseSensitive?: boolean;
	maxResults?: number;
	cancellationToken?: CancellationToken;
	onProgress?: (progress: OperationProgress) => void;
	symlinkPolicy?: SymlinkPolicy;
	maxDepth?: number;
	fs?: FileSystem;
	logger?: Logger;
}

function toMatch(entry: EntryInfo, relativePath: string, matcher: NameMatcher): SearchMatch | undefined {
	const range = matcher(entry.name);
	if (!range) return undefined;
	return {
		relativePath,
		path: entry.path,
		name: entry.name,
		kind: entry.kind,
		matchStart: range.start,
		matchEnd: range.end,
	};
}

/**
 * Finds entries under `rootPath` whose name matches, stopping the walk as soon as
 * `maxResults` matches are collected (remaining subtrees are never read).
 * Cyclic and too-deep branches are never entered and so contribute no matches.
 * @param params - Root, query or matcher, cap, cancellation and walk options.
 * @returns Matches in walk order.
 */
export async function searchFiles({
	rootPath,
	query,
	matcher,
	caseSensitive = false,
	maxResults = DEFAULT_MAX_RESULTS,
	cancellationToken = NEVER_CANCELLED,
	onProgress,
	symlinkPolicy,
	maxDepth,
	fs,
	logger = noopLogger,
}: SearchParams): Promise<SearchResult> {
	const match = matcher ?? createSubstringMatcher(query, { caseSensitive });
	const cap = Math.max(0, Math.floor(maxResults));
	const result: SearchResult = {
		rootPath,
		query,
		matches: [],
		limitReached: false,
		partial: false,
		errors: [],
	};

	if (cap === 0) {
		result.limitReached = true;
		return result;
	}

	let visited = 0;

	for await (const event of walkTree({ rootPath, symlinkPolicy, maxDepth, cancellationToken, fs, logger })) {
		if (event.type === 'diagnostic') {
			if (event.kind === 'Cancelled') {
				result.partial = true;
				result.partialReason = 'cancelled';
			} else {
				result.errors.push({ path: event.path, kind: event.kind, message: event.message });
			}
			continue;
		}

		if (event.type === 'leaveDir') continue;

		visited++;
		if (event.type === 'enterDir') {
			onProgress?.({
				operation: 'search',
				phase: 'scanning',
				currentPath: event.path,
				bytesDone: 0,
				bytesTotal: 0,
				entriesDone: visited,
				entriesTotal: 0,
				currentFileBytesDone: 0,
				currentFileBytesTotal: 0,
			});
		}

		// The root is where we search, not a result (even when it is a file).
		if (event.depth === 0) continue;

		const found = toMatch(event.entry, event.relativePath, match);
		if (!found) continue;

		result.matches.push(found);
		if (result.matches.length >= cap) {
			result.limitReached = true;
			// Leaving the loop closes the walk: nothing below this point is read.
			break;
		}
	}

	logger.debug('search: done', {
		rootPath,
		matches: result.matches.length,
		limitReached: result.limitReached,
		partial: result.partial,
	});

	return result;
}
