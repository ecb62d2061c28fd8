import { AlertTriangle, SearchX } from 'lucide-preact';
import { truncatePath } from '../../shared/truncate';
import type { SearchMatch, SearchResult } from '../types';
import { parentPath } from '../utils';
import { EmptyState } from './EmptyState';
import { EntryRow } from './EntryRow';
import { HighlightedName } from './HighlightedName';

interface Props {
	result: SearchResult;
	/** Width budget for each row, in terminal cells */
	maxWidth: number;
	selectedPath?: string;
	onOpen: (match: SearchMatch) => void;
}

function footerText(result: SearchResult): string {
	const count = `${result.matches.length.toLocaleString()} ${result.matches.length === 1 ? 'match' : 'matches'}`;
	if (result.partialReason === 'cancelled') return `${count} (cancelled)`;
	if (result.limitReached) return `${count} (limit reached)`;
	return count;
}

export function SearchResultsList({ result, maxWidth, selectedPath, onOpen }: Props) {
	if (result.matches.length === 0) {
		return (
			<EmptyState
				icon={<SearchX size={20} aria-hidden="true" />}
				message={`No matches for "${result.query}".`}
				hint={result.partial ? 'The search was cancelled before it finished.' : undefined}
			/>
		);
	}

	// Name column gets roughly two thirds of the row.
	const nameWidth = Math.max(1, Math.floor((maxWidth * 2) / 3));
	const parentWidth = Math.max(0, maxWidth - nameWidth - 1);

	return (
		<div class="pfs-search-results">
			<ul class="pfs-list" aria-label="Search results">
				{result.matches.map((match) => (
					<li key={match.path}>
						<EntryRow
							kind={match.kind}
							onActivate={() => onOpen(match)}
							selected={match.path === selectedPath}
							tooltip={match.path}
						>
							<HighlightedName
								name={match.name}
								matchStart={match.matchStart}
								matchEnd={match.matchEnd}
								maxWidth={nameWidth}
							/>
							<span class="pfs-parent">{truncatePath(parentPath(match.relativePath), parentWidth)}</span>
						</EntryRow>
					</li>
				))}
			</ul>
			<div class="pfs-caption" aria-live="polite">
				{footerText(result)}
				{result.errors.length > 0 && (
					<span class="pfs-warning" title={`${result.errors.length} unreadable entries`}>
						<AlertTriangle size={12} aria-hidden="true" /> {result.errors.length} skipped
					</span>
				)}
			</div>
		</div>
	);
}
