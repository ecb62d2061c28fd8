import type { TruncatePosition } from '../../shared/truncate';
import { highlightSegments } from '../utils';

interface Props {
	name: string;
	matchStart?: number;
	matchEnd?: number;
	/** Width budget in terminal cells */
	maxWidth: number;
	position?: TruncatePosition;
}

/**
 * File name fitted to `maxWidth` cells with the matched part wrapped in `<mark>`.
 * The full name stays available as the tooltip.
 */
export function HighlightedName({ name, matchStart, matchEnd, maxWidth, position = 'end' }: Props) {
	const match =
		matchStart !== undefined && matchEnd !== undefined && matchEnd > matchStart
			? { start: matchStart, end: matchEnd }
			: undefined;
	const segments = highlightSegments(name, match, maxWidth, position);

	return (
		<span class="pfs-name" title={name}>
			{segments.map((segment, index) =>
				segment.highlighted ? <mark key={index}>{segment.text}</mark> : <span key={index}>{segment.text}</span>
			)}
		</span>
	);
}
