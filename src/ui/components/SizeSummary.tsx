import { Files, Folder, HardDrive, RefreshCw, Square } from 'lucide-preact';
import { truncatePath } from '../../shared/truncate';
import type { DirCalcResult } from '../types';
import { formatBytes } from '../utils';
import { IconButton } from './IconButton';
import { MetricsHeader } from './MetricsHeader';

interface Props {
	/** Latest result; absent until the first calculation finishes */
	result?: DirCalcResult;
	isCalculating: boolean;
	/** Width budget for the root path, in terminal cells */
	maxWidth: number;
	onRefreshOrCancel: () => void;
}

function statusFor(result: DirCalcResult | undefined, isCalculating: boolean): string | undefined {
	if (isCalculating) return 'Calculating…';
	if (!result) return undefined;
	if (result.partial) return 'Incomplete (cancelled)';
	if (result.errors.length > 0) return `${result.errors.length} entries could not be read`;
	return undefined;
}

export function SizeSummary({ result, isCalculating, maxWidth, onRefreshOrCancel }: Props) {
	const label = isCalculating ? 'Cancel calculation' : 'Recalculate size';

	return (
		<MetricsHeader
			ariaLabel={result ? truncatePath(result.rootPath, maxWidth) : 'Directory size'}
			metrics={[
				{
					label: 'Total size',
					icon: <HardDrive size={18} aria-hidden="true" />,
					value: result ? formatBytes(result.totalSize) : '—',
					main: true,
				},
				{
					label: 'Files',
					icon: <Files size={14} aria-hidden="true" />,
					value: result ? result.fileCount.toLocaleString() : '—',
				},
				{
					label: 'Directories',
					icon: <Folder size={14} aria-hidden="true" />,
					value: result ? result.dirCount.toLocaleString() : '—',
				},
			]}
			actions={
				<IconButton onClick={onRefreshOrCancel} label={label} busy={isCalculating}>
					{isCalculating ? <Square size={16} /> : <RefreshCw size={16} />}
				</IconButton>
			}
			status={statusFor(result, isCalculating)}
		/>
	);
}
