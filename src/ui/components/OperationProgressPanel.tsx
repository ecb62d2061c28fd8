import { Loader2, Square } from 'lucide-preact';
import { truncatePath } from '../../shared/truncate';
import type { OperationProgress } from '../types';
import { operationLabel, progressPercent, progressSummary } from '../utils';
import { IconButton } from './IconButton';

interface Props {
	progress: OperationProgress;
	/** Width budget for the current path, in terminal cells */
	maxWidth: number;
	onCancel?: () => void;
}

export function OperationProgressPanel({ progress, maxWidth, onCancel }: Props) {
	const preparing = progress.phase === 'planning';
	const percent = preparing ? undefined : progressPercent(progress);

	return (
		<section class="pfs-progress" aria-label={operationLabel(progress.operation)}>
			<div class="pfs-progress-row">
				<span class="pfs-progress-title">
					{preparing && <Loader2 size={14} class="spinner" aria-hidden="true" />}
					{preparing ? 'Preparing…' : operationLabel(progress.operation)}
				</span>
				{percent && <span class="pfs-progress-percent">{percent}</span>}
				{onCancel && (
					<IconButton onClick={onCancel} label="Cancel operation" tone="danger">
						<Square size={14} />
					</IconButton>
				)}
			</div>

			{percent && (
				<div class="pfs-progress-bar" role="progressbar" aria-valuemin={0} aria-valuemax={100} aria-valuenow={parseInt(percent, 10)}>
					<div class="pfs-progress-fill" style={{ width: percent }} />
				</div>
			)}

			<div class="pfs-progress-path" title={progress.currentPath}>
				{truncatePath(progress.currentPath, maxWidth)}
			</div>
			<div class="pfs-caption">{progressSummary(progress)}</div>
		</section>
	);
}
