import { AlertTriangle, Files, Square, X } from 'lucide-preact';
import { truncateDisplay, truncatePath } from '../../shared/truncate';
import type { OperationResult } from '../types';
import { formatBytes, operationLabel, statusLabel } from '../utils';

interface Props {
	result: OperationResult;
	/** Width budget for the abort reason and error paths, in terminal cells */
	maxWidth: number;
	/** Errors listed before the rest is summarized */
	maxErrors?: number;
	onDismiss?: () => void;
}

export function OperationResultBanner({ result, maxWidth, maxErrors = 5, onDismiss }: Props) {
	const failed = result.status === 'aborted' || result.status === 'partiallyCompleted';
	const Icon = failed ? AlertTriangle : result.status === 'cancelled' ? Square : Files;
	const shown = result.errors.slice(0, maxErrors);
	const hidden = result.errors.length - shown.length;

	return (
		<div
			class={`pfs-result-banner status-${result.status}`}
			role={failed ? 'alert' : 'status'}
			aria-live={failed ? 'assertive' : 'polite'}
		>
			<Icon size={18} class="pfs-result-icon" aria-hidden="true" />
			<div class="pfs-result-content">
				<div class="pfs-result-message">
					{operationLabel(result.operation)}: {statusLabel(result.status)}
				</div>
				<div class="pfs-result-details">
					{result.entriesCompleted.toLocaleString()} of {result.entriesTotal.toLocaleString()} items,{' '}
					{formatBytes(result.bytesDone)}
					{result.skipped.length > 0 && ` · ${result.skipped.length} skipped`}
					{result.crossDeviceFallbacks > 0 && ' · copied across devices'}
				</div>
				{result.abortReason && (
					<div class="pfs-result-reason" title={result.abortReason}>
						{truncateDisplay(result.abortReason, maxWidth, { position: 'middle' })}
					</div>
				)}
				{shown.length > 0 && (
					<ul class="pfs-result-errors">
						{shown.map((error, index) => (
							<li key={`${error.path}-${index}`} title={`${error.path}: ${error.message}`}>
								{error.kind}: {truncatePath(error.path, maxWidth)}
							</li>
						))}
						{hidden > 0 && <li class="hint">and {hidden} more</li>}
					</ul>
				)}
			</div>
			{onDismiss && (
				<button class="pfs-result-dismiss" onClick={onDismiss} title="Dismiss" aria-label="Dismiss">
					<X size={16} />
				</button>
			)}
		</div>
	);
}
