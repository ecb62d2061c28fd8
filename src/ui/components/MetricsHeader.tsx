import type { ComponentChildren } from 'preact';

export interface Metric {
	label: string;
	icon: ComponentChildren;
	value: ComponentChildren;
	/** Rendered larger; at most one per header */
	main?: boolean;
}

interface Props {
	ariaLabel: string;
	metrics: Metric[];
	actions?: ComponentChildren;
	status?: ComponentChildren;
}

/**
 * Strip of labelled figures with optional actions and a live status line.
 */
export function MetricsHeader({ ariaLabel, metrics, actions, status }: Props) {
	return (
		<header class="pfs-header" aria-label={ariaLabel}>
			<dl class="pfs-metrics">
				{metrics.map((metric) => (
					<div key={metric.label} class={metric.main ? 'pfs-metric pfs-metric-main' : 'pfs-metric'} title={metric.label}>
						<dt>
							{metric.icon}
							<span class="pfs-sr-only">{metric.label}</span>
						</dt>
						<dd class="pfs-metric-value">{metric.value}</dd>
					</div>
				))}
			</dl>
			{actions && <div class="pfs-metric-actions">{actions}</div>}
			{status && (
				<p class="pfs-caption" role="status">
					{status}
				</p>
			)}
		</header>
	);
}
