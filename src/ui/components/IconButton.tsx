import type { ComponentChildren } from 'preact';

interface Props {
	onClick: () => void;
	disabled?: boolean;
	/** Used as both tooltip and accessible name */
	label: string;
	tone?: 'default' | 'danger';
	/** Marks the control whose work is still running */
	busy?: boolean;
	children: ComponentChildren;
}

export function IconButton({ onClick, disabled, label, tone = 'default', busy = false, children }: Props) {
	return (
		<button
			type="button"
			class={tone === 'danger' ? 'pfs-icon-button pfs-danger' : 'pfs-icon-button'}
			onClick={onClick}
			disabled={disabled}
			title={label}
			aria-label={label}
			aria-busy={busy ? 'true' : undefined}
		>
			{children}
		</button>
	);
}
