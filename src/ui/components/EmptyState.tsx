import type { ComponentChildren } from 'preact';

interface Props {
	icon?: ComponentChildren;
	message: string;
	hint?: string;
}

export function EmptyState({ icon, message, hint }: Props) {
	return (
		<section class="pfs-empty-state" role="status">
			{icon}
			<p>{message}</p>
			{hint && <p class="pfs-hint">{hint}</p>}
		</section>
	);
}
