import { File, Folder, Link } from 'lucide-preact';
import type { ComponentChildren } from 'preact';
import type { EntryKind } from '../types';

interface Props {
	kind: EntryKind;
	onActivate: () => void;
	selected?: boolean;
	/** Full path, shown on hover when the row text is truncated */
	tooltip?: string;
	children: ComponentChildren;
}

function KindIcon({ kind }: { kind: EntryKind }) {
	switch (kind) {
		case 'directory':
			return <Folder size={14} aria-hidden="true" />;
		case 'symlink':
			return <Link size={14} aria-hidden="true" />;
		default:
			return <File size={14} aria-hidden="true" />;
	}
}

/**
 * One activatable entry in a panel list, prefixed with an icon for its kind.
 */
export function EntryRow({ kind, onActivate, selected = false, tooltip, children }: Props) {
	return (
		<button
			type="button"
			class={selected ? 'pfs-row pfs-row-selected' : 'pfs-row'}
			data-kind={kind}
			aria-current={selected ? 'true' : undefined}
			title={tooltip}
			onClick={onActivate}
		>
			<KindIcon kind={kind} />
			{children}
		</button>
	);
}
