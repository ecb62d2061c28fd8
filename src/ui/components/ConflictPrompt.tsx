import { FileX } from 'lucide-preact';
import { truncateDisplay, truncatePath } from '../../shared/truncate';
import type { ConflictInfo, ConflictResolution } from '../types';
import { baseName } from '../utils';

interface Props {
	conflict: ConflictInfo;
	/** Width budget for names and paths, in terminal cells */
	maxWidth: number;
	onResolve: (resolution: ConflictResolution) => void;
}

const CHOICES: ReadonlyArray<{ resolution: ConflictResolution; label: string }> = [
	{ resolution: 'overwrite', label: 'Overwrite' },
	{ resolution: 'skip', label: 'Skip' },
	{ resolution: 'rename', label: 'Rename' },
	{ resolution: 'overwriteAll', label: 'Overwrite all' },
	{ resolution: 'skipAll', label: 'Skip all' },
	{ resolution: 'cancel', label: 'Cancel' },
];

export function ConflictPrompt({ conflict, maxWidth, onResolve }: Props) {
	const name = baseName(conflict.destinationPath);
	const position = conflict.total > 1 ? ` (${conflict.index} of ${conflict.total})` : '';
	// "All" choices only make sense when more conflicts follow.
	const choices = CHOICES.filter(
		(choice) => conflict.index < conflict.total || (choice.resolution !== 'overwriteAll' && choice.resolution !== 'skipAll')
	);

	return (
		<div class="pfs-conflict" role="dialog" aria-label="File conflict">
			<div class="pfs-conflict-header">
				<FileX size={18} aria-hidden="true" />
				<span class="pfs-conflict-title">
					"{truncateDisplay(name, maxWidth, { position: 'middle' })}" already exists{position}
				</span>
			</div>
			<div class="pfs-conflict-path" title={conflict.destinationPath}>
				{truncatePath(conflict.destinationPath, maxWidth)}
			</div>
			{conflict.existingKind !== conflict.sourceKind && (
				<div class="pfs-caption">
					Existing {conflict.existingKind} would be replaced by a {conflict.sourceKind}.
				</div>
			)}
			<div class="pfs-conflict-actions">
				{choices.map((choice) => (
					<button type="button" key={choice.resolution} onClick={() => onResolve(choice.resolution)}>
						{choice.label}
					</button>
				))}
			</div>
		</div>
	);
}
