import { useCallback, useEffect, useRef, useState } from 'preact/hooks';
import { OperationEventSubscription } from '../../engine/common/operationEvents';
import type { FileOperationManager, OperationEndEvent } from '../../engine/fileOperationManager';
import type { OperationKind, OperationProgress } from '../types';

interface ActiveOperation {
	id: number;
	operation: OperationKind;
}

export interface OperationPanelState {
	active: ActiveOperation | undefined;
	progress: OperationProgress | undefined;
	lastOutcome: OperationEndEvent | undefined;
	cancel: () => void;
	dismiss: () => void;
}

const BULK_OPERATIONS: ReadonlyArray<OperationKind> = ['copy', 'move', 'delete'];

/**
 * Follows the manager's copy, move and delete requests for the progress and result views.
 * Size and search requests are left to their own views.
 */
export function useOperationPanel(manager: FileOperationManager): OperationPanelState {
	const [active, setActive] = useState<ActiveOperation | undefined>(undefined);
	const [progress, setProgress] = useState<OperationProgress | undefined>(undefined);
	const [lastOutcome, setLastOutcome] = useState<OperationEndEvent | undefined>(undefined);
	const activeId = useRef<number | undefined>(undefined);

	useEffect(() => {
		const subscription = new OperationEventSubscription(
			manager,
			{
				onOperationStart: (event) => {
					// A request arriving while another runs is rejected; keep showing the running one.
					if (activeId.current !== undefined) return;
					activeId.current = event.id;
					setActive(event);
					setProgress(undefined);
					setLastOutcome(undefined);
				},
				onProgress: (event) => setProgress(event.progress),
				onOperationEnd: (outcome) => {
					if (outcome.id !== activeId.current) return;
					activeId.current = undefined;
					setActive(undefined);
					setProgress(undefined);
					setLastOutcome(outcome);
				},
			},
			{ operations: BULK_OPERATIONS }
		);
		return () => subscription.dispose();
	}, [manager]);

	// Copy, move and delete share one slot, so any of the three names it.
	const cancel = useCallback(() => manager.cancelCurrent('copy'), [manager]);
	const dismiss = useCallback(() => setLastOutcome(undefined), []);

	return { active, progress, lastOutcome, cancel, dismiss };
}
