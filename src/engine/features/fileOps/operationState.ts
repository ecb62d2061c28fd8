import { FileOpError } from '../../common/errors';
import type { OperationState } from './operationTypes';

const TRANSITIONS: Record<OperationState, ReadonlyArray<OperationState>> = {
	idle: ['planning'],
	planning: ['executing', 'aborted', 'cancelled'],
	executing: ['completed', 'partiallyCompleted', 'cancelled', 'aborted'],
	completed: [],
	partiallyCompleted: [],
	cancelled: [],
	aborted: [],
};

/**
 * Lifecycle of one bulk operation:
 * idle → planning → executing → completed | partiallyCompleted | cancelled | aborted.
 */
export class OperationStateMachine {
	private current: OperationState = 'idle';

	constructor(private readonly onChange?: (state: OperationState) => void) {}

	get state(): OperationState {
		return this.current;
	}

	get isTerminal(): boolean {
		return TRANSITIONS[this.current].length === 0;
	}

	canTransition(to: OperationState): boolean {
		return TRANSITIONS[this.current].includes(to);
	}

	transition(to: OperationState): void {
		if (!this.canTransition(to)) {
			throw new FileOpError('InvalidInput', `Illegal operation state transition: ${this.current} -> ${to}`);
		}
		this.current = to;
		this.onChange?.(to);
	}
}
