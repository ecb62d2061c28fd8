// @vitest-environment jsdom
import { render } from 'preact';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { OperationProgress } from '../types';
import { OperationProgressPanel } from './OperationProgressPanel';

function progress(overrides: Partial<OperationProgress>): OperationProgress {
	return {
		operation: 'move',
		phase: 'executing',
		currentPath: '/home/user/projects/alpha/src/index.ts',
		bytesDone: 512,
		bytesTotal: 1024,
		entriesDone: 2,
		entriesTotal: 4,
		currentFileBytesDone: 0,
		currentFileBytesTotal: 0,
		...overrides,
	};
}

describe('OperationProgressPanel', () => {
	let container: HTMLElement;

	beforeEach(() => {
		container = document.createElement('div');
		document.body.appendChild(container);
	});

	afterEach(() => {
		render(null, container);
		container.remove();
	});

	it('shows the bar, the shortened path and the counters', () => {
		render(<OperationProgressPanel progress={progress({})} maxWidth={12} />, container);

		expect(container.querySelector('.pfs-progress-title')?.textContent).toBe('Moving');
		expect(container.querySelector('[role="progressbar"]')?.getAttribute('aria-valuenow')).toBe('50');
		expect(container.querySelector('.pfs-progress-path')?.textContent).toBe('…rc/index.ts');
		expect(container.querySelector('.pfs-caption')?.textContent).toBe('2 / 4 items · 512 B / 1.0 KB');
	});

	it('shows a spinner without a bar while planning', () => {
		render(<OperationProgressPanel progress={progress({ phase: 'planning' })} maxWidth={40} />, container);

		expect(container.querySelector('.pfs-progress-title')?.textContent).toBe('Preparing…');
		expect(container.querySelector('[role="progressbar"]')).toBeNull();
	});

	it('cancels from its button', () => {
		const onCancel = vi.fn();
		render(<OperationProgressPanel progress={progress({})} maxWidth={40} onCancel={onCancel} />, container);

		container.querySelector<HTMLButtonElement>('button[aria-label="Cancel operation"]')?.click();

		expect(onCancel).toHaveBeenCalledTimes(1);
	});
});
