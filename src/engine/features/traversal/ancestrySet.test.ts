import { describe, expect, it } from 'vitest';
import { AncestrySet, identityKey } from './ancestrySet';

describe('AncestrySet', () => {
	it('tracks identities on the current path only', () => {
		const set = new AncestrySet();
		set.push({ dev: 1, ino: 10 });
		set.push({ dev: 1, ino: 20 });

		expect(set.has({ dev: 1, ino: 10 })).toBe(true);
		expect(set.depth).toBe(2);

		set.pop();
		expect(set.has({ dev: 1, ino: 20 })).toBe(false);
		expect(set.has({ dev: 1, ino: 10 })).toBe(true);
	});

	it('distinguishes devices', () => {
		const set = new AncestrySet();
		set.push({ dev: 1, ino: 10 });

		expect(set.has({ dev: 2, ino: 10 })).toBe(false);
		expect(identityKey({ dev: 2, ino: 10 })).toBe('2:10');
	});

	it('clears everything', () => {
		const set = new AncestrySet();
		set.push({ dev: 1, ino: 1 });
		set.clear();

		expect(set.depth).toBe(0);
		expect(set.has({ dev: 1, ino: 1 })).toBe(false);
	});
});
