import type { EntryIdentity } from './traversalTypes';

export function identityKey(identity: EntryIdentity): string {
	return `${identity.dev}:${identity.ino}`;
}

/**
 * Identities of the directories on the current descent path of one walk.
 * Push on descent, pop on ascent; never shared between walks.
 */
export class AncestrySet {
	private readonly stack: string[] = [];
	private readonly members = new Set<string>();

	has(identity: EntryIdentity): boolean {
		return this.members.has(identityKey(identity));
	}

	push(identity: EntryIdentity): void {
		const key = identityKey(identity);
		this.stack.push(key);
		this.members.add(key);
	}

	pop(): void {
		const key = this.stack.pop();
		if (key !== undefined) this.members.delete(key);
	}

	get depth(): number {
		return this.stack.length;
	}

	clear(): void {
		this.stack.length = 0;
		this.members.clear();
	}
}
