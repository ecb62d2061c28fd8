import * as path from 'path';

function ensureTrailingSeparator(value: string): string {
	return value.endsWith(path.sep) ? value : value + path.sep;
}

export function isPathWithinRoot(absolutePath: string, rootPath: string): boolean {
	const resolvedRoot = path.resolve(rootPath);
	const resolvedPath = path.resolve(absolutePath);

	if (resolvedPath === resolvedRoot) return true;
	return resolvedPath.startsWith(ensureTrailingSeparator(resolvedRoot));
}

/**
 * Joins a root and a relative path produced by the walker; an empty relative path is the root itself.
 */
export function joinRelative(rootPath: string, relativePath: string): string {
	return relativePath === '' ? rootPath : path.join(rootPath, relativePath);
}

/**
 * Ancestor directories of `absolutePath` up to and including `rootPath` (nearest first).
 */
export function ancestorsWithinRoot(absolutePath: string, rootPath: string): string[] {
	const ancestors: string[] = [];
	const resolvedRoot = path.resolve(rootPath);
	let current = path.resolve(absolutePath);

	while (current !== resolvedRoot) {
		const parent = path.dirname(current);
		if (parent === current || !isPathWithinRoot(parent, resolvedRoot)) break;
		ancestors.push(parent);
		current = parent;
	}
	return ancestors;
}
