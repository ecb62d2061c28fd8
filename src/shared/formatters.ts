/**
 * Shared formatting utilities for panefs
 *
 * These formatters are used by both the engine and the panel views.
 */

/**
 * Format bytes to human-readable string
 * @param bytes Number of bytes
 * @returns Formatted string (e.g., "18.2 GB")
 */
export function formatBytes(bytes: number): string {
	if (!Number.isFinite(bytes) || bytes <= 0) {
		return '0 B';
	}

	const units = ['B', 'KB', 'MB', 'GB', 'TB'];
	const k = 1024;
	const i = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
	const value = bytes / Math.pow(k, i);

	return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i]}`;
}

const PERMISSION_TRIPLETS = ['---', '--x', '-w-', '-wx', 'r--', 'r-x', 'rw-', 'rwx'];

/**
 * Format permission bits as "rwxr-xr-x"
 * @param mode File mode (only the low nine bits are used)
 */
export function formatPermissions(mode: number): string {
	const owner = PERMISSION_TRIPLETS[(mode >> 6) & 7];
	const group = PERMISSION_TRIPLETS[(mode >> 3) & 7];
	const other = PERMISSION_TRIPLETS[mode & 7];
	return `${owner}${group}${other}`;
}

/**
 * Format a progress ratio as a whole percentage clamped to 0..100
 */
export function formatPercent(done: number, total: number): string {
	if (total <= 0) return '0%';
	const ratio = Math.min(1, Math.max(0, done / total));
	return `${Math.floor(ratio * 100)}%`;
}

/**
 * Format a duration for log lines and result banners
 * @param ms Duration in milliseconds
 * @returns Formatted string (e.g., "850ms", "1.4s", "2m 05s")
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const totalSeconds = Math.floor(ms / 1000);
	const minutes = Math.floor(totalSeconds / 60);
	return `${minutes}m ${String(totalSeconds % 60).padStart(2, '0')}s`;
}
