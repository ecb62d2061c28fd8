/** POSIX NAME_MAX, in bytes */
const MAX_FILENAME_BYTES = 255;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/;

/**
 * Checks a single file name typed by the user (new folder, rename, conflict rename).
 * @returns An error message, or undefined when the name is acceptable.
 */
export function validateFilename(name: string): string | undefined {
	if (name.trim() === '') return 'Filename cannot be empty';
	if (name.includes('/') || name.includes('\\')) return 'Filename cannot contain path separators';
	if (name.includes('\0')) return 'Filename cannot contain null bytes';
	if (name === '.' || name === '..') return 'Invalid filename';
	if (Buffer.byteLength(name, 'utf8') > MAX_FILENAME_BYTES) return `Filename too long (max ${MAX_FILENAME_BYTES} bytes)`;
	if (CONTROL_CHARACTERS.test(name)) return 'Filename cannot contain control characters';
	if (name !== name.trim()) return 'Filename cannot start or end with whitespace';
	// Could be read as a command-line option by external tools.
	if (name.startsWith('-')) return 'Filename cannot start with hyphen';
	return undefined;
}
