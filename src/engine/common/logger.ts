import * as fs from 'fs/promises';
import { configManager } from './configManager';
import { getErrorCode, toErrorMessage } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | undefined>;

/**
 * Diagnostic sink the engine writes to. Callers decide where it goes;
 * the engine never creates one on its own.
 */
export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const noopLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

/**
 * Formats one log line: `<iso time> <LEVEL> <message> <json fields>`.
 */
export function formatLogLine(time: Date, level: LogLevel, message: string, fields?: LogFields): string {
	const base = `${time.toISOString()} ${level.toUpperCase()} ${message}`;
	if (!fields) return base;
	const defined = Object.entries(fields).filter(([, value]) => value !== undefined);
	return defined.length > 0 ? `${base} ${JSON.stringify(Object.fromEntries(defined))}` : base;
}

abstract class LeveledLogger implements Logger {
	constructor(private readonly minLevel: LogLevel) {}

	protected abstract write(level: LogLevel, message: string, fields?: LogFields): void;

	private log(level: LogLevel, message: string, fields?: LogFields): void {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
		this.write(level, message, fields);
	}

	debug(message: string, fields?: LogFields): void {
		this.log('debug', message, fields);
	}

	info(message: string, fields?: LogFields): void {
		this.log('info', message, fields);
	}

	warn(message: string, fields?: LogFields): void {
		this.log('warn', message, fields);
	}

	error(message: string, fields?: LogFields): void {
		this.log('error', message, fields);
	}
}

class ConsoleLogger extends LeveledLogger {
	protected write(level: LogLevel, message: string, fields?: LogFields): void {
		const line = formatLogLine(new Date(), level, message, fields);
		if (level === 'error') console.error(line);
		else if (level === 'warn') console.warn(line);
		else console.log(line);
	}
}

/**
 * Logger printing to the console; meant for development runs.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
	return new ConsoleLogger(minLevel);
}

export interface RotatingFileLoggerOptions {
	filePath: string;
	/** Rotate once the active file would grow past this size; defaults to the configured `logMaxBytes` */
	maxBytes?: number;
	/** Number of rotated files kept next to the active one (`.1` … `.N`); defaults to the configured `logMaxFiles` */
	maxFiles?: number;
	minLevel?: LogLevel;
	now?: () => Date;
}

/**
 * Size-bounded log file with numbered rotation.
 * Writes are queued and applied in order; `flush()` waits for the queue.
 */
export class RotatingFileLogger extends LeveledLogger {
	private readonly filePath: string;
	private readonly maxBytes: number;
	private readonly maxFiles: number;
	private readonly now: () => Date;
	private pending: Promise<void> = Promise.resolve();
	private currentSize: number | undefined;
	private failure: string | undefined;

	constructor(options: RotatingFileLoggerOptions) {
		super(options.minLevel ?? 'debug');
		const configured = configManager.getLogConfig();
		this.filePath = options.filePath;
		this.maxBytes = Math.max(1, options.maxBytes ?? configured.maxBytes);
		this.maxFiles = Math.max(0, Math.floor(options.maxFiles ?? configured.maxFiles));
		this.now = options.now ?? (() => new Date());
	}

	/** Message of the last failed write, if any */
	get lastError(): string | undefined {
		return this.failure;
	}

	protected write(level: LogLevel, message: string, fields?: LogFields): void {
		const line = formatLogLine(this.now(), level, message, fields) + '\n';
		this.pending = this.pending.then(() => this.append(line)).catch((error: unknown) => {
			// A broken log sink must not take the operation down with it.
			this.failure = toErrorMessage(error);
		});
	}

	/**
	 * Resolves once every queued line has been written.
	 */
	async flush(): Promise<void> {
		await this.pending;
	}

	private async append(line: string): Promise<void> {
		const bytes = Buffer.byteLength(line);
		if (this.currentSize === undefined) this.currentSize = await this.readCurrentSize();

		if (this.currentSize > 0 && this.currentSize + bytes > this.maxBytes) {
			await this.rotate();
			this.currentSize = 0;
		}

		await fs.appendFile(this.filePath, line, 'utf8');
		this.currentSize += bytes;
	}

	private async readCurrentSize(): Promise<number> {
		try {
			return (await fs.stat(this.filePath)).size;
		} catch (error) {
			if (getErrorCode(error) === 'ENOENT') return 0;
			throw error;
		}
	}

	private async rotate(): Promise<void> {
		if (this.maxFiles === 0) {
			await fs.rm(this.filePath, { force: true });
			return;
		}

		await fs.rm(`${this.filePath}.${this.maxFiles}`, { force: true });
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfExists(from: string, to: string): Promise<void> {
	try {
		await fs.rename(from, to);
	} catch (error) {
		if (getErrorCode(error) !== 'ENOENT') throw error;
	}
}
