import { EventEmitter } from 'events';
import { z } from 'zod';
import type { Disposable, SymlinkPolicy } from '../types';
import { toDisposable } from './disposableStore';

export interface TraversalConfig {
	maxDepth: number;
	symlinkPolicy: SymlinkPolicy;
}

export interface SearchConfig {
	maxResults: number;
	caseSensitive: boolean;
}

export interface OperationConfig {
	concurrentOperations: number;
	copyChunkSize: number;
	progressThrottleMs: number;
	allowCrossDevice: boolean;
}

export interface LogConfig {
	maxBytes: number;
	maxFiles: number;
}

const settingsSchema = z.object({
	maxDepth: z.number().int().min(0).max(4096),
	symlinkPolicy: z.enum(['opaque', 'follow']),
	maxResults: z.number().int().min(1),
	caseSensitive: z.boolean(),
	concurrentOperations: z.number().int().min(1).max(1024),
	copyChunkSize: z.number().int().min(1024),
	progressThrottleMs: z.number().int().min(0),
	allowCrossDevice: z.boolean(),
	logMaxBytes: z.number().int().min(1024),
	logMaxFiles: z.number().int().min(0).max(100),
});

export type EngineSettings = z.infer<typeof settingsSchema>;

const overridesSchema = settingsSchema.partial().strict();

export type EngineSettingsOverrides = z.infer<typeof overridesSchema>;

export const DEFAULT_SETTINGS: Readonly<EngineSettings> = Object.freeze({
	maxDepth: 256,
	symlinkPolicy: 'opaque',
	maxResults: 1000,
	caseSensitive: false,
	concurrentOperations: 16,
	copyChunkSize: 1024 * 1024,
	progressThrottleMs: 200,
	allowCrossDevice: true,
	logMaxBytes: 1024 * 1024,
	logMaxFiles: 3,
});

const booleanFromEnv = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const ENV_KEYS: Readonly<Record<string, readonly [keyof EngineSettings, z.ZodTypeAny]>> = {
	PANEFS_MAX_DEPTH: ['maxDepth', z.coerce.number()],
	PANEFS_SYMLINK_POLICY: ['symlinkPolicy', z.string()],
	PANEFS_MAX_RESULTS: ['maxResults', z.coerce.number()],
	PANEFS_CASE_SENSITIVE: ['caseSensitive', booleanFromEnv],
	PANEFS_CONCURRENT_OPERATIONS: ['concurrentOperations', z.coerce.number()],
	PANEFS_COPY_CHUNK_SIZE: ['copyChunkSize', z.coerce.number()],
	PANEFS_PROGRESS_THROTTLE_MS: ['progressThrottleMs', z.coerce.number()],
	PANEFS_ALLOW_CROSS_DEVICE: ['allowCrossDevice', booleanFromEnv],
	PANEFS_LOG_MAX_BYTES: ['logMaxBytes', z.coerce.number()],
	PANEFS_LOG_MAX_FILES: ['logMaxFiles', z.coerce.number()],
};

/**
 * Centralized configuration manager
 * Single responsibility: holding validated engine settings (nothing is persisted)
 */
export class ConfigManager {
	private static instance: ConfigManager | undefined;
	private settings: EngineSettings = { ...DEFAULT_SETTINGS };
	private readonly emitter = new EventEmitter();

	private constructor() {}

	static getInstance(): ConfigManager {
		// Singleton: engine services can import `configManager` without manual wiring.
		if (!ConfigManager.instance) {
			ConfigManager.instance = new ConfigManager();
		}
		return ConfigManager.instance;
	}

	getTraversalConfig(): TraversalConfig {
		return { maxDepth: this.settings.maxDepth, symlinkPolicy: this.settings.symlinkPolicy };
	}

	getSearchConfig(): SearchConfig {
		return { maxResults: this.settings.maxResults, caseSensitive: this.settings.caseSensitive };
	}

	getOperationConfig(): OperationConfig {
		return {
			concurrentOperations: this.settings.concurrentOperations,
			copyChunkSize: this.settings.copyChunkSize,
			progressThrottleMs: this.settings.progressThrottleMs,
			allowCrossDevice: this.settings.allowCrossDevice,
		};
	}

	getLogConfig(): LogConfig {
		return { maxBytes: this.settings.logMaxBytes, maxFiles: this.settings.logMaxFiles };
	}

	/**
	 * Applies validated overrides; throws a ZodError on invalid input and leaves settings untouched.
	 */
	update(overrides: unknown): void {
		const parsed = overridesSchema.parse(overrides);
		this.settings = settingsSchema.parse({ ...this.settings, ...parsed });
		this.emitter.emit('change');
	}

	/**
	 * Reads `PANEFS_*` variables; unknown variables are ignored.
	 */
	loadFromEnv(env: NodeJS.ProcessEnv = process.env): void {
		const overrides: Record<string, unknown> = {};
		for (const [variable, [key, schema]] of Object.entries(ENV_KEYS)) {
			const raw = env[variable];
			if (raw === undefined || raw === '') continue;
			overrides[key] = schema.parse(raw);
		}
		if (Object.keys(overrides).length > 0) this.update(overrides);
	}

	reset(): void {
		this.settings = { ...DEFAULT_SETTINGS };
		this.emitter.emit('change');
	}

	/**
	 * Watch for configuration changes
	 */
	onConfigChange(callback: () => void): Disposable {
		this.emitter.on('change', callback);
		return toDisposable(() => this.emitter.off('change', callback));
	}
}

// Export singleton for convenience
export const configManager = ConfigManager.getInstance();
