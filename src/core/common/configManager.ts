export interface ScanConfig {
	timeoutSeconds: number;
	maxEntriesPerDirectory: number;
	maxChildrenPerDirectory: number;
	directoryPlaceholderBytes: number;
	progressThrottleMs: number;
}

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = Object.freeze({
	timeoutSeconds: 30,
	maxEntriesPerDirectory: 50,
	maxChildrenPerDirectory: 30,
	directoryPlaceholderBytes: 1024 * 1024,
	progressThrottleMs: 200,
});

type Environment = Record<string, string | undefined>;

/**
 * Reads a positive number from the environment, falling back to a default.
 * @param env - Environment map.
 * @param key - Variable name.
 * @param fallback - Default value.
 * @returns Parsed value or the default.
 */
function readPositiveNumber(env: Environment, key: string, fallback: number): number {
	const raw = env[key];
	if (raw === undefined || raw.trim() === '') return fallback;
	const value = Number(raw);
	return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Centralized configuration manager
 * Single responsibility: reading scan settings with defaults
 */
export class ConfigManager {
	private static instance: ConfigManager | undefined;

	constructor(private readonly env: Environment = process.env) {}

	static getInstance(): ConfigManager {
		// Singleton: core services can import `configManager` without manual wiring.
		if (!ConfigManager.instance) {
			ConfigManager.instance = new ConfigManager();
		}
		return ConfigManager.instance;
	}

	getScanConfig(): ScanConfig {
		// Read on demand so changes apply to the next scan without rebuilding services.
		return {
			timeoutSeconds: readPositiveNumber(this.env, 'DISKMAP_SCAN_TIMEOUT_SECONDS', DEFAULT_SCAN_CONFIG.timeoutSeconds),
			maxEntriesPerDirectory: Math.floor(
				readPositiveNumber(this.env, 'DISKMAP_SCAN_MAX_ENTRIES', DEFAULT_SCAN_CONFIG.maxEntriesPerDirectory)
			),
			maxChildrenPerDirectory: Math.floor(
				readPositiveNumber(this.env, 'DISKMAP_SCAN_MAX_CHILDREN', DEFAULT_SCAN_CONFIG.maxChildrenPerDirectory)
			),
			directoryPlaceholderBytes: Math.floor(
				readPositiveNumber(this.env, 'DISKMAP_SCAN_PLACEHOLDER_BYTES', DEFAULT_SCAN_CONFIG.directoryPlaceholderBytes)
			),
			progressThrottleMs: DEFAULT_SCAN_CONFIG.progressThrottleMs,
		};
	}
}

// Export singleton for convenience
export const configManager = ConfigManager.getInstance();
