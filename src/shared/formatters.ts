/**
 * Shared formatting utilities
 *
 * These formatters are used by both the core (tooltips) and the renderer.
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format bytes to human-readable string
 * @param bytes Number of bytes
 * @returns Formatted string (e.g., "18.2 GB")
 */
export function formatBytes(bytes: number): string {
	if (!Number.isFinite(bytes) || bytes <= 0) {
		return '0 B';
	}

	const k = 1024;
	const i = Math.min(BYTE_UNITS.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
	const value = bytes / Math.pow(k, i);

	return `${value.toFixed(i === 0 ? 0 : 1)} ${BYTE_UNITS[i]}`;
}

/**
 * Format duration in milliseconds to human-readable string
 * @param ms Duration in milliseconds
 * @returns Formatted string (e.g., "1.4s")
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${ms}ms`;
	}
	return `${(ms / 1000).toFixed(1)}s`;
}

export function formatPercent(percent: number): string {
	if (!Number.isFinite(percent) || percent <= 0) return '0%';
	if (percent < 0.1) return '<0.1%';
	return `${percent.toFixed(1)}%`;
}
