import { EventEmitter } from 'events';
import type { ScanProgress, ScanResult } from '../../../shared/types';
import { CancellationTokenSource, type CancellationToken } from '../../common/cancellation';
import { configManager, type ConfigManager } from '../../common/configManager';
import { createErrorNode } from '../treemap/treemapNode';
import { runWithTimeout } from './controller/timeoutGovernor';
import { scanDiskUsage } from './engine/scanEngine';

interface InFlightScan {
	source: CancellationTokenSource;
	done: Promise<ScanResult>;
}

/**
 * Disk map scanner with a deadline and at most one scan in flight.
 * Starting a scan cancels the previous one and waits for it to settle first.
 */
export class DiskMapScanner extends EventEmitter {
	private inFlight: InFlightScan | undefined;
	private runningScans = 0;
	private lastProgressUpdate = 0;

	constructor(private readonly config: ConfigManager = configManager) {
		super();
	}

	/**
	 * Dispose and cleanup
	 */
	dispose(): void {
		this.cancelCurrentScan();
		this.removeAllListeners();
	}

	/**
	 * Check if a scan is currently in progress
	 */
	isScanInProgress(): boolean {
		return this.runningScans > 0;
	}

	/**
	 * Scan a path. Any scan still running on this instance is cancelled and awaited first.
	 */
	scan(rootPath: string): Promise<ScanResult> {
		const previous = this.inFlight;
		previous?.source.cancel('cancelled');

		const source = new CancellationTokenSource();
		const done = this.runAfter(previous, rootPath, source);
		const scan: InFlightScan = { source, done };
		this.inFlight = scan;

		return done.finally(() => {
			if (this.inFlight === scan) this.inFlight = undefined;
			source.dispose();
		});
	}

	/**
	 * Cancel current scan
	 */
	cancelCurrentScan(): void {
		this.inFlight?.source.cancel('cancelled');
	}

	private async runAfter(
		previous: InFlightScan | undefined,
		rootPath: string,
		source: CancellationTokenSource
	): Promise<ScanResult> {
		// Serialize: the previous scan observes its cancellation at its next checkpoint.
		if (previous) await previous.done;
		return this.performScan(rootPath, source.token);
	}

	/**
	 * Perform the actual scan under the configured deadline
	 */
	private async performScan(rootPath: string, cancellationToken: CancellationToken): Promise<ScanResult> {
		const config = this.config.getScanConfig();
		const startTime = Date.now();

		this.runningScans++;

		try {
			this.emitScanStart(rootPath);
			const { value, timedOut } = await runWithTimeout(
				(token) =>
					scanDiskUsage({
						rootPath,
						limits: config,
						cancellationToken: token,
						onProgress: ({ entriesScanned }) => this.emitProgress(rootPath, entriesScanned, config.progressThrottleMs),
					}),
				{ timeoutMs: config.timeoutSeconds * 1000, cancellationToken }
			);

			if (timedOut) {
				console.log(`Disk scan of ${rootPath} hit the ${config.timeoutSeconds}s deadline`);
			}
			return value;
		} catch (error) {
			console.error('Scan error:', error);
			const endTime = Date.now();
			return {
				rootPath,
				root: createErrorNode(rootPath),
				metadata: { startTime, endTime, duration: endTime - startTime, entriesScanned: 0 },
				incomplete: true,
				incompleteReason: cancellationToken.reason,
				skippedCount: 0,
			};
		} finally {
			this.runningScans--;
			this.emitScanEnd(rootPath);
		}
	}

	/**
	 * Emit progress update (throttled)
	 */
	private emitProgress(rootPath: string, entriesScanned: number, throttleMs: number): void {
		const now = Date.now();
		if (now - this.lastProgressUpdate < throttleMs) return;
		const progress: ScanProgress = { rootPath, entriesScanned, isScanning: true };
		this.emit('progress', progress);
		this.lastProgressUpdate = now;
	}

	private emitScanStart(rootPath: string): void {
		const progress: ScanProgress = { rootPath, entriesScanned: 0, isScanning: true };
		this.emit('scanStart', progress);
		this.lastProgressUpdate = Date.now();
	}

	private emitScanEnd(rootPath: string): void {
		const progress: ScanProgress = { rootPath, entriesScanned: 0, isScanning: false };
		this.emit('scanEnd', progress);
	}
}
