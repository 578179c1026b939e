import * as path from 'path';
import type { ScanResult } from '../../../../shared/types';
import type { DiskScanParams } from './scanEngineTypes';
import { createRuntimeState, normalizeScanLimits } from './scanEngineCore';
import { scanRootNode } from './scanEngineFs';

export type { DiskScanLimits, DiskScanParams, DiskScanProgress } from './scanEngineTypes';

/**
 * Bounded disk scan engine (no UI dependencies).
 * Single responsibility: turn a path into a sized, categorized node tree.
 * Never rejects for filesystem problems: a bad root becomes an "Error" leaf and
 * unreadable entries are skipped.
 * @param params - Scan parameters.
 * @param params.rootPath - Path to scan (resolved to an absolute path).
 * @param params.limits - Per-directory limits and the placeholder size.
 * @param params.cancellationToken - Cancellation token, polled before each entry.
 * @param params.onProgress - Optional callback after each processed entry.
 * @returns Scan result with the tree and completeness flags.
 */
export async function scanDiskUsage({
	rootPath,
	limits,
	cancellationToken,
	onProgress,
}: DiskScanParams): Promise<ScanResult> {
	const startTime = Date.now();
	const resolvedRoot = path.resolve(rootPath);
	const state = createRuntimeState();

	const root = await scanRootNode(resolvedRoot, {
		state,
		limits: normalizeScanLimits(limits),
		cancellationToken,
		onProgress,
	});

	const endTime = Date.now();

	return {
		rootPath: resolvedRoot,
		root,
		metadata: {
			startTime,
			endTime,
			duration: endTime - startTime,
			entriesScanned: state.entriesScanned,
		},
		incomplete: state.incomplete,
		incompleteReason: state.incompleteReason,
		skippedCount: state.skippedCount,
	};
}
