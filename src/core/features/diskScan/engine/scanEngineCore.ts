import type { CancellationToken } from '../../../common/cancellation';
import type { DiskScanLimits, ScanRuntimeState } from './scanEngineTypes';

// Directory levels expanded with real children; deeper directories get placeholder sizes.
export const MAX_EXPANDED_DEPTH = 1;

/**
 * Normalizes limits so a bad configuration can never stall or explode a scan.
 * @param limits - Requested limits.
 * @returns Limits with positive integer values.
 */
export function normalizeScanLimits(limits: DiskScanLimits): DiskScanLimits {
	return {
		maxEntriesPerDirectory: Math.max(1, Math.floor(limits.maxEntriesPerDirectory)),
		maxChildrenPerDirectory: Math.max(1, Math.floor(limits.maxChildrenPerDirectory)),
		directoryPlaceholderBytes: Math.max(0, Math.floor(limits.directoryPlaceholderBytes)),
	};
}

export function createRuntimeState(): ScanRuntimeState {
	return { entriesScanned: 0, skippedCount: 0, incomplete: false, incompleteReason: undefined };
}

/**
 * Returns true if an error is a permission-denied filesystem error.
 * @param error - Unknown error value.
 * @returns True when the error is an EACCES/EPERM error.
 */
export function isPermissionDeniedError(error: unknown): boolean {
	if (typeof error !== 'object' || error === null || !('code' in error)) return false;
	return error.code === 'EACCES' || error.code === 'EPERM';
}

/**
 * Returns true when the scan should stop, recording why on the runtime state.
 * @param state - Runtime scan state (mutated).
 * @param cancellationToken - Cancellation token.
 * @returns True when cancellation has been requested.
 */
export function shouldStop(state: ScanRuntimeState, cancellationToken: CancellationToken): boolean {
	if (!cancellationToken.isCancellationRequested) return false;

	if (!state.incomplete) {
		state.incomplete = true;
		state.incompleteReason = cancellationToken.reason ?? 'cancelled';
	}
	return true;
}
