import type { IncompleteReason } from '../../../../shared/types';
import type { CancellationToken } from '../../../common/cancellation';
import type { ScanConfig } from '../../../common/configManager';

export interface ScanRuntimeState {
	entriesScanned: number;
	skippedCount: number;
	incomplete: boolean;
	incompleteReason: IncompleteReason | undefined;
}

export type DiskScanLimits = Pick<
	ScanConfig,
	'maxEntriesPerDirectory' | 'maxChildrenPerDirectory' | 'directoryPlaceholderBytes'
>;

export interface DiskScanProgress {
	entriesScanned: number;
}

export interface DiskScanParams {
	rootPath: string;
	limits: DiskScanLimits;
	cancellationToken: CancellationToken;
	onProgress?: (progress: DiskScanProgress) => void;
}
