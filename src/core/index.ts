/**
 * Disk treemap core: path in, rectangles out.
 */

export type {
	CanvasSize,
	CategoryTotal,
	FileTypeCategory,
	IncompleteReason,
	Rect,
	ScanMetadata,
	ScanProgress,
	ScanResult,
	TreemapNode,
	TreemapNodeKind,
	TreemapRect,
	TreemapStatistics,
} from '../shared/types';
export { FILE_TYPE_CATEGORIES } from '../shared/types';
export { CATEGORY_LABELS } from '../shared/categories';
export { formatBytes, formatDuration, formatPercent } from '../shared/formatters';

export { CancellationTokenSource, neverCancelledToken } from './common/cancellation';
export type { CancellationToken, Disposable } from './common/cancellation';
export { ConfigManager, configManager, DEFAULT_SCAN_CONFIG } from './common/configManager';
export type { ScanConfig } from './common/configManager';

export { classifyExtension, classifyPath, getKnownExtensions } from './features/diskScan/engine/categoryClassifier';
export { scanDiskUsage } from './features/diskScan/engine/scanEngine';
export type { DiskScanLimits, DiskScanParams, DiskScanProgress } from './features/diskScan/engine/scanEngine';
export { runWithTimeout } from './features/diskScan/controller/timeoutGovernor';
export type { GovernedResult, TimeoutGovernorOptions } from './features/diskScan/controller/timeoutGovernor';
export { DiskMapScanner } from './features/diskScan/diskMapScanner';

export {
	computeStatistics,
	countItems,
	createDirectoryNode,
	createErrorNode,
	createLeafNode,
	createPlaceholderDirectoryNode,
	dominantCategory,
	maxDepth,
	sumByCategory,
} from './features/treemap/treemapNode';
export { squarify, worstRatio } from './features/treemap/squarifiedLayout';
export { aspectRatio, hitTest, layoutTreemap } from './features/treemap/treemapLayout';
export { buildNodeTooltip } from './features/treemap/tooltipBuilder';

export { DiskMapSession, DEFAULT_CANVAS } from './features/diskMap/diskMapSession';
export type { DiskMapSessionOptions, DiskMapState } from './features/diskMap/diskMapSession';
