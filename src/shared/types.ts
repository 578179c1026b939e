/**
 * Shared types for the disk treemap engine
 *
 * These types are used by both the scan/layout core and the Preact renderer.
 * This file is the single source of truth for shared type definitions.
 */

// ============================================================================
// Category Types
// ============================================================================

export const FILE_TYPE_CATEGORIES = [
	'images',
	'videos',
	'audio',
	'documents',
	'code',
	'archives',
	'system',
	'other',
] as const;

export type FileTypeCategory = (typeof FILE_TYPE_CATEGORIES)[number];

// ============================================================================
// Tree & Layout Types
// ============================================================================

export type TreemapNodeKind = 'file' | 'directory';

export interface TreemapNode {
	/** Display name (last path segment) */
	readonly name: string;
	/** Absolute path */
	readonly path: string;
	/** Size in bytes */
	readonly size: number;
	/** Own category for leaves, dominant child category for directories */
	readonly category: FileTypeCategory;
	/** Ordered children (empty for leaves) */
	readonly children: ReadonlyArray<TreemapNode>;
	/** Depth level relative to the scan root */
	readonly depth: number;
	/** Directories can be entered even when their children were not scanned */
	readonly kind: TreemapNodeKind;
}

export interface Rect {
	x: number;
	y: number;
	width: number;
	height: number;
}

export interface CanvasSize {
	width: number;
	height: number;
}

export interface TreemapRect {
	node: TreemapNode;
	rect: Rect;
}

// ============================================================================
// Scan Types
// ============================================================================

export type IncompleteReason = 'cancelled' | 'time_limit';

export interface ScanMetadata {
	/** Timestamp when scan started */
	startTime: number;
	/** Timestamp when scan completed */
	endTime: number;
	/** Duration in milliseconds */
	duration: number;
	/** Number of directory entries processed */
	entriesScanned: number;
}

export interface ScanResult {
	/** Root path that was scanned */
	rootPath: string;
	/** Resulting tree */
	root: TreemapNode;
	/** Scan metadata */
	metadata: ScanMetadata;
	/** Whether enumeration was cut short */
	incomplete: boolean;
	/** Reason for incompleteness */
	incompleteReason?: IncompleteReason;
	/** Number of entries skipped because they could not be stat'ed */
	skippedCount: number;
}

export interface ScanProgress {
	/** Root path being scanned */
	rootPath: string;
	/** Number of entries processed so far */
	entriesScanned: number;
	/** Whether scan is in progress */
	isScanning: boolean;
}

export interface TreemapStatistics {
	totalSize: number;
	itemCount: number;
	maxDepth: number;
}

export interface CategoryTotal {
	category: FileTypeCategory;
	bytes: number;
}
