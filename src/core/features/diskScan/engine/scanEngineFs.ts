import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import type { TreemapNode } from '../../../../shared/types';
import type { CancellationToken } from '../../../common/cancellation';
import {
	createDirectoryNode,
	createErrorNode,
	createLeafNode,
	createPlaceholderDirectoryNode,
} from '../../treemap/treemapNode';
import { classifyPath } from './categoryClassifier';
import type { DiskScanLimits, DiskScanProgress, ScanRuntimeState } from './scanEngineTypes';
import { MAX_EXPANDED_DEPTH, isPermissionDeniedError, shouldStop } from './scanEngineCore';

interface DirectoryScanContext {
	state: ScanRuntimeState;
	limits: DiskScanLimits;
	cancellationToken: CancellationToken;
	onProgress?: (progress: DiskScanProgress) => void;
}

/**
 * Stats a path, following symlinks.
 * @param fullPath - Absolute path.
 * @returns Stats, or undefined when the path is missing or unreadable.
 */
async function tryStat(fullPath: string): Promise<Stats | undefined> {
	try {
		return await fs.stat(fullPath);
	} catch {
		return undefined;
	}
}

/**
 * Reads directory entries and returns undefined on error (counting permission errors as skipped).
 * @param currentPath - Directory path.
 * @param state - Runtime scan state (mutated when permissions are denied).
 * @returns Directory entries, or undefined when the directory cannot be read.
 */
async function tryReadDirEntries(
	currentPath: string,
	state: Pick<ScanRuntimeState, 'skippedCount'>
): Promise<Dirent[] | undefined> {
	try {
		return await fs.readdir(currentPath, { withFileTypes: true });
	} catch (error) {
		if (isPermissionDeniedError(error)) state.skippedCount++;
		return undefined;
	}
}

function isHiddenEntry(name: string): boolean {
	return name.startsWith('.');
}

/**
 * Sorts candidates by descending size and keeps the largest ones.
 * @param nodes - Candidate children (not mutated).
 * @param limit - Maximum number of children.
 * @returns Sorted, truncated copy.
 */
function selectLargestChildren(nodes: ReadonlyArray<TreemapNode>, limit: number): TreemapNode[] {
	return [...nodes].sort((a, b) => b.size - a.size).slice(0, limit);
}

/**
 * Builds the node for one directory entry.
 * @param fullPath - Entry path.
 * @param stats - Entry stats.
 * @param depth - Depth of the entry.
 * @param context - Scan context.
 * @returns Node, or undefined for entries that are neither files nor directories.
 */
async function buildEntryNode(
	fullPath: string,
	stats: Stats,
	depth: number,
	context: DirectoryScanContext
): Promise<TreemapNode | undefined> {
	const name = path.basename(fullPath);

	if (stats.isDirectory()) {
		// Below the expanded levels only an estimate is recorded; never recursing there
		// also keeps symlinked directory cycles out of the traversal.
		if (depth >= MAX_EXPANDED_DEPTH) {
			return createPlaceholderDirectoryNode({
				name,
				path: fullPath,
				size: context.limits.directoryPlaceholderBytes,
				depth,
			});
		}
		const children = await scanDirectoryChildren(fullPath, depth, context);
		return createDirectoryNode({ name, path: fullPath, children, depth });
	}

	// Other (socket, fifo, ...): ignore
	if (!stats.isFile()) return undefined;

	return createLeafNode({ name, path: fullPath, size: stats.size, category: classifyPath(fullPath), depth });
}

// HOT PATH: per-directory loop; the cancellation check here bounds how quickly a scan stops.
/**
 * Enumerates the visible entries of a directory into sized child nodes.
 * Stops early on cancellation and keeps whatever was collected.
 * @param dirPath - Directory path.
 * @param dirDepth - Depth of the directory itself.
 * @param context - Scan context.
 * @returns Children sorted by descending size and capped.
 */
async function scanDirectoryChildren(
	dirPath: string,
	dirDepth: number,
	context: DirectoryScanContext
): Promise<TreemapNode[]> {
	const { state, limits, cancellationToken, onProgress } = context;

	if (shouldStop(state, cancellationToken)) return [];

	const entries = await tryReadDirEntries(dirPath, state);
	if (!entries) return [];

	const candidates = entries
		.filter((entry) => !isHiddenEntry(entry.name))
		.slice(0, limits.maxEntriesPerDirectory);

	const nodes: TreemapNode[] = [];
	for (const entry of candidates) {
		if (shouldStop(state, cancellationToken)) break;

		const fullPath = path.join(dirPath, entry.name);
		const stats = await tryStat(fullPath);

		if (!stats) {
			state.skippedCount++;
		} else {
			const node = await buildEntryNode(fullPath, stats, dirDepth + 1, context);
			if (node) nodes.push(node);
		}

		state.entriesScanned++;
		onProgress?.({ entriesScanned: state.entriesScanned });
	}

	return selectLargestChildren(nodes, limits.maxChildrenPerDirectory);
}

/**
 * Builds the tree for a scan root: an "Error" leaf for a bad path, a leaf for a file,
 * or a directory node with bounded children.
 * @param rootPath - Absolute root path.
 * @param context - Scan context.
 * @returns Root node.
 */
export async function scanRootNode(rootPath: string, context: DirectoryScanContext): Promise<TreemapNode> {
	const stats = await tryStat(rootPath);
	if (!stats) return createErrorNode(rootPath);

	const name = path.basename(rootPath) || rootPath;

	if (stats.isDirectory()) {
		const children = await scanDirectoryChildren(rootPath, 0, context);
		return createDirectoryNode({ name, path: rootPath, children, depth: 0 });
	}

	return createLeafNode({ name, path: rootPath, size: stats.size, category: classifyPath(rootPath) });
}
