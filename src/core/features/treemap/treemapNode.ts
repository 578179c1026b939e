import type {
	CategoryTotal,
	FileTypeCategory,
	TreemapNode,
	TreemapNodeKind,
	TreemapStatistics,
} from '../../../shared/types';

/**
 * Creates a frozen leaf node.
 * @param params - Leaf attributes.
 * @returns Leaf node (no children).
 */
export function createLeafNode(params: {
	name: string;
	path: string;
	size: number;
	category: FileTypeCategory;
	depth?: number;
	kind?: TreemapNodeKind;
}): TreemapNode {
	return Object.freeze({
		name: params.name,
		path: params.path,
		size: params.size,
		category: params.category,
		children: Object.freeze([]),
		depth: params.depth ?? 0,
		kind: params.kind ?? 'file',
	});
}

/**
 * Leaf returned when the scan root is missing or unreadable.
 * @param path - Requested path.
 * @returns "Error" leaf with size 0 and category 'other'.
 */
export function createErrorNode(path: string): TreemapNode {
	return createLeafNode({ name: 'Error', path, size: 0, category: 'other' });
}

/**
 * Sums child sizes per category, keeping first-seen order for equal totals.
 * @param children - Child nodes.
 * @returns Totals in descending size order.
 */
export function sumByCategory(children: ReadonlyArray<TreemapNode>): CategoryTotal[] {
	const totals = new Map<FileTypeCategory, number>();
	for (const child of children) {
		totals.set(child.category, (totals.get(child.category) ?? 0) + child.size);
	}

	// Array.prototype.sort is stable, so ties stay in first-seen order.
	return [...totals.entries()]
		.map(([category, bytes]) => ({ category, bytes }))
		.sort((a, b) => b.bytes - a.bytes);
}

/**
 * Category with the greatest summed child size; 'other' when there are no children.
 * @param children - Child nodes.
 * @returns Dominant category.
 */
export function dominantCategory(children: ReadonlyArray<TreemapNode>): FileTypeCategory {
	return sumByCategory(children)[0]?.category ?? 'other';
}

/**
 * Creates a frozen directory node whose size and category roll up from its children.
 * @param params - Directory attributes.
 * @returns Directory node.
 */
export function createDirectoryNode(params: {
	name: string;
	path: string;
	children: ReadonlyArray<TreemapNode>;
	depth?: number;
}): TreemapNode {
	const children = Object.freeze([...params.children]);
	const size = children.reduce((sum, child) => sum + child.size, 0);

	return Object.freeze({
		name: params.name,
		path: params.path,
		size,
		category: dominantCategory(children),
		children,
		depth: params.depth ?? 0,
		kind: 'directory',
	});
}

/**
 * Sub-directory below the scanned level: sized by estimate, not by recursion.
 * @param params - Directory attributes and the placeholder size.
 * @returns Childless node with category 'system'.
 */
export function createPlaceholderDirectoryNode(params: {
	name: string;
	path: string;
	size: number;
	depth: number;
}): TreemapNode {
	return createLeafNode({ ...params, category: 'system', kind: 'directory' });
}

export function hasChildren(node: TreemapNode): boolean {
	return node.children.length > 0;
}

/**
 * Number of leaves under a node (a leaf counts as one).
 */
export function countItems(node: TreemapNode): number {
	if (!hasChildren(node)) return 1;
	return node.children.reduce((sum, child) => sum + countItems(child), 0);
}

/**
 * Height of the tree below a node (0 for a leaf).
 */
export function maxDepth(node: TreemapNode): number {
	if (!hasChildren(node)) return 0;
	let deepest = 0;
	for (const child of node.children) {
		deepest = Math.max(deepest, maxDepth(child));
	}
	return 1 + deepest;
}

export function computeStatistics(node: TreemapNode): TreemapStatistics {
	return { totalSize: node.size, itemCount: countItems(node), maxDepth: maxDepth(node) };
}
