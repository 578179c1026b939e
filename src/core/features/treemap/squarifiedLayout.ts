import type { Rect, TreemapNode, TreemapRect } from '../../../shared/types';

interface WeightedNode {
	node: TreemapNode;
	/** Share of the canvas area, in canvas units */
	area: number;
}

function layoutWeight(node: TreemapNode): number {
	return Number.isFinite(node.size) && node.size > 0 ? node.size : 0;
}

function sanitizeRect(rect: Rect): Rect {
	const clamp = (value: number) => (Number.isFinite(value) && value > 0 ? value : 0);
	return {
		x: Number.isFinite(rect.x) ? rect.x : 0,
		y: Number.isFinite(rect.y) ? rect.y : 0,
		width: clamp(rect.width),
		height: clamp(rect.height),
	};
}

/**
 * Worst aspect ratio of a row laid against a side of the remaining rectangle.
 * All values are in canvas area units.
 * @param rowTotal - Sum of the row's areas.
 * @param maxItem - Largest area in the row.
 * @param minItem - Smallest area in the row.
 * @param side - Length of the side the row is laid along.
 * @returns max(side² · max / total², total² / (side² · min)), or Infinity when degenerate.
 */
export function worstRatio(rowTotal: number, maxItem: number, minItem: number, side: number): number {
	if (rowTotal <= 0 || minItem <= 0 || side <= 0) return Infinity;
	const sideSquared = side * side;
	const totalSquared = rowTotal * rowTotal;
	return Math.max((sideSquared * maxItem) / totalSquared, totalSquared / (sideSquared * minItem));
}

/**
 * Places one finished row along the shorter side of `remaining`.
 * Wide rectangles get a full-height column, others a full-width band; the last
 * item (and the last row) absorb floating-point remainders so the tiling is exact.
 * @param row - Items in the row.
 * @param remaining - Space still free.
 * @param isLastRow - Whether this row consumes everything that is left.
 * @param out - Output list (mutated).
 * @returns The rectangle left over after the row.
 */
function layoutRow(row: ReadonlyArray<WeightedNode>, remaining: Rect, isLastRow: boolean, out: TreemapRect[]): Rect {
	const rowTotal = row.reduce((sum, item) => sum + item.area, 0);
	const isWide = remaining.width > remaining.height;
	const length = isWide ? remaining.height : remaining.width;
	const depthAvailable = isWide ? remaining.width : remaining.height;
	const thickness = isLastRow ? depthAvailable : Math.min(depthAvailable, length > 0 ? rowTotal / length : 0);

	let offset = 0;
	row.forEach((item, index) => {
		const extent = index === row.length - 1 ? length - offset : (item.area / rowTotal) * length;
		const rect: Rect = isWide
			? { x: remaining.x, y: remaining.y + offset, width: thickness, height: extent }
			: { x: remaining.x + offset, y: remaining.y, width: extent, height: thickness };
		out.push({ node: item.node, rect });
		offset += extent;
	});

	return isWide
		? { x: remaining.x + thickness, y: remaining.y, width: remaining.width - thickness, height: remaining.height }
		: { x: remaining.x, y: remaining.y + thickness, width: remaining.width, height: remaining.height - thickness };
}

/**
 * Zero-area fallback: slices the nodes along the longer side by size fraction.
 */
function sliceDegenerate(items: ReadonlyArray<{ node: TreemapNode; weight: number }>, bounds: Rect, total: number): TreemapRect[] {
	const alongWidth = bounds.width >= bounds.height;
	const length = alongWidth ? bounds.width : bounds.height;
	let offset = 0;

	return items.map(({ node, weight }) => {
		const extent = (weight / total) * length;
		const rect: Rect = alongWidth
			? { x: bounds.x + offset, y: bounds.y, width: extent, height: bounds.height }
			: { x: bounds.x, y: bounds.y + offset, width: bounds.width, height: extent };
		offset += extent;
		return { node, rect };
	});
}

// Squarified treemap layout (Bruls, Huizing, van Wijk)
/**
 * Lays sibling nodes out as near-square rectangles that tile `bounds`.
 * Each rectangle's area is `size / total × bounds area`. Output order is descending size.
 * @param nodes - Sibling nodes (not mutated).
 * @param bounds - Target rectangle.
 * @returns Placed rectangles; empty when there is nothing to place.
 */
export function squarify(nodes: ReadonlyArray<TreemapNode>, bounds: Rect): TreemapRect[] {
	if (nodes.length === 0) return [];

	const weighted = nodes
		.map((node) => ({ node, weight: layoutWeight(node) }))
		.sort((a, b) => b.weight - a.weight);
	const total = weighted.reduce((sum, item) => sum + item.weight, 0);
	if (total <= 0) return [];

	const rect = sanitizeRect(bounds);
	const positive = weighted.filter((item) => item.weight > 0);
	const empty = weighted.filter((item) => item.weight <= 0);
	const area = rect.width * rect.height;

	const result: TreemapRect[] =
		area > 0
			? squarifyPositive(
					positive.map(({ node, weight }) => ({ node, area: (weight / total) * area })),
					rect
				)
			: sliceDegenerate(positive, rect, total);

	// Zero-size nodes still get a (zero-area) rectangle, parked at the far corner.
	for (const { node } of empty) {
		result.push({ node, rect: { x: rect.x + rect.width, y: rect.y + rect.height, width: 0, height: 0 } });
	}

	return result;
}

function squarifyPositive(items: ReadonlyArray<WeightedNode>, bounds: Rect): TreemapRect[] {
	const result: TreemapRect[] = [];
	let remaining = bounds;
	let start = 0;

	while (start < items.length) {
		const side = Math.min(remaining.width, remaining.height);

		// A row always takes at least one item so the loop makes progress.
		let end = start + 1;
		let rowTotal = items[start].area;
		let rowMax = rowTotal;
		let rowMin = rowTotal;
		let bestRatio = worstRatio(rowTotal, rowMax, rowMin, side);

		// Greedily add more while the worst aspect ratio does not get worse
		while (end < items.length) {
			const candidate = items[end].area;
			const nextTotal = rowTotal + candidate;
			const nextMax = Math.max(rowMax, candidate);
			const nextMin = Math.min(rowMin, candidate);
			const nextRatio = worstRatio(nextTotal, nextMax, nextMin, side);
			if (nextRatio > bestRatio) break;

			rowTotal = nextTotal;
			rowMax = nextMax;
			rowMin = nextMin;
			bestRatio = nextRatio;
			end++;
		}

		remaining = layoutRow(items.slice(start, end), remaining, end === items.length, result);
		start = end;
	}

	return result;
}
