import type { CanvasSize, Rect, TreemapNode, TreemapRect } from '../../../shared/types';
import { squarify } from './squarifiedLayout';
import { hasChildren } from './treemapNode';

/**
 * Lays out one level of the tree on a canvas anchored at the origin.
 * A node without children fills the whole canvas.
 * @param node - Node whose children are shown.
 * @param canvas - Canvas size.
 * @returns Rectangles for the node's children (or the node itself).
 */
export function layoutTreemap(node: TreemapNode, canvas: CanvasSize): TreemapRect[] {
	const bounds: Rect = { x: 0, y: 0, width: canvas.width, height: canvas.height };
	if (!hasChildren(node)) return [{ node, rect: bounds }];
	return squarify(node.children, bounds);
}

/**
 * Finds the rectangle under a point (used for hover and click).
 * Zero-area rectangles are never hit.
 * @param rects - Rectangles from one layout pass.
 * @param x - Canvas x.
 * @param y - Canvas y.
 * @returns The rectangle containing the point, if any.
 */
export function hitTest(rects: ReadonlyArray<TreemapRect>, x: number, y: number): TreemapRect | undefined {
	return rects.find(({ rect }) => {
		if (rect.width <= 0 || rect.height <= 0) return false;
		return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
	});
}

/**
 * Long side over short side (1 for a square, Infinity for a zero-area rectangle).
 */
export function aspectRatio(rect: Rect): number {
	const shortSide = Math.min(rect.width, rect.height);
	if (shortSide <= 0) return Infinity;
	return Math.max(rect.width, rect.height) / shortSide;
}
