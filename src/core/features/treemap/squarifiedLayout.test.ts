import { describe, expect, it } from 'vitest';
import type { Rect, TreemapNode, TreemapRect } from '../../../shared/types';
import { squarify, worstRatio } from './squarifiedLayout';
import { aspectRatio } from './treemapLayout';
import { createLeafNode } from './treemapNode';

function nodes(sizes: number[]): TreemapNode[] {
	return sizes.map((size, index) =>
		createLeafNode({ name: `n${index}`, path: `/root/n${index}`, size, category: 'other', depth: 1 })
	);
}

const areaOf = (rect: Rect) => rect.width * rect.height;
const totalArea = (rects: TreemapRect[]) => rects.reduce((sum, r) => sum + areaOf(r.rect), 0);

function overlapArea(a: Rect, b: Rect): number {
	const width = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
	const height = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
	return width > 0 && height > 0 ? width * height : 0;
}

describe('worstRatio', () => {
	it('is 1 for a square row', () => {
		expect(worstRatio(10000, 10000, 10000, 100)).toBe(1);
	});

	it('is infinite for degenerate rows', () => {
		expect(worstRatio(0, 0, 0, 100)).toBe(Infinity);
		expect(worstRatio(100, 100, 0, 100)).toBe(Infinity);
		expect(worstRatio(100, 100, 100, 0)).toBe(Infinity);
	});
});

describe('squarify', () => {
	it('returns nothing for an empty list', () => {
		expect(squarify([], { x: 0, y: 0, width: 100, height: 100 })).toEqual([]);
	});

	it('returns nothing when every size is zero', () => {
		expect(squarify(nodes([0, 0]), { x: 0, y: 0, width: 100, height: 100 })).toEqual([]);
	});

	it('splits [100, 50, 50] on 200x100 proportionally', () => {
		const rects = squarify(nodes([50, 100, 50]), { x: 0, y: 0, width: 200, height: 100 });

		expect(rects).toHaveLength(3);
		expect(totalArea(rects)).toBeCloseTo(20000, 6);
		expect(rects[0].node.size).toBe(100);
		expect(rects[0].rect).toEqual({ x: 0, y: 0, width: 100, height: 100 });
		expect(areaOf(rects[0].rect)).toBeCloseTo(10000, 6);
		expect(rects[1].rect).toEqual({ x: 100, y: 0, width: 50, height: 100 });
		expect(rects[2].rect).toEqual({ x: 150, y: 0, width: 50, height: 100 });
	});

	it('places a single node over the whole rectangle', () => {
		const rects = squarify(nodes([42]), { x: 10, y: 20, width: 30, height: 40 });
		expect(rects).toHaveLength(1);
		expect(rects[0].rect).toEqual({ x: 10, y: 20, width: 30, height: 40 });
	});

	it('yields squares for equal nodes on a square canvas', () => {
		const four = squarify(nodes([1, 1, 1, 1]), { x: 0, y: 0, width: 100, height: 100 });
		expect(four.map((r) => r.rect)).toEqual([
			{ x: 0, y: 0, width: 50, height: 50 },
			{ x: 50, y: 0, width: 50, height: 50 },
			{ x: 0, y: 50, width: 50, height: 50 },
			{ x: 50, y: 50, width: 50, height: 50 },
		]);

		const sixteen = squarify(nodes(new Array(16).fill(7)), { x: 0, y: 0, width: 400, height: 400 });
		expect(sixteen).toHaveLength(16);
		for (const { rect } of sixteen) {
			expect(aspectRatio(rect)).toBeLessThan(1.0001);
			expect(areaOf(rect)).toBeCloseTo(10000, 6);
		}
	});

	it('tiles the rectangle without gaps or overlaps', () => {
		const bounds: Rect = { x: 5, y: 7, width: 640, height: 360 };
		const sizes = [987, 610, 377, 233, 144, 89, 55, 34, 21, 13, 8, 5, 3, 2, 1, 1];
		const rects = squarify(nodes(sizes), bounds);
		const total = sizes.reduce((sum, size) => sum + size, 0);

		expect(rects).toHaveLength(sizes.length);
		expect(totalArea(rects)).toBeCloseTo(areaOf(bounds), 6);

		for (const { node, rect } of rects) {
			expect(rect.x).toBeGreaterThanOrEqual(bounds.x - 1e-9);
			expect(rect.y).toBeGreaterThanOrEqual(bounds.y - 1e-9);
			expect(rect.x + rect.width).toBeLessThanOrEqual(bounds.x + bounds.width + 1e-9);
			expect(rect.y + rect.height).toBeLessThanOrEqual(bounds.y + bounds.height + 1e-9);
			expect(areaOf(rect) / areaOf(bounds)).toBeCloseTo(node.size / total, 6);
		}

		for (let i = 0; i < rects.length; i++) {
			for (let j = i + 1; j < rects.length; j++) {
				expect(overlapArea(rects[i].rect, rects[j].rect)).toBeLessThan(1e-6);
			}
		}
	});

	it('emits rectangles in descending size order', () => {
		const rects = squarify(nodes([3, 9, 1, 5]), { x: 0, y: 0, width: 90, height: 60 });
		expect(rects.map((r) => r.node.size)).toEqual([9, 5, 3, 1]);
	});

	it('gives zero-size nodes zero-area rectangles', () => {
		const rects = squarify(nodes([0, 60, 40]), { x: 0, y: 0, width: 100, height: 50 });

		expect(rects).toHaveLength(3);
		expect(rects[2].node.size).toBe(0);
		expect(rects[2].rect).toEqual({ x: 100, y: 50, width: 0, height: 0 });
		expect(totalArea(rects)).toBeCloseTo(5000, 6);
	});

	it('handles zero-width and zero-height rectangles without NaN', () => {
		const tall = squarify(nodes([30, 10]), { x: 0, y: 0, width: 0, height: 100 });
		expect(tall.map((r) => r.rect)).toEqual([
			{ x: 0, y: 0, width: 0, height: 75 },
			{ x: 0, y: 75, width: 0, height: 25 },
		]);

		const flat = squarify(nodes([1, 1]), { x: 0, y: 0, width: 0, height: 0 });
		expect(flat).toHaveLength(2);
		for (const { rect } of flat) {
			expect(Number.isNaN(rect.x + rect.y + rect.width + rect.height)).toBe(false);
			expect(areaOf(rect)).toBe(0);
		}
	});

	it('treats negative and non-finite sizes as zero', () => {
		const rects = squarify(nodes([-5, Number.NaN, 10]), { x: 0, y: 0, width: 10, height: 10 });
		expect(rects[0].node.size).toBe(10);
		expect(rects[0].rect).toEqual({ x: 0, y: 0, width: 10, height: 10 });
		expect(areaOf(rects[1].rect)).toBe(0);
		expect(areaOf(rects[2].rect)).toBe(0);
	});

	it('does not mutate its input', () => {
		const input = nodes([1, 3, 2]);
		squarify(input, { x: 0, y: 0, width: 10, height: 10 });
		expect(input.map((n) => n.size)).toEqual([1, 3, 2]);
	});
});
