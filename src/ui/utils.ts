/**
 * Utility functions for the treemap renderer
 *
 * Re-exports shared formatters from the single source of truth.
 */

import { formatBytes as formatBytesShared } from '../shared/formatters';
import type { Rect } from '../shared/types';

export const formatBytes = formatBytesShared;

// Below these sizes a block is too small for text.
const LABEL_MIN_WIDTH = 40;
const LABEL_MIN_HEIGHT = 20;
const SIZE_LABEL_MIN_HEIGHT = 35;

export function canShowLabel(rect: Rect): boolean {
	return rect.width > LABEL_MIN_WIDTH && rect.height > LABEL_MIN_HEIGHT;
}

export function canShowSizeLabel(rect: Rect): boolean {
	return canShowLabel(rect) && rect.height > SIZE_LABEL_MIN_HEIGHT;
}
