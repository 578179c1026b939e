import type { TreemapNode } from '../../../shared/types';
import { CATEGORY_LABELS } from '../../../shared/categories';
import { formatBytes } from '../../../shared/formatters';
import { abbreviateHomePath } from '../../common/pathUtils';
import { hasChildren } from './treemapNode';

interface TooltipOptions {
	/** Home directory used for `~` abbreviation */
	homePath?: string;
}

/**
 * Builds tooltip content for a treemap node
 * Single responsibility: formatting node details into readable lines
 */
export function buildNodeTooltip(node: TreemapNode, options: TooltipOptions = {}): string[] {
	const lines: string[] = [];

	lines.push(node.name);
	lines.push(`Size: ${formatBytes(node.size)}`);
	lines.push(`Type: ${CATEGORY_LABELS[node.category]}`);
	lines.push(`Path: ${abbreviateHomePath(node.path, options.homePath)}`);

	if (hasChildren(node)) {
		lines.push(`${node.children.length} items`);
	}

	return lines;
}
