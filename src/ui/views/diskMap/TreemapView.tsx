import { useState } from 'preact/hooks';
import type { TreemapNode, TreemapRect } from '../../../shared/types';
import { buildNodeTooltip } from '../../../core/features/treemap/tooltipBuilder';
import { CATEGORY_COLORS } from '../../categoryColors';
import { canShowLabel, canShowSizeLabel, formatBytes } from '../../utils';

interface Props {
	rects: ReadonlyArray<TreemapRect>;
	width: number;
	height: number;
	/** Path of the selected block, if any */
	selectedPath?: string;
	/** Double-click on a directory block */
	onNavigate?: (node: TreemapNode) => void;
	/** Click on any block */
	onSelect?: (node: TreemapNode) => void;
	/** Click on the map outside every block */
	onClearSelection?: () => void;
	homePath?: string;
}

function blockOpacity(isHovered: boolean, isSelected: boolean): number {
	if (isHovered) return 0.8;
	return isSelected ? 0.6 : 0.5;
}

export function TreemapView({
	rects,
	width,
	height,
	selectedPath,
	onNavigate,
	onSelect,
	onClearSelection,
	homePath,
}: Props) {
	const [hovered, setHovered] = useState<TreemapNode | null>(null);

	return (
		<div
			class="dmap-treemap"
			role="group"
			aria-label="Disk usage map"
			style={{ position: 'relative', width: `${width}px`, height: `${height}px` }}
			onClick={() => onClearSelection?.()}
		>
			{rects.map(({ node, rect }) => {
				const isSelected = node.path === selectedPath;
				return (
					<div
						key={node.path}
						class={`dmap-block kind-${node.kind}${isSelected ? ' is-selected' : ''}`}
						data-path={node.path}
						style={{
							position: 'absolute',
							left: `${rect.x}px`,
							top: `${rect.y}px`,
							width: `${rect.width}px`,
							height: `${rect.height}px`,
							background: CATEGORY_COLORS[node.category],
							opacity: blockOpacity(hovered === node, isSelected),
							outline: isSelected ? '2px solid white' : 'none',
						}}
						onMouseEnter={() => setHovered(node)}
						onMouseLeave={() => setHovered((current) => (current === node ? null : current))}
						onClick={(event) => {
							// The map's own click handler clears the selection.
							event.stopPropagation();
							onSelect?.(node);
						}}
						onDblClick={() => {
							if (node.kind === 'directory') onNavigate?.(node);
						}}
					>
						{canShowLabel(rect) && <span class="dmap-block-name">{node.name}</span>}
						{canShowSizeLabel(rect) && <span class="dmap-block-size">{formatBytes(node.size)}</span>}
					</div>
				);
			})}

			{hovered && (
				<div class="dmap-tooltip" role="tooltip">
					{buildNodeTooltip(hovered, { homePath }).map((line, index) => (
						<div key={index}>{line}</div>
					))}
				</div>
			)}
		</div>
	);
}
