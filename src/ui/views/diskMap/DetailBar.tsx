import { ChevronRight, FileText, Folder, FolderOpen } from 'lucide-preact';
import type { TreemapNode } from '../../../shared/types';
import { CATEGORY_LABELS } from '../../../shared/categories';
import { abbreviateHomePath } from '../../../core/common/pathUtils';
import { IconButton } from '../../components/IconButton';
import { CATEGORY_COLORS } from '../../categoryColors';
import { formatBytes } from '../../utils';

interface Props {
	node: TreemapNode;
	homePath?: string;
	/** Enters a selected directory */
	onOpen?: (node: TreemapNode) => void;
	/** Shows the selected entry in the host's file manager */
	onReveal?: (path: string) => void;
}

/**
 * Details of the selected block, shown below the map.
 */
export function DetailBar({ node, homePath, onOpen, onReveal }: Props) {
	const isDirectory = node.kind === 'directory';

	return (
		<div class="dmap-detail-bar" role="region" aria-label="Selection details">
			<span class="dmap-detail-icon" style={{ color: CATEGORY_COLORS[node.category] }} aria-hidden="true">
				{isDirectory ? <Folder size={20} /> : <FileText size={20} />}
			</span>
			<div class="dmap-detail-main">
				<span class="dmap-detail-name">{node.name}</span>
				<span class="dmap-detail-path" title={node.path}>
					{abbreviateHomePath(node.path, homePath)}
				</span>
			</div>
			<div class="dmap-detail-meta">
				<span class="dmap-detail-size">{formatBytes(node.size)}</span>
				<span class="dmap-detail-category">{CATEGORY_LABELS[node.category]}</span>
			</div>
			<div class="dmap-detail-actions">
				{onReveal && (
					<IconButton onClick={() => onReveal(node.path)} label="Reveal in file manager">
						<FolderOpen size={16} />
					</IconButton>
				)}
				{isDirectory && onOpen && (
					<IconButton onClick={() => onOpen(node)} label="Open folder">
						<ChevronRight size={16} />
					</IconButton>
				)}
			</div>
		</div>
	);
}
