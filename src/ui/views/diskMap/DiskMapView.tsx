import { useMemo, useState } from 'preact/hooks';
import { ArrowLeft, Layers, List, RefreshCw, Square } from 'lucide-preact';
import type { TreemapNode } from '../../../shared/types';
import type { DiskMapSession } from '../../../core/features/diskMap/diskMapSession';
import { computeStatistics, sumByCategory } from '../../../core/features/treemap/treemapNode';
import { EmptyState } from '../../components/EmptyState';
import { IconButton } from '../../components/IconButton';
import { PanelOverlay } from '../../components/PanelOverlay';
import { useDiskMapSession } from '../../hooks/useDiskMapSession';
import { formatBytes } from '../../utils';
import { CategoryLegend } from './CategoryLegend';
import { DetailBar } from './DetailBar';
import { TreemapView } from './TreemapView';

interface Props {
	session: DiskMapSession;
	homePath?: string;
	/** Shows an entry in the host's file manager; the action is hidden without it */
	onReveal?: (path: string) => void;
}

export function DiskMapView({ session, homePath, onReveal }: Props) {
	const state = useDiskMapSession(session);
	const root = state.result?.root;
	const [selectedNode, setSelectedNode] = useState<TreemapNode | null>(null);
	const [showLegend, setShowLegend] = useState(true);

	const statistics = useMemo(() => (root ? computeStatistics(root) : undefined), [root]);
	const categoryTotals = useMemo(() => (root ? sumByCategory(root.children) : []), [root]);

	// A selection lasts while its block is on the map; a rescan replaces every node.
	const selection =
		selectedNode && state.rects.some(({ node }) => node === selectedNode) ? selectedNode : null;

	const navigateTo = (node: TreemapNode) => void session.navigateTo(node);

	return (
		<div class="dmap-view">
			<header class="dmap-header">
				<IconButton
					onClick={() => void session.navigateBack()}
					disabled={!state.canNavigateBack || state.isScanning}
					label="Back"
				>
					<ArrowLeft size={16} />
				</IconButton>
				<span class="dmap-path" title={state.currentPath}>
					{state.displayPath}
				</span>
				<IconButton
					onClick={() => (state.isScanning ? session.cancel() : void session.refresh())}
					label={state.isScanning ? 'Cancel scan' : 'Refresh scan'}
				>
					{state.isScanning ? <Square size={16} /> : <RefreshCw size={16} />}
				</IconButton>
				<IconButton
					onClick={() => setShowLegend((visible) => !visible)}
					label={showLegend ? 'Hide legend' : 'Show legend'}
				>
					<List size={16} />
				</IconButton>
			</header>

			{state.result?.incomplete && !state.isScanning && (
				<div class="warning-banner">⚠ Scan incomplete ({state.result.incompleteReason})</div>
			)}

			<div class="dmap-body">
				{state.isScanning ? (
					<PanelOverlay label="Scanning directory…" detail={state.displayPath} />
				) : root && state.rects.length > 0 ? (
					<TreemapView
						rects={state.rects}
						width={state.canvas.width}
						height={state.canvas.height}
						selectedPath={selection?.path}
						onSelect={(node) => setSelectedNode(node)}
						onClearSelection={() => setSelectedNode(null)}
						onNavigate={navigateTo}
						homePath={homePath}
					/>
				) : (
					<EmptyState
						message="Nothing to show."
						hint="Visualize disk usage by scanning a directory."
						leading={<Layers size={32} aria-hidden="true" />}
					/>
				)}

				{showLegend && (
					<aside class="dmap-sidebar">
						<CategoryLegend totals={categoryTotals} />
						{statistics && (
							<dl class="dmap-stats" aria-label="Statistics">
								<dt>Total Size</dt>
								<dd>{formatBytes(statistics.totalSize)}</dd>
								<dt>Items</dt>
								<dd>{statistics.itemCount.toLocaleString()}</dd>
								<dt>Depth</dt>
								<dd>{statistics.maxDepth}</dd>
							</dl>
						)}
					</aside>
				)}
			</div>

			{selection && !state.isScanning && (
				<DetailBar node={selection} homePath={homePath} onOpen={navigateTo} onReveal={onReveal} />
			)}
		</div>
	);
}
