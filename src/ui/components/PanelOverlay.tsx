import { Loader2 } from 'lucide-preact';

interface Props {
	label: string;
	detail?: string;
}

export function PanelOverlay({ label, detail }: Props) {
	return (
		<div class="dmap-panel-overlay" aria-live="polite">
			<Loader2 size={28} class="spinner" />
			<span>{label}</span>
			{detail && <span class="dmap-panel-overlay-detail">{detail}</span>}
		</div>
	);
}
