import type { ComponentChildren } from 'preact';

interface Props {
	onClick: () => void;
	disabled?: boolean;
	/** Used for both the tooltip and the accessible name */
	label: string;
	children: ComponentChildren;
}

export function IconButton({ onClick, disabled, label, children }: Props) {
	return (
		<button
			type="button"
			class="dmap-icon-button"
			onClick={onClick}
			disabled={disabled}
			title={label}
			aria-label={label}
		>
			{children}
		</button>
	);
}
