import type { CategoryTotal } from '../../../shared/types';
import { FILE_TYPE_CATEGORIES } from '../../../shared/types';
import { CATEGORY_LABELS } from '../../../shared/categories';
import { CATEGORY_COLORS } from '../../categoryColors';
import { formatBytes } from '../../utils';

interface Props {
	totals?: ReadonlyArray<CategoryTotal>;
}

export function CategoryLegend({ totals = [] }: Props) {
	const bytesByCategory = new Map(totals.map((total) => [total.category, total.bytes]));

	return (
		<ul class="dmap-legend" aria-label="File types">
			{FILE_TYPE_CATEGORIES.map((category) => {
				const bytes = bytesByCategory.get(category);
				return (
					<li key={category} class="dmap-legend-item" data-category={category}>
						<span
							class="dmap-legend-swatch"
							style={{ background: CATEGORY_COLORS[category] }}
							aria-hidden="true"
						/>
						<span class="dmap-legend-label">{CATEGORY_LABELS[category]}</span>
						{bytes !== undefined && <span class="dmap-legend-value">{formatBytes(bytes)}</span>}
					</li>
				);
			})}
		</ul>
	);
}
