import type { FileTypeCategory } from '../shared/types';

export const CATEGORY_COLORS: Readonly<Record<FileTypeCategory, string>> = Object.freeze({
	images: 'rgb(77, 153, 255)',
	videos: 'rgb(204, 77, 128)',
	audio: 'rgb(255, 153, 0)',
	documents: 'rgb(102, 128, 153)',
	code: 'rgb(77, 179, 102)',
	archives: 'rgb(153, 128, 77)',
	system: 'rgb(128, 128, 128)',
	other: 'rgb(153, 102, 153)',
});
