import type { FileTypeCategory } from './types';

export const CATEGORY_LABELS: Readonly<Record<FileTypeCategory, string>> = Object.freeze({
	images: 'Images',
	videos: 'Videos',
	audio: 'Audio',
	documents: 'Documents',
	code: 'Code',
	archives: 'Archives',
	system: 'System',
	other: 'Other',
});
