import type { FileTypeCategory } from '../../../../shared/types';
import { getExtension } from '../../../common/pathUtils';
import fileTypeExtensions from './fileTypeExtensions.json';

// Lookup order matters: the first category listing an extension wins.
const CLASSIFIED_CATEGORIES = ['images', 'videos', 'audio', 'documents', 'code', 'archives'] as const satisfies ReadonlyArray<
	FileTypeCategory & keyof typeof fileTypeExtensions
>;

/**
 * Builds the extension -> category table once at module load.
 * @returns Immutable lookup map keyed by lower-case extension (no dot).
 */
function buildExtensionTable(): ReadonlyMap<string, FileTypeCategory> {
	const table = new Map<string, FileTypeCategory>();
	for (const category of CLASSIFIED_CATEGORIES) {
		for (const ext of fileTypeExtensions[category]) {
			const key = ext.toLowerCase();
			if (!table.has(key)) table.set(key, category);
		}
	}
	return table;
}

const EXTENSION_TABLE = buildExtensionTable();

/**
 * Maps a file extension to its category. Case-insensitive, a leading dot is ignored.
 * @param ext - Extension such as "jpg", "JPG" or ".jpg".
 * @returns The matching category, or 'other'.
 */
export function classifyExtension(ext: string): FileTypeCategory {
	const key = (ext.startsWith('.') ? ext.slice(1) : ext).toLowerCase();
	return EXTENSION_TABLE.get(key) ?? 'other';
}

/**
 * Classifies a file by its path's extension.
 * @param filePath - File path.
 * @returns The matching category, or 'other'.
 */
export function classifyPath(filePath: string): FileTypeCategory {
	return classifyExtension(getExtension(filePath));
}

/**
 * Known extensions for a category, as listed in the lookup table.
 * @param category - Category.
 * @returns Extensions (lower-case, no dot); empty for 'system' and 'other'.
 */
export function getKnownExtensions(category: FileTypeCategory): ReadonlyArray<string> {
	const known: string[] = [];
	for (const [ext, value] of EXTENSION_TABLE) {
		if (value === category) known.push(ext);
	}
	return known;
}
