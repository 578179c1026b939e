import * as os from 'os';
import * as path from 'path';

function ensureTrailingSeparator(value: string): string {
	return value.endsWith(path.sep) ? value : value + path.sep;
}

export function isPathWithinRoot(absolutePath: string, rootPath: string): boolean {
	const resolvedRoot = path.resolve(rootPath);
	const resolvedPath = path.resolve(absolutePath);

	if (resolvedPath === resolvedRoot) return true;
	return resolvedPath.startsWith(ensureTrailingSeparator(resolvedRoot));
}

/**
 * Replaces the home directory prefix with `~` for display.
 */
export function abbreviateHomePath(absolutePath: string, homePath: string = os.homedir()): string {
	if (!homePath) return absolutePath;
	const resolvedHome = path.resolve(homePath);
	const resolvedPath = path.resolve(absolutePath);

	if (resolvedPath === resolvedHome) return '~';
	if (!isPathWithinRoot(resolvedPath, resolvedHome)) return absolutePath;
	return `~${path.sep}${path.relative(resolvedHome, resolvedPath)}`;
}

/**
 * Extension of a path without the leading dot ('' when there is none).
 * Dotfiles such as `.bashrc` have no extension.
 */
export function getExtension(filePath: string): string {
	return path.extname(filePath).slice(1);
}
