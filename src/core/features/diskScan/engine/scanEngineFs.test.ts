import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { neverCancelledToken } from '../../../common/cancellation';
import { DEFAULT_SCAN_CONFIG } from '../../../common/configManager';
import { scanDiskUsage } from './scanEngine';

vi.mock('fs/promises', async (importOriginal) => {
	const actual = await importOriginal<typeof import('fs/promises')>();
	return { ...actual, readdir: vi.fn(actual.readdir) };
});

function errnoError(code: string): Error {
	return Object.assign(new Error(`${code}: directory cannot be read`), { code });
}

let workDir: string;

beforeEach(async () => {
	workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'disk-treemap-readdir-'));
	await fs.writeFile(path.join(workDir, 'kept.txt'), 'content');
});

afterEach(async () => {
	await fs.rm(workDir, { recursive: true, force: true });
});

function scan() {
	return scanDiskUsage({ rootPath: workDir, limits: DEFAULT_SCAN_CONFIG, cancellationToken: neverCancelledToken });
}

describe('directory enumeration failures', () => {
	it('returns an empty directory and counts a permission error as skipped', async () => {
		vi.mocked(fs.readdir).mockRejectedValueOnce(errnoError('EACCES'));

		const result = await scan();

		expect(result.root.kind).toBe('directory');
		expect(result.root.name).toBe(path.basename(workDir));
		expect(result.root.children).toHaveLength(0);
		expect(result.root.size).toBe(0);
		expect(result.skippedCount).toBe(1);
		expect(result.incomplete).toBe(false);
	});

	it('counts EPERM the same way', async () => {
		vi.mocked(fs.readdir).mockRejectedValueOnce(errnoError('EPERM'));

		const result = await scan();

		expect(result.root.children).toHaveLength(0);
		expect(result.skippedCount).toBe(1);
	});

	it('returns an empty directory for other I/O errors without counting them', async () => {
		vi.mocked(fs.readdir).mockRejectedValueOnce(errnoError('EIO'));

		const result = await scan();

		expect(result.root.kind).toBe('directory');
		expect(result.root.children).toHaveLength(0);
		expect(result.skippedCount).toBe(0);
	});
});
