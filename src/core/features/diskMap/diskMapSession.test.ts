import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager } from '../../common/configManager';
import { DiskMapScanner } from '../diskScan/diskMapScanner';
import { DiskMapSession, type DiskMapState } from './diskMapSession';

let workDir: string;
let session: DiskMapSession;

beforeEach(async () => {
	workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'disk-treemap-session-'));
	await fs.mkdir(path.join(workDir, 'photos'));
	await fs.writeFile(path.join(workDir, 'photos', 'a.png'), Buffer.alloc(300));
	await fs.writeFile(path.join(workDir, 'photos', 'b.png'), Buffer.alloc(100));
	await fs.writeFile(path.join(workDir, 'notes.txt'), Buffer.alloc(50));

	session = new DiskMapSession(workDir, {
		scanner: new DiskMapScanner(new ConfigManager({})),
		homePath: workDir,
	});
});

afterEach(async () => {
	session.dispose();
	await fs.rm(workDir, { recursive: true, force: true });
});

function childNamed(name: string) {
	const child = session.getState().result?.root.children.find((node) => node.name === name);
	if (!child) throw new Error(`no child named ${name}`);
	return child;
}

describe('DiskMapSession', () => {
	it('lays out the scanned children on the default canvas', async () => {
		await session.refresh();
		const state = session.getState();

		expect(state.currentPath).toBe(path.resolve(workDir));
		expect(state.displayPath).toBe('~');
		expect(state.canNavigateBack).toBe(false);
		expect(state.isScanning).toBe(false);
		expect(state.canvas).toEqual({ width: 800, height: 600 });
		expect(state.rects.map(({ node }) => node.name)).toEqual(['photos', 'notes.txt']);

		const area = state.rects.reduce((sum, { rect }) => sum + rect.width * rect.height, 0);
		expect(area).toBeCloseTo(800 * 600, 6);
	});

	it('computes statistics for the shown tree', async () => {
		await session.refresh();

		expect(session.getStatistics()).toEqual({ totalSize: 1048576 + 50, itemCount: 2, maxDepth: 1 });
	});

	it('enters a directory and comes back', async () => {
		await session.refresh();

		const entered = await session.navigateTo(childNamed('photos'));
		expect(entered?.root.children.map((child) => [child.name, child.size])).toEqual([
			['a.png', 300],
			['b.png', 100],
		]);
		expect(session.getState().currentPath).toBe(path.join(path.resolve(workDir), 'photos'));
		expect(session.getState().displayPath).toBe(`~${path.sep}photos`);
		expect(session.getState().canNavigateBack).toBe(true);

		await session.navigateBack();
		expect(session.getState().currentPath).toBe(path.resolve(workDir));
		expect(session.getState().canNavigateBack).toBe(false);
	});

	it('ignores files and the current directory as navigation targets', async () => {
		await session.refresh();

		await expect(session.navigateTo(childNamed('notes.txt'))).resolves.toBeUndefined();
		const root = session.getState().result?.root;
		if (!root) throw new Error('expected a result');
		await expect(session.navigateTo(root)).resolves.toBeUndefined();
		expect(session.getState().canNavigateBack).toBe(false);
	});

	it('navigateBack without history does nothing', async () => {
		await expect(session.navigateBack()).resolves.toBeUndefined();
		expect(session.getState().result).toBeUndefined();
	});

	it('open clears the history', async () => {
		await session.refresh();
		await session.navigateTo(childNamed('photos'));

		await session.open(workDir);

		expect(session.getState().canNavigateBack).toBe(false);
	});

	it('re-lays out on resize without rescanning', async () => {
		const scanned = await session.refresh();
		const changes: DiskMapState[] = [];
		session.on('change', (state: DiskMapState) => changes.push(state));

		const rects = session.resize({ width: 100, height: 50 });

		expect(session.getState().result).toBe(scanned);
		expect(changes).toHaveLength(1);
		expect(changes[0].canvas).toEqual({ width: 100, height: 50 });
		const area = rects.reduce((sum, { rect }) => sum + rect.width * rect.height, 0);
		expect(area).toBeCloseTo(5000, 6);
	});

	it('hit-tests the current layout', async () => {
		await session.refresh();

		expect(session.hitTest(1, 1)?.node.name).toBe('photos');
		expect(session.hitTest(-1, 1)).toBeUndefined();
	});

	it('drops the result of a superseded request', async () => {
		const photos = path.join(workDir, 'photos');

		const first = session.open(workDir);
		const second = session.open(photos);

		await expect(first).resolves.toBeUndefined();
		const latest = await second;
		expect(latest?.rootPath).toBe(path.resolve(photos));
		expect(session.getState().result).toBe(latest);
		expect(session.getState().currentPath).toBe(path.resolve(photos));
	});

	it('emits scanning state around a scan', async () => {
		const scanning: boolean[] = [];
		session.on('change', (state: DiskMapState) => scanning.push(state.isScanning));

		await session.refresh();

		expect(scanning).toEqual([true, false]);
	});
});
