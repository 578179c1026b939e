import { EventEmitter } from 'events';
import * as os from 'os';
import * as path from 'path';
import type {
	CanvasSize,
	ScanResult,
	TreemapNode,
	TreemapRect,
	TreemapStatistics,
} from '../../../shared/types';
import { abbreviateHomePath, isPathWithinRoot } from '../../common/pathUtils';
import { DiskMapScanner } from '../diskScan/diskMapScanner';
import { hitTest, layoutTreemap } from '../treemap/treemapLayout';
import { computeStatistics } from '../treemap/treemapNode';

export const DEFAULT_CANVAS: Readonly<CanvasSize> = Object.freeze({ width: 800, height: 600 });

export interface DiskMapSessionOptions {
	scanner?: DiskMapScanner;
	canvas?: CanvasSize;
	homePath?: string;
}

export interface DiskMapState {
	currentPath: string;
	/** Current path with the home directory shown as `~` */
	displayPath: string;
	canNavigateBack: boolean;
	isScanning: boolean;
	canvas: CanvasSize;
	result: ScanResult | undefined;
	rects: ReadonlyArray<TreemapRect>;
}

/**
 * Drives the disk map for one view: what is shown, how it got there, and its layout.
 * Single responsibility: navigation stack + scan/layout wiring.
 *
 * Emits `change` with the new {@link DiskMapState} after every scan or resize.
 */
export class DiskMapSession extends EventEmitter {
	private readonly scanner: DiskMapScanner;
	private readonly ownsScanner: boolean;
	private readonly homePath: string;
	private readonly backStack: string[] = [];
	private currentPath: string;
	private canvas: CanvasSize;
	private result: ScanResult | undefined;
	private rects: TreemapRect[] = [];
	private pendingScans = 0;
	private generation = 0;

	constructor(initialPath: string, options: DiskMapSessionOptions = {}) {
		super();
		this.scanner = options.scanner ?? new DiskMapScanner();
		this.ownsScanner = !options.scanner;
		this.homePath = options.homePath ?? os.homedir();
		this.currentPath = path.resolve(initialPath);
		this.canvas = { ...(options.canvas ?? DEFAULT_CANVAS) };
	}

	dispose(): void {
		this.generation++;
		if (this.ownsScanner) this.scanner.dispose();
		else this.scanner.cancelCurrentScan();
		this.removeAllListeners();
	}

	getState(): DiskMapState {
		return {
			currentPath: this.currentPath,
			displayPath: abbreviateHomePath(this.currentPath, this.homePath),
			canNavigateBack: this.backStack.length > 0,
			isScanning: this.pendingScans > 0,
			canvas: { ...this.canvas },
			result: this.result,
			rects: this.rects,
		};
	}

	getStatistics(): TreemapStatistics | undefined {
		return this.result ? computeStatistics(this.result.root) : undefined;
	}

	/**
	 * Scans a new location, clearing the navigation history.
	 */
	open(rootPath: string): Promise<ScanResult | undefined> {
		this.backStack.length = 0;
		this.currentPath = path.resolve(rootPath);
		return this.scanCurrentPath();
	}

	/**
	 * Enters a directory shown in the current map. Files and nodes outside the
	 * current location are ignored.
	 */
	async navigateTo(node: TreemapNode): Promise<ScanResult | undefined> {
		if (node.kind !== 'directory') return undefined;
		if (node.path === this.currentPath || !isPathWithinRoot(node.path, this.currentPath)) return undefined;

		this.backStack.push(this.currentPath);
		this.currentPath = node.path;
		return this.scanCurrentPath();
	}

	async navigateBack(): Promise<ScanResult | undefined> {
		const previous = this.backStack.pop();
		if (previous === undefined) return undefined;
		this.currentPath = previous;
		return this.scanCurrentPath();
	}

	refresh(): Promise<ScanResult | undefined> {
		return this.scanCurrentPath();
	}

	cancel(): void {
		this.scanner.cancelCurrentScan();
	}

	/**
	 * Re-lays out the current tree for a new canvas size (no rescan).
	 */
	resize(canvas: CanvasSize): ReadonlyArray<TreemapRect> {
		this.canvas = { ...canvas };
		this.applyLayout();
		this.emitChange();
		return this.rects;
	}

	hitTest(x: number, y: number): TreemapRect | undefined {
		return hitTest(this.rects, x, y);
	}

	private async scanCurrentPath(): Promise<ScanResult | undefined> {
		const generation = ++this.generation;
		this.pendingScans++;
		this.emitChange();

		try {
			const result = await this.scanner.scan(this.currentPath);

			// A newer request superseded this one; its (partial) result is dropped.
			if (generation !== this.generation) return undefined;

			this.result = result;
			this.applyLayout();
			return result;
		} finally {
			this.pendingScans--;
			if (generation === this.generation) this.emitChange();
		}
	}

	private applyLayout(): void {
		this.rects = this.result ? layoutTreemap(this.result.root, this.canvas) : [];
	}

	private emitChange(): void {
		this.emit('change', this.getState());
	}
}
