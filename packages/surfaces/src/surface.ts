import { EMPTY_RECT, type Rect, rect } from "./rect.js";

export type RedrawCallback = (surface: Surface) => void;
export type ResizeCallback = (surface: Surface) => void;

/**
 * Backend window in cell units, as consumed by {@link Surface.positionFromWindow}.
 */
export interface CellWindow {
	readonly col: number;
	readonly row: number;
	readonly columns: number;
	readonly rows: number;
}

export interface SurfaceOptions {
	/** Keep every surface below this one from being redrawn or resized while it is on the stack */
	blocksBelow?: boolean;
	/** Name used in debug logs and error messages */
	label?: string;
}

/**
 * Scheduling bookkeeping for one surface. Owned by the manager; kept apart from the
 * region and callbacks, which are the surface owner's configuration.
 */
export class SchedulingState {
	needsRedraw = false;
	pendingResize = false;
	/** Skipped by dispatch until re-enabled by an invalidation with reenableBelow */
	blocked = false;
}

/**
 * What a surface needs from the manager that owns its stack.
 */
export interface SurfaceHost {
	attach(surface: Surface): void;
	detach(surface: Surface): void;
	invalidate(area: Rect, reenableBelow: boolean): void;
	/** Throws if the surface's configuration may not change right now */
	assertConfigurable(surface: Surface, operation: string, allowDuringResize: boolean): void;
	/** Label for a surface created without one */
	defaultLabel(): string;
}

/**
 * One UI panel registered on a surface stack. Pushed on construction, popped by {@link dispose}.
 *
 * The owner sets the region (usually from the resize callback) and a redraw callback
 * that paints within that region. Callbacks only run during a dispatch pass.
 */
export class Surface {
	readonly label: string;
	readonly blocksBelow: boolean;
	readonly scheduling = new SchedulingState();

	private currentRegion: Rect = EMPTY_RECT;
	private redrawCallback?: RedrawCallback;
	private resizeCallback?: ResizeCallback;
	private disposed = false;

	constructor(
		private readonly host: SurfaceHost,
		options: SurfaceOptions = {},
	) {
		this.label = options.label ?? host.defaultLabel();
		this.blocksBelow = options.blocksBelow ?? false;
		host.attach(this);
	}

	get region(): Rect {
		return this.currentRegion;
	}

	get isDisposed(): boolean {
		return this.disposed;
	}

	get needsRedraw(): boolean {
		return this.scheduling.needsRedraw;
	}

	get pendingResize(): boolean {
		return this.scheduling.pendingResize;
	}

	get blocked(): boolean {
		return this.scheduling.blocked;
	}

	get redrawHandler(): RedrawCallback | undefined {
		return this.redrawCallback;
	}

	get resizeHandler(): ResizeCallback | undefined {
		return this.resizeCallback;
	}

	/**
	 * Replace the region. Both the vacated and the new area are invalidated.
	 * A zero-size region is legal and keeps the surface from being drawn.
	 */
	setRegion(region: Rect): void {
		this.host.assertConfigurable(this, "setRegion", true);
		const previous = this.currentRegion;
		this.currentRegion = region;
		this.host.invalidate(previous, false);
		this.host.invalidate(region, false);
	}

	position(x: number, y: number, width: number, height: number): void {
		this.setRegion(rect(x, y, width, height));
	}

	/** Take the region from a backend window. Without a window the surface gets a zero-size region. */
	positionFromWindow(window: CellWindow | null | undefined): void {
		if (!window) {
			this.setRegion(EMPTY_RECT);
			return;
		}
		this.setRegion(rect(window.col, window.row, window.columns, window.rows));
	}

	setRedrawCallback(callback: RedrawCallback | undefined): void {
		this.host.assertConfigurable(this, "setRedrawCallback", false);
		this.redrawCallback = callback;
	}

	setResizeCallback(callback: ResizeCallback | undefined): void {
		this.host.assertConfigurable(this, "setResizeCallback", false);
		this.resizeCallback = callback;
	}

	/**
	 * Run the resize callback before this surface is next drawn. Call it alongside
	 * {@link setResizeCallback} so the surface is sized before its first redraw, or whenever
	 * something the resize callback depends on (other than the screen size) changed.
	 */
	requestResize(): void {
		this.host.assertConfigurable(this, "requestResize", true);
		this.scheduling.pendingResize = true;
	}

	/** Content changed but geometry did not. */
	invalidate(): void {
		this.host.assertConfigurable(this, "invalidate", true);
		this.host.invalidate(this.currentRegion, false);
	}

	/** Drop both callbacks and the region, invalidating the area it covered. */
	reset(): void {
		this.host.assertConfigurable(this, "reset", false);
		const previous = this.currentRegion;
		this.redrawCallback = undefined;
		this.resizeCallback = undefined;
		this.currentRegion = EMPTY_RECT;
		this.host.invalidate(previous, false);
	}

	/**
	 * Remove this surface from the stack. It must be the top surface.
	 * Disposing twice does nothing.
	 */
	dispose(): void {
		if (this.disposed) return;
		this.host.detach(this);
		this.disposed = true;
	}
}
