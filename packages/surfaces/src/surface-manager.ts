/**
 * Surface stack manager: registration, invalidation, redraw dispatch and resize propagation
 */

import { loadSurfaceConfig, type SurfaceConfig } from "./config.js";
import { createDebugLog, type DebugLog } from "./debug-log.js";
import { DirtyRegion } from "./dirty-region.js";
import { ContractViolation, type DispatchPhase, ReentrantDispatchError } from "./errors.js";
import { formatRect, type Rect } from "./rect.js";
import { planRedraw } from "./redraw-plan.js";
import { Surface, type SurfaceHost, type SurfaceOptions } from "./surface.js";
import { SurfaceStack } from "./surface-stack.js";

export interface SurfaceManagerOptions {
	/** Debug log sink. Defaults to the log configured through the environment. */
	log?: DebugLog;
	/** Called with every contract violation right before it is thrown */
	onViolation?: (violation: ContractViolation) => void;
	config?: SurfaceConfig;
}

function labels(surfaces: readonly Surface[]): string {
	return `[${surfaces.map((s) => s.label).join(", ")}]`;
}

/**
 * Owns one surface stack and the screen area waiting to be repainted.
 *
 * Everything runs synchronously. Redraw and resize callbacks run inside a dispatch pass and
 * must not create or dispose surfaces, nor start another pass; the manager throws a
 * {@link ContractViolation} when they try.
 */
export class SurfaceManager implements SurfaceHost {
	readonly stack = new SurfaceStack();
	readonly dirty = new DirtyRegion();

	private phase: DispatchPhase = "idle";
	private passCount = 0;
	private surfaceCount = 0;
	private readonly log: DebugLog;
	private readonly onViolation?: (violation: ContractViolation) => void;

	constructor(options: SurfaceManagerOptions = {}) {
		this.log = options.log ?? createDebugLog(options.config ?? loadSurfaceConfig());
		this.onViolation = options.onViolation;
	}

	get dispatchPhase(): DispatchPhase {
		return this.phase;
	}

	/** Number of completed dispatch passes */
	get passes(): number {
		return this.passCount;
	}

	createSurface(options?: SurfaceOptions): Surface {
		return new Surface(this, options);
	}

	/**
	 * Create a surface for the duration of `body` and dispose it however `body` exits.
	 */
	withSurface<T>(options: SurfaceOptions, body: (surface: Surface) => T): T {
		const surface = this.createSurface(options);
		try {
			return body(surface);
		} finally {
			surface.dispose();
		}
	}

	defaultLabel(): string {
		this.surfaceCount++;
		return `surface#${this.surfaceCount}`;
	}

	attach(surface: Surface): void {
		if (this.phase !== "idle") {
			this.fail(new ContractViolation(`Cannot create surface "${surface.label}" during ${this.phase} dispatch`));
		}
		this.checked(() => this.stack.push(surface));
		this.log(`push ${surface.label}${surface.blocksBelow ? " (blocks below)" : ""} depth=${this.stack.size}`);
	}

	detach(surface: Surface): void {
		if (this.phase !== "idle") {
			this.fail(new ContractViolation(`Cannot dispose surface "${surface.label}" during ${this.phase} dispatch`));
		}
		this.checked(() => this.stack.pop(surface));
		this.log(`pop ${surface.label} depth=${this.stack.size}`);
		this.invalidate(surface.region, surface.blocksBelow);
	}

	assertConfigurable(surface: Surface, operation: string, allowDuringResize: boolean): void {
		if (surface.isDisposed) {
			this.fail(new ContractViolation(`${operation}() called on disposed surface "${surface.label}"`));
		}
		if (this.phase === "redraw" || (this.phase === "resize" && !allowDuringResize)) {
			this.fail(
				new ContractViolation(`${operation}() called on "${surface.label}" during ${this.phase} dispatch`),
			);
		}
	}

	/**
	 * Mark `area` for repainting. With `reenableBelow`, surfaces that were blocked by a
	 * removed blocks-below surface take part in dispatch again.
	 */
	invalidate(area: Rect, reenableBelow: boolean): void {
		if (this.phase === "redraw") {
			this.fail(new ContractViolation("invalidate() called during redraw dispatch"));
		}
		if (reenableBelow) {
			const surfaces = this.stack.toArray();
			for (let i = this.stack.floorIndex(); i < surfaces.length; i++) {
				surfaces[i].scheduling.blocked = false;
			}
		}
		this.dirty.add(area);
	}

	/** Repaint the top surface and everything invalidated. */
	redraw(): void {
		this.enter("redraw");
		this.runPass({ repaintTop: true, repaintAll: false });
	}

	/** Repaint what is invalidated, without forcing the top surface. */
	redrawInvalidated(): void {
		this.enter("redrawInvalidated");
		this.runPass({ repaintTop: false, repaintAll: false });
	}

	/**
	 * The screen changed size: resize every surface bottom to top, then repaint everything.
	 */
	screenResized(): void {
		this.enter("screenResized");
		for (const surface of this.stack) {
			surface.scheduling.pendingResize = true;
		}
		this.runPass({ repaintTop: true, repaintAll: true });
	}

	private runPass(mode: { repaintTop: boolean; repaintAll: boolean }): void {
		const surfaces = this.stack.toArray();
		const floor = this.stack.floorIndex();
		for (let i = 0; i < floor; i++) {
			surfaces[i].scheduling.blocked = true;
		}
		const active = surfaces.filter((surface, i) => i >= floor && !surface.scheduling.blocked);

		try {
			this.phase = "resize";
			const resized = this.resolvePendingResizes(active);

			this.phase = "redraw";
			if (mode.repaintAll) {
				for (const surface of active) surface.scheduling.needsRedraw = true;
			} else if (mode.repaintTop) {
				const top = this.stack.top();
				if (top) top.scheduling.needsRedraw = true;
			}

			const plan = planRedraw(surfaces, this.dirty, floor, { full: mode.repaintAll });
			for (const surface of plan.suppressed) {
				if (this.dirty.intersects(surface.region)) surface.scheduling.needsRedraw = true;
			}
			for (const surface of plan.draw) {
				surface.redrawHandler?.(surface);
			}
			for (const surface of active) {
				surface.scheduling.needsRedraw = false;
			}

			this.passCount++;
			this.log(
				`pass#${this.passCount}: resized=${labels(resized)} drew=${labels(plan.draw)} occluded=${labels(
					plan.occluded,
				)} suppressed=${labels(plan.suppressed)} dirty=[${this.dirty.rects.map(formatRect).join("; ")}]`,
			);
			this.dirty.clear();
		} finally {
			this.phase = "idle";
		}
	}

	/**
	 * Run resize callbacks of surfaces marked for resizing, bottom to top. Every surface must
	 * have its current region before occlusion is computed.
	 */
	private resolvePendingResizes(active: readonly Surface[]): Surface[] {
		const resized: Surface[] = [];
		for (const surface of active) {
			if (!surface.scheduling.pendingResize) continue;
			surface.resizeHandler?.(surface);
			surface.scheduling.pendingResize = false;
			resized.push(surface);
		}
		return resized;
	}

	private enter(operation: string): void {
		if (this.phase !== "idle") {
			this.fail(new ReentrantDispatchError(operation, this.phase));
		}
	}

	private checked(action: () => void): void {
		try {
			action();
		} catch (error) {
			if (error instanceof ContractViolation) this.fail(error);
			throw error;
		}
	}

	private fail(violation: ContractViolation): never {
		this.log(`violation: ${violation.name}: ${violation.message}`);
		this.onViolation?.(violation);
		throw violation;
	}
}
