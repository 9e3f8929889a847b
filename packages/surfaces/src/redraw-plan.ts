import type { DirtyRegion } from "./dirty-region.js";
import { isEmptyRect, type Rect, rectContains, rectsIntersect } from "./rect.js";
import type { Surface } from "./surface.js";

export interface RedrawPlan {
	/** Index of the lowest surface taking part in this pass */
	floor: number;
	/** Surfaces whose redraw callback runs, bottom to top */
	draw: Surface[];
	/** Dirty surfaces skipped because upper surfaces fully cover every dirty part */
	occluded: Surface[];
	/** Surfaces below the floor, or blocked, that get no callbacks this pass */
	suppressed: Surface[];
}

/** A surface paints something only if it has a region and a redraw callback. */
export function isPaintable(surface: Surface): boolean {
	return !isEmptyRect(surface.region) && surface.redrawHandler !== undefined;
}

function dirtyParts(surface: Surface, dirty: DirtyRegion): Rect[] {
	if (surface.scheduling.needsRedraw) return [surface.region];
	return dirty.clippedTo(surface.region);
}

export interface PlanOptions {
	/** Draw every active paintable surface, covered or not. Used after a screen resize. */
	full?: boolean;
}

/**
 * Decide which surfaces repaint for the given dirty region.
 *
 * Occlusion is whole-rect containment by a single upper surface: a dirty part that is only
 * partly covered still repaints the surface. A surface drawn in this pass repaints its whole
 * region, so every overlapping surface above it is drawn too.
 */
export function planRedraw(
	stack: readonly Surface[],
	dirty: DirtyRegion,
	floor: number,
	options: PlanOptions = {},
): RedrawPlan {
	const plan: RedrawPlan = { floor, draw: [], occluded: [], suppressed: [] };

	const active: Surface[] = [];
	for (let i = 0; i < stack.length; i++) {
		const surface = stack[i];
		if (i < floor || surface.scheduling.blocked) {
			plan.suppressed.push(surface);
		} else {
			active.push(surface);
		}
	}

	for (let i = 0; i < active.length; i++) {
		const surface = active[i];
		if (!isPaintable(surface)) continue;
		if (options.full) {
			plan.draw.push(surface);
			continue;
		}

		const coveredByLowerDraw = plan.draw.some((lower) => rectsIntersect(lower.region, surface.region));
		if (coveredByLowerDraw) {
			plan.draw.push(surface);
			continue;
		}

		const parts = dirtyParts(surface, dirty);
		if (parts.length === 0) continue;

		const occluders = active.slice(i + 1).filter(isPaintable);
		const visible = parts.filter((part) => !occluders.some((upper) => rectContains(upper.region, part)));
		if (visible.length > 0) {
			plan.draw.push(surface);
		} else {
			plan.occluded.push(surface);
		}
	}

	return plan;
}
