import {
	EMPTY_RECT,
	intersectRects,
	isEmptyRect,
	type Rect,
	rectContains,
	rectsIntersect,
	rectsTouch,
	subtractRect,
	unionRects,
} from "./rect.js";

/**
 * Accumulated screen area that must be repainted before the next frame is current.
 *
 * Stored as a small set of rects. Merging only ever grows the covered area, so a
 * compacted region may repaint a few extra cells but never misses one.
 */
export class DirtyRegion {
	/** Rect count above which touching rects are merged */
	static readonly COMPACT_THRESHOLD = 16;

	private items: Rect[] = [];

	get rects(): readonly Rect[] {
		return this.items;
	}

	get isEmpty(): boolean {
		return this.items.length === 0;
	}

	add(area: Rect): void {
		if (isEmptyRect(area)) return;
		if (this.items.some((existing) => rectContains(existing, area))) return;
		this.items = this.items.filter((existing) => !rectContains(area, existing));
		this.items.push(area);
		if (this.items.length > DirtyRegion.COMPACT_THRESHOLD) {
			this.compact();
		}
	}

	/**
	 * Merge touching rects into their bounding boxes until no pair touches.
	 * Collapses to a single bounding box if that still leaves too many rects.
	 */
	compact(): void {
		let merged = true;
		while (merged) {
			merged = false;
			outer: for (let i = 0; i < this.items.length; i++) {
				for (let j = i + 1; j < this.items.length; j++) {
					if (rectsTouch(this.items[i], this.items[j])) {
						const box = unionRects(this.items[i], this.items[j]);
						this.items.splice(j, 1);
						this.items.splice(i, 1);
						this.items = this.items.filter((existing) => !rectContains(box, existing));
						this.items.push(box);
						merged = true;
						break outer;
					}
				}
			}
		}
		if (this.items.length > DirtyRegion.COMPACT_THRESHOLD) {
			this.items = [this.bounds()];
		}
	}

	intersects(area: Rect): boolean {
		return this.items.some((existing) => rectsIntersect(existing, area));
	}

	/** Dirty parts that fall inside `area`. */
	clippedTo(area: Rect): Rect[] {
		const parts: Rect[] = [];
		for (const existing of this.items) {
			const part = intersectRects(existing, area);
			if (!isEmptyRect(part)) parts.push(part);
		}
		return parts;
	}

	/** True when every cell of `area` is dirty. */
	covers(area: Rect): boolean {
		let remaining: Rect[] = isEmptyRect(area) ? [] : [area];
		for (const existing of this.items) {
			if (remaining.length === 0) break;
			remaining = remaining.flatMap((piece) => subtractRect(piece, existing));
		}
		return remaining.length === 0;
	}

	bounds(): Rect {
		return this.items.reduce<Rect>((box, existing) => unionRects(box, existing), EMPTY_RECT);
	}

	clear(): void {
		this.items = [];
	}
}
