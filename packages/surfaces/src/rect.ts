/**
 * Axis-aligned rectangles in terminal cell units
 */

export interface Rect {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;
}

/** Zero-size rect at the origin. Means "not positioned yet". */
export const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

/**
 * Create a rect. Sizes must be non-negative integers, positions must be integers.
 */
export function rect(x: number, y: number, width: number, height: number): Rect {
	if (!Number.isInteger(x) || !Number.isInteger(y)) {
		throw new RangeError(`Rect position must be integral, got ${x},${y}`);
	}
	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
		throw new RangeError(`Rect size must be a non-negative integer, got ${width}x${height}`);
	}
	return Object.freeze({ x, y, width, height });
}

export function isEmptyRect(r: Rect): boolean {
	return r.width <= 0 || r.height <= 0;
}

export function rectRight(r: Rect): number {
	return r.x + r.width;
}

export function rectBottom(r: Rect): number {
	return r.y + r.height;
}

/** True when both rects are non-empty and share at least one cell. */
export function rectsIntersect(a: Rect, b: Rect): boolean {
	if (isEmptyRect(a) || isEmptyRect(b)) return false;
	return a.x < rectRight(b) && b.x < rectRight(a) && a.y < rectBottom(b) && b.y < rectBottom(a);
}

/** True when the rects overlap or share an edge (used to decide merges). */
export function rectsTouch(a: Rect, b: Rect): boolean {
	if (isEmptyRect(a) || isEmptyRect(b)) return false;
	return a.x <= rectRight(b) && b.x <= rectRight(a) && a.y <= rectBottom(b) && b.y <= rectBottom(a);
}

export function intersectRects(a: Rect, b: Rect): Rect {
	if (!rectsIntersect(a, b)) return EMPTY_RECT;
	const x = Math.max(a.x, b.x);
	const y = Math.max(a.y, b.y);
	return rect(x, y, Math.min(rectRight(a), rectRight(b)) - x, Math.min(rectBottom(a), rectBottom(b)) - y);
}

/** Bounding box of both rects. Empty inputs are ignored. */
export function unionRects(a: Rect, b: Rect): Rect {
	if (isEmptyRect(a)) return isEmptyRect(b) ? EMPTY_RECT : b;
	if (isEmptyRect(b)) return a;
	const x = Math.min(a.x, b.x);
	const y = Math.min(a.y, b.y);
	return rect(x, y, Math.max(rectRight(a), rectRight(b)) - x, Math.max(rectBottom(a), rectBottom(b)) - y);
}

/**
 * True when every cell of `inner` lies inside `outer`. An empty `inner` is contained by anything.
 */
export function rectContains(outer: Rect, inner: Rect): boolean {
	if (isEmptyRect(inner)) return true;
	if (isEmptyRect(outer)) return false;
	return (
		inner.x >= outer.x &&
		inner.y >= outer.y &&
		rectRight(inner) <= rectRight(outer) &&
		rectBottom(inner) <= rectBottom(outer)
	);
}

/**
 * Cells of `a` not covered by `b`, as up to four disjoint rects
 * (full-width top and bottom bands, then left and right slices of the middle band).
 */
export function subtractRect(a: Rect, b: Rect): Rect[] {
	if (isEmptyRect(a)) return [];
	if (!rectsIntersect(a, b)) return [a];
	const cut = intersectRects(a, b);
	const pieces: Rect[] = [];
	if (cut.y > a.y) {
		pieces.push(rect(a.x, a.y, a.width, cut.y - a.y));
	}
	if (rectBottom(cut) < rectBottom(a)) {
		pieces.push(rect(a.x, rectBottom(cut), a.width, rectBottom(a) - rectBottom(cut)));
	}
	if (cut.x > a.x) {
		pieces.push(rect(a.x, cut.y, cut.x - a.x, cut.height));
	}
	if (rectRight(cut) < rectRight(a)) {
		pieces.push(rect(rectRight(cut), cut.y, rectRight(a) - rectRight(cut), cut.height));
	}
	return pieces;
}

export function formatRect(r: Rect): string {
	return `${r.x},${r.y} ${r.width}x${r.height}`;
}
