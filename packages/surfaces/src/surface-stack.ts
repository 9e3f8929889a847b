import { StackDisciplineViolation } from "./errors.js";
import type { Surface } from "./surface.js";

/**
 * Live surfaces in creation order. Index 0 is the bottom; the last entry is on top.
 */
export class SurfaceStack implements Iterable<Surface> {
	private entries: Surface[] = [];

	get size(): number {
		return this.entries.length;
	}

	get isEmpty(): boolean {
		return this.entries.length === 0;
	}

	/**
	 * Append `surface` on top. A surface pushes itself once from its constructor, so a
	 * repeated push only happens when the stack is driven directly.
	 */
	push(surface: Surface): void {
		if (this.entries.includes(surface)) {
			throw new StackDisciplineViolation(
				surface.label,
				this.top()?.label,
				`Surface "${surface.label}" is already on the stack`,
			);
		}
		this.entries.push(surface);
	}

	/** Remove `surface`, which must be the top entry. */
	pop(surface: Surface): void {
		const top = this.top();
		if (top !== surface) {
			throw new StackDisciplineViolation(surface.label, top?.label);
		}
		this.entries.pop();
	}

	top(): Surface | undefined {
		return this.entries[this.entries.length - 1];
	}

	at(index: number): Surface | undefined {
		return this.entries[index];
	}

	indexOf(surface: Surface): number {
		return this.entries.indexOf(surface);
	}

	/** Index of the topmost surface that blocks those below it, or 0 when none does. */
	floorIndex(): number {
		for (let i = this.entries.length - 1; i >= 0; i--) {
			if (this.entries[i].blocksBelow) return i;
		}
		return 0;
	}

	toArray(): readonly Surface[] {
		return [...this.entries];
	}

	[Symbol.iterator](): Iterator<Surface> {
		return this.entries[Symbol.iterator]();
	}
}
