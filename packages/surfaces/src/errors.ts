/**
 * Programming errors in how surfaces are used. These are never recovered from:
 * the manager throws them as soon as the misuse is detected.
 */
export class ContractViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ContractViolation";
	}
}

/** A surface was disposed (or pushed) out of LIFO order. */
export class StackDisciplineViolation extends ContractViolation {
	constructor(
		readonly surfaceLabel: string,
		readonly topLabel: string | undefined,
		detail?: string,
	) {
		super(
			detail ??
				`Cannot pop "${surfaceLabel}": surfaces must be disposed in reverse creation order (top is ${
					topLabel === undefined ? "empty" : `"${topLabel}"`
				})`,
		);
		this.name = "StackDisciplineViolation";
	}
}

export type DispatchPhase = "idle" | "resize" | "redraw";

/** A dispatch entry point was called from inside a redraw or resize callback. */
export class ReentrantDispatchError extends ContractViolation {
	constructor(
		readonly operation: string,
		readonly phase: DispatchPhase,
	) {
		super(`${operation}() called during ${phase} dispatch; callbacks must not trigger redraws or resizes`);
		this.name = "ReentrantDispatchError";
	}
}
