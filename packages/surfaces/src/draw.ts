import { isEmptyRect, type Rect } from "./rect.js";
import type { Terminal } from "./terminal.js";
import { truncateToWidth, visibleWidth } from "./utils.js";

/** Absolute cursor move (CUP). Columns and rows are 0-based. */
export function moveTo(col: number, row: number): string {
	return `\x1b[${row + 1};${col + 1}H`;
}

/** Fill every cell of `area` with `char`. */
export function fillRect(terminal: Terminal, area: Rect, char = " "): void {
	if (isEmptyRect(area)) return;
	const line = char.repeat(area.width);
	let out = "";
	for (let row = 0; row < area.height; row++) {
		out += moveTo(area.x, area.y + row) + line;
	}
	terminal.write(out);
}

/**
 * Write `text` at a cell, cut to `maxWidth` visible columns and padded with spaces to exactly that width.
 */
export function drawText(terminal: Terminal, col: number, row: number, text: string, maxWidth: number): void {
	if (maxWidth <= 0) return;
	const clipped = truncateToWidth(text, maxWidth, "");
	const padding = " ".repeat(Math.max(0, maxWidth - visibleWidth(clipped)));
	terminal.write(moveTo(col, row) + clipped + padding);
}
