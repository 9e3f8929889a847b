import { eastAsianWidth } from "get-east-asian-width";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const pictographicRegex = /\p{Extended_Pictographic}/u;

// Cache for non-ASCII strings
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Terminal width of a single grapheme cluster.
 */
function graphemeWidth(segment: string): number {
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}
	if (pictographicRegex.test(segment) && (segment.includes("\uFE0F") || (segment.codePointAt(0) ?? 0) >= 0x1f000)) {
		return 2;
	}
	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}
	return eastAsianWidth(cp);
}

/**
 * Extract the ANSI escape sequence starting at `pos`, if there is one.
 */
export function extractAnsiCode(str: string, pos: number): { code: string; length: number } | null {
	if (pos >= str.length || str[pos] !== "\x1b") return null;

	const next = str[pos + 1];

	// CSI sequence: ESC [ ... final byte
	if (next === "[") {
		let j = pos + 2;
		while (j < str.length && !/[@-~]/.test(str[j])) j++;
		if (j < str.length) return { code: str.substring(pos, j + 1), length: j + 1 - pos };
		return null;
	}

	// OSC sequence: ESC ] ... BEL or ESC ] ... ST (ESC \)
	if (next === "]") {
		let j = pos + 2;
		while (j < str.length) {
			if (str[j] === "\x07") return { code: str.substring(pos, j + 1), length: j + 1 - pos };
			if (str[j] === "\x1b" && str[j + 1] === "\\") return { code: str.substring(pos, j + 2), length: j + 2 - pos };
			j++;
		}
		return null;
	}

	return null;
}

/**
 * Calculate the visible width of a string in terminal columns.
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	let clean = "";
	for (let i = 0; i < str.length; ) {
		const ansi = extractAnsiCode(str, i);
		if (ansi) {
			i += ansi.length;
		} else {
			clean += str[i];
			i++;
		}
	}

	let width = 0;
	for (const { segment } of segmenter.segment(clean)) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/**
 * Truncate text to fit within a maximum visible width, adding ellipsis if needed.
 * ANSI escape codes are kept and do not count toward the width.
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis = "..."): string {
	if (maxWidth <= 0) return "";
	if (visibleWidth(text) <= maxWidth) {
		return text;
	}

	const targetWidth = maxWidth - visibleWidth(ellipsis);
	if (targetWidth <= 0) {
		return ellipsis.substring(0, maxWidth);
	}

	let result = "";
	let currentWidth = 0;
	let i = 0;
	outer: while (i < text.length) {
		const ansi = extractAnsiCode(text, i);
		if (ansi) {
			result += ansi.code;
			i += ansi.length;
			continue;
		}
		let end = i;
		while (end < text.length && text[end] !== "\x1b") end++;
		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			const w = graphemeWidth(segment);
			if (currentWidth + w > targetWidth) break outer;
			result += segment;
			currentWidth += w;
		}
		i = end;
	}

	// Reset before the ellipsis so styling does not leak into it
	return result.includes("\x1b") ? `${result}\x1b[0m${ellipsis}` : `${result}${ellipsis}`;
}

/**
 * Word-wrap plain text (no ANSI codes) to the given width. Words longer than the
 * width are broken. Explicit newlines are kept.
 */
export function wrapPlainText(text: string, width: number): string[] {
	const lines: string[] = [];
	const limit = Math.max(1, width);
	for (const paragraph of text.split("\n")) {
		let current = "";
		for (const word of paragraph.split(/\s+/).filter((w) => w.length > 0)) {
			let rest = word;
			while (visibleWidth(rest) > limit) {
				if (current) {
					lines.push(current);
					current = "";
				}
				let head = "";
				for (const { segment } of segmenter.segment(rest)) {
					if (visibleWidth(head + segment) > limit) break;
					head += segment;
				}
				if (!head) break;
				lines.push(head);
				rest = rest.slice(head.length);
			}
			if (!rest) continue;
			if (!current) {
				current = rest;
			} else if (visibleWidth(current) + 1 + visibleWidth(rest) <= limit) {
				current += ` ${rest}`;
			} else {
				lines.push(current);
				current = rest;
			}
		}
		lines.push(current);
	}
	return lines;
}
