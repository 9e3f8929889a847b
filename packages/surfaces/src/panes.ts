import { Chalk } from "chalk";
import { drawText, fillRect } from "./draw.js";
import { rect } from "./rect.js";
import type { Surface } from "./surface.js";
import type { SurfaceManager } from "./surface-manager.js";
import type { TerminalScreen } from "./terminal-screen.js";
import { visibleWidth, wrapPlainText } from "./utils.js";

/**
 * Fills the whole screen with blanks and hides every surface below it.
 * Stays on the stack until disposed.
 */
export class BackgroundPane {
	readonly surface: Surface;

	constructor(
		private readonly screen: TerminalScreen,
		manager: SurfaceManager,
	) {
		this.surface = manager.createSurface({ label: "background" });
		this.surface.setResizeCallback((surface) => surface.setRegion(this.screen.bounds()));
		this.surface.setRedrawCallback((surface) => fillRect(this.screen.terminal, surface.region));
		this.surface.requestResize();
	}

	dispose(): void {
		this.surface.dispose();
	}
}

export interface DiagnosticTheme {
	border: (text: string) => string;
	title: (text: string) => string;
	text: (text: string) => string;
}

const chalk = new Chalk();

export const defaultDiagnosticTheme: DiagnosticTheme = {
	border: (text) => chalk.red(text),
	title: (text) => chalk.bold.red(text),
	text: (text) => text,
};

export interface DiagnosticOptions {
	title?: string;
	theme?: DiagnosticTheme;
}

/** Columns kept free on each side of the box */
const SCREEN_MARGIN = 2;

/**
 * Bordered message box centered on screen that blocks every surface below it from
 * drawing or resizing. Used to report errors, including contract violations caught
 * between dispatch passes.
 */
export class DiagnosticOverlay {
	readonly surface: Surface;
	private lines: string[] = [];
	private readonly title: string;
	private readonly theme: DiagnosticTheme;

	constructor(
		private readonly screen: TerminalScreen,
		manager: SurfaceManager,
		readonly message: string,
		options: DiagnosticOptions = {},
	) {
		this.title = options.title ?? "Error";
		this.theme = options.theme ?? defaultDiagnosticTheme;
		this.surface = manager.createSurface({ label: "diagnostic", blocksBelow: true });
		this.surface.setResizeCallback((surface) => this.layout(surface));
		this.surface.setRedrawCallback((surface) => this.paint(surface));
		this.surface.requestResize();
	}

	/** Wrapped message lines from the last layout */
	get messageLines(): readonly string[] {
		return this.lines;
	}

	dispose(): void {
		this.surface.dispose();
	}

	private layout(surface: Surface): void {
		const maxInner = Math.max(1, this.screen.width - 2 * SCREEN_MARGIN - 2);
		this.lines = wrapPlainText(this.message, maxInner);
		const inner = Math.min(
			maxInner,
			Math.max(visibleWidth(this.title) + 2, ...this.lines.map((line) => visibleWidth(line))),
		);
		const width = Math.min(this.screen.width, inner + 2);
		const height = Math.min(this.screen.height, this.lines.length + 2);
		const x = Math.max(0, Math.floor((this.screen.width - width) / 2));
		const y = Math.max(0, Math.floor((this.screen.height - height) / 2));
		surface.setRegion(rect(x, y, width, height));
	}

	private paint(surface: Surface): void {
		const { x, y, width, height } = surface.region;
		const terminal = this.screen.terminal;
		const inner = Math.max(0, width - 2);
		const title = ` ${this.title} `;
		const top =
			this.theme.border("┌") +
			this.theme.title(title) +
			this.theme.border(`${"─".repeat(Math.max(0, inner - visibleWidth(title)))}┐`);
		drawText(terminal, x, y, top, width);
		for (let i = 0; i < height - 2; i++) {
			drawText(terminal, x, y + 1 + i, this.theme.border("│"), 1);
			drawText(terminal, x + 1, y + 1 + i, this.theme.text(this.lines[i] ?? ""), inner);
			drawText(terminal, x + width - 1, y + 1 + i, this.theme.border("│"), 1);
		}
		if (height > 1) {
			drawText(terminal, x, y + height - 1, this.theme.border(`└${"─".repeat(inner)}┘`), width);
		}
	}
}

/**
 * Show a diagnostic overlay and draw it right away. Call between dispatch passes,
 * never from a redraw or resize callback.
 */
export function showDiagnostic(
	screen: TerminalScreen,
	manager: SurfaceManager,
	message: string,
	options?: DiagnosticOptions,
): DiagnosticOverlay {
	const overlay = new DiagnosticOverlay(screen, manager, message, options);
	manager.redraw();
	return overlay;
}
