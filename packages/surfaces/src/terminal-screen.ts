import { type Rect, rect } from "./rect.js";
import type { SurfaceManager } from "./surface-manager.js";
import type { Terminal } from "./terminal.js";

/**
 * Binds a surface manager to a terminal: every terminal resize becomes a
 * {@link SurfaceManager.screenResized} pass, and resize callbacks read the screen size from here.
 */
export class TerminalScreen {
	private resizes = 0;
	private running = false;

	constructor(
		readonly terminal: Terminal,
		readonly manager: SurfaceManager,
	) {}

	get width(): number {
		return this.terminal.columns;
	}

	get height(): number {
		return this.terminal.rows;
	}

	/** Resize events handled since start */
	get resizeCount(): number {
		return this.resizes;
	}

	get isRunning(): boolean {
		return this.running;
	}

	/** The whole screen as a rect. */
	bounds(): Rect {
		return rect(0, 0, this.width, this.height);
	}

	start(onInput: (data: string) => void = () => {}): void {
		if (this.running) return;
		this.running = true;
		this.terminal.start(onInput, () => this.handleResize());
		this.terminal.hideCursor();
		this.terminal.clearScreen();
		this.manager.screenResized();
	}

	stop(): void {
		if (!this.running) return;
		this.running = false;
		this.terminal.showCursor();
		this.terminal.stop();
	}

	private handleResize(): void {
		this.resizes++;
		this.terminal.clearScreen();
		this.manager.screenResized();
	}
}
