import * as fs from "node:fs";
import { loadSurfaceConfig } from "./config.js";

/** Escape sequences the surfaces need from a VT100-style terminal */
export const CURSOR_HIDE = "\x1b[?25l";
export const CURSOR_SHOW = "\x1b[?25h";
/** Erase the display and home the cursor */
export const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/**
 * Output device the surface manager draws through. Sizes are in cells.
 */
export interface Terminal {
	/** Begin delivering input and resize events */
	start(onInput: (data: string) => void, onResize: () => void): void;
	/** Stop delivering events and restore the device */
	stop(): void;
	write(data: string): void;
	readonly columns: number;
	readonly rows: number;
	hideCursor(): void;
	showCursor(): void;
	clearScreen(): void;
}

/** The parts of a TTY read stream the terminal uses. `process.stdin` fits. */
export interface TerminalInput {
	readonly isRaw?: boolean;
	setRawMode?(mode: boolean): unknown;
	setEncoding(encoding: BufferEncoding): unknown;
	resume(): unknown;
	pause(): unknown;
	on(event: "data", listener: (data: string) => void): unknown;
	removeListener(event: "data", listener: (data: string) => void): unknown;
}

/** The parts of a TTY write stream the terminal uses. `process.stdout` fits. */
export interface TerminalOutput {
	readonly columns?: number;
	readonly rows?: number;
	write(data: string): unknown;
	on(event: "resize", listener: () => void): unknown;
	removeListener(event: "resize", listener: () => void): unknown;
}

export interface ProcessTerminalOptions {
	input?: TerminalInput;
	output?: TerminalOutput;
	/** Copy every write to this file. Defaults to SURFACES_WRITE_LOG. */
	writeLogPath?: string;
}

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

/**
 * Terminal on the process's standard streams, in raw mode while started.
 */
export class ProcessTerminal implements Terminal {
	private readonly input: TerminalInput;
	private readonly output: TerminalOutput;
	private readonly writeLogPath: string;
	private listeners?: { data: (data: string) => void; resize: () => void; wasRaw: boolean };

	constructor(options: ProcessTerminalOptions = {}) {
		this.input = options.input ?? process.stdin;
		this.output = options.output ?? process.stdout;
		this.writeLogPath = options.writeLogPath ?? loadSurfaceConfig().writeLogPath;
	}

	get isStarted(): boolean {
		return this.listeners !== undefined;
	}

	get columns(): number {
		return this.output.columns || FALLBACK_COLUMNS;
	}

	get rows(): number {
		return this.output.rows || FALLBACK_ROWS;
	}

	start(onInput: (data: string) => void, onResize: () => void): void {
		if (this.listeners) return;
		this.listeners = { data: onInput, resize: onResize, wasRaw: this.input.isRaw ?? false };
		this.input.setRawMode?.(true);
		this.input.setEncoding("utf8");
		this.input.on("data", onInput);
		this.input.resume();
		this.output.on("resize", onResize);
	}

	stop(): void {
		const listeners = this.listeners;
		if (!listeners) return;
		this.listeners = undefined;
		this.output.removeListener("resize", listeners.resize);
		this.input.removeListener("data", listeners.data);
		this.input.pause();
		this.input.setRawMode?.(listeners.wasRaw);
	}

	write(data: string): void {
		this.output.write(data);
		if (this.writeLogPath) fs.appendFileSync(this.writeLogPath, data, "utf8");
	}

	hideCursor(): void {
		this.write(CURSOR_HIDE);
	}

	showCursor(): void {
		this.write(CURSOR_SHOW);
	}

	clearScreen(): void {
		this.write(CLEAR_SCREEN);
	}
}
