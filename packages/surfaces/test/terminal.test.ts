import assert from "node:assert";
import { EventEmitter } from "node:events";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { describe, it } from "node:test";
import { CLEAR_SCREEN, CURSOR_HIDE, ProcessTerminal, type TerminalInput, type TerminalOutput } from "../src/terminal.js";

class FakeInput extends EventEmitter implements TerminalInput {
	isRaw = false;
	encoding?: string;
	flowing = false;

	setRawMode(mode: boolean): this {
		this.isRaw = mode;
		return this;
	}

	setEncoding(encoding: BufferEncoding): this {
		this.encoding = encoding;
		return this;
	}

	resume(): this {
		this.flowing = true;
		return this;
	}

	pause(): this {
		this.flowing = false;
		return this;
	}
}

class FakeOutput extends EventEmitter implements TerminalOutput {
	columns?: number;
	rows?: number;
	written: string[] = [];

	constructor(columns?: number, rows?: number) {
		super();
		this.columns = columns;
		this.rows = rows;
	}

	write(data: string): boolean {
		this.written.push(data);
		return true;
	}
}

function setup(writeLogPath = "") {
	const input = new FakeInput();
	const output = new FakeOutput(100, 30);
	const terminal = new ProcessTerminal({ input, output, writeLogPath });
	return { input, output, terminal };
}

describe("ProcessTerminal", () => {
	it("switches input to raw mode while started and restores it on stop", () => {
		const { input, terminal } = setup();
		terminal.start(
			() => {},
			() => {},
		);
		assert.strictEqual(input.isRaw, true);
		assert.strictEqual(input.encoding, "utf8");
		assert.strictEqual(input.flowing, true);
		assert.strictEqual(terminal.isStarted, true);

		terminal.stop();
		assert.strictEqual(input.isRaw, false);
		assert.strictEqual(input.flowing, false);
		assert.strictEqual(terminal.isStarted, false);
	});

	it("delivers input and resize events until stopped", () => {
		const { input, output, terminal } = setup();
		const events: string[] = [];
		terminal.start(
			(data) => events.push(`input:${data}`),
			() => events.push("resize"),
		);
		input.emit("data", "a");
		output.emit("resize");
		terminal.stop();
		input.emit("data", "b");
		output.emit("resize");

		assert.deepStrictEqual(events, ["input:a", "resize"]);
		assert.strictEqual(input.listenerCount("data"), 0);
		assert.strictEqual(output.listenerCount("resize"), 0);
	});

	it("ignores a second start", () => {
		const { input, output, terminal } = setup();
		terminal.start(
			() => {},
			() => {},
		);
		terminal.start(
			() => {},
			() => {},
		);
		assert.strictEqual(input.listenerCount("data"), 1);
		assert.strictEqual(output.listenerCount("resize"), 1);
	});

	it("reports the output size, falling back to 80x24", () => {
		const { terminal } = setup();
		assert.strictEqual(terminal.columns, 100);
		assert.strictEqual(terminal.rows, 30);

		const unsized = new ProcessTerminal({ input: new FakeInput(), output: new FakeOutput(), writeLogPath: "" });
		assert.strictEqual(unsized.columns, 80);
		assert.strictEqual(unsized.rows, 24);
	});

	it("writes control sequences to the output", () => {
		const { output, terminal } = setup();
		terminal.hideCursor();
		terminal.clearScreen();
		terminal.write("hi");
		assert.deepStrictEqual(output.written, [CURSOR_HIDE, CLEAR_SCREEN, "hi"]);
	});

	it("copies writes to the write log", () => {
		const dir = mkdtempSync(path.join(tmpdir(), "surfaces-writes-"));
		try {
			const logPath = path.join(dir, "writes.log");
			const { terminal } = setup(logPath);
			terminal.write("one");
			terminal.clearScreen();
			assert.strictEqual(readFileSync(logPath, "utf8"), `one${CLEAR_SCREEN}`);
		} finally {
			rmSync(dir, { recursive: true, force: true });
		}
	});
});
