import assert from "node:assert";
import { describe, it } from "node:test";
import { silentLog } from "../src/debug-log.js";
import { rect } from "../src/rect.js";
import { SurfaceManager } from "../src/surface-manager.js";
import { TerminalScreen } from "../src/terminal-screen.js";
import { VirtualTerminal } from "./virtual-terminal.js";

function setup() {
	const terminal = new VirtualTerminal(30, 8);
	const manager = new SurfaceManager({ log: silentLog });
	const screen = new TerminalScreen(terminal, manager);
	return { terminal, manager, screen };
}

describe("TerminalScreen", () => {
	it("starts the terminal and runs a first full pass", () => {
		const { terminal, manager, screen } = setup();
		screen.start();
		assert.strictEqual(terminal.isStarted, true);
		assert.strictEqual(screen.isRunning, true);
		assert.strictEqual(manager.passes, 1);
		assert.deepStrictEqual(screen.bounds(), rect(0, 0, 30, 8));
	});

	it("ignores a second start", () => {
		const { manager, screen } = setup();
		screen.start();
		screen.start();
		assert.strictEqual(manager.passes, 1);
	});

	it("forwards input", () => {
		const { terminal, screen } = setup();
		const received: string[] = [];
		screen.start((data) => received.push(data));
		terminal.sendInput("q");
		assert.deepStrictEqual(received, ["q"]);
	});

	it("turns terminal resizes into resize passes", () => {
		const { terminal, manager, screen } = setup();
		const seen: string[] = [];
		const surface = manager.createSurface({ label: "status" });
		surface.setResizeCallback((s) => {
			seen.push(`${screen.width}x${screen.height}`);
			s.setRegion(rect(0, screen.height - 1, screen.width, 1));
		});
		screen.start();
		terminal.resize(50, 20);
		assert.strictEqual(screen.resizeCount, 1);
		assert.strictEqual(manager.passes, 2);
		assert.deepStrictEqual(seen, ["30x8", "50x20"]);
		assert.deepStrictEqual(surface.region, rect(0, 19, 50, 1));
	});

	it("stops once", () => {
		const { terminal, screen } = setup();
		screen.start();
		screen.stop();
		assert.strictEqual(terminal.isStarted, false);
		assert.strictEqual(screen.isRunning, false);
		screen.stop();
		assert.strictEqual(screen.isRunning, false);
	});
});
