import assert from "node:assert";
import { describe, it } from "node:test";
import { silentLog } from "../src/debug-log.js";
import { drawText } from "../src/draw.js";
import { BackgroundPane, type DiagnosticTheme, showDiagnostic } from "../src/panes.js";
import { rect } from "../src/rect.js";
import { SurfaceManager } from "../src/surface-manager.js";
import { TerminalScreen } from "../src/terminal-screen.js";
import { VirtualTerminal } from "./virtual-terminal.js";

const plainTheme: DiagnosticTheme = {
	border: (text) => text,
	title: (text) => text,
	text: (text) => text,
};

function setup(columns = 40, rows = 10) {
	const terminal = new VirtualTerminal(columns, rows);
	const manager = new SurfaceManager({ log: silentLog });
	const screen = new TerminalScreen(terminal, manager);
	const background = new BackgroundPane(screen, manager);

	let panelRedraws = 0;
	const panel = manager.createSurface({ label: "panel" });
	panel.setResizeCallback((surface) => surface.setRegion(rect(0, 0, screen.width, 3)));
	panel.setRedrawCallback((surface) => {
		panelRedraws++;
		for (let row = 0; row < surface.region.height; row++) {
			drawText(terminal, surface.region.x, surface.region.y + row, `row ${row}`, surface.region.width);
		}
	});
	panel.requestResize();

	return { terminal, manager, screen, background, panel, panelRedraws: () => panelRedraws };
}

describe("BackgroundPane", () => {
	it("covers the screen and sits under other panels", async () => {
		const { terminal, screen, background } = setup();
		screen.start();
		assert.deepStrictEqual(background.surface.region, rect(0, 0, 40, 10));
		const viewport = await terminal.viewport();
		assert.deepStrictEqual(viewport, ["row 0", "row 1", "row 2", "", "", "", "", "", "", ""]);
	});

	it("follows the terminal size", async () => {
		const { terminal, screen, background, panel } = setup();
		screen.start();
		terminal.resize(60, 12);
		assert.strictEqual(screen.resizeCount, 1);
		assert.deepStrictEqual(background.surface.region, rect(0, 0, 60, 12));
		assert.deepStrictEqual(panel.region, rect(0, 0, 60, 3));
		const viewport = await terminal.viewport();
		assert.strictEqual(viewport.length, 12);
		assert.strictEqual(viewport[0], "row 0");
	});
});

describe("DiagnosticOverlay", () => {
	it("draws a centered box over everything and blocks the panels below", async () => {
		const { terminal, manager, screen, panelRedraws } = setup();
		screen.start();
		const before = panelRedraws();

		const overlay = showDiagnostic(screen, manager, "disk full", { theme: plainTheme });
		assert.deepStrictEqual(overlay.surface.region, rect(14, 3, 11, 3));
		assert.strictEqual(panelRedraws(), before);

		const viewport = await terminal.viewport();
		assert.strictEqual(viewport[0], "row 0");
		assert.strictEqual(viewport[3], `${" ".repeat(14)}┌ Error ──┐`);
		assert.strictEqual(viewport[4], `${" ".repeat(14)}│disk full│`);
		assert.strictEqual(viewport[5], `${" ".repeat(14)}└─────────┘`);
	});

	it("restores the panels beneath once closed", async () => {
		const { terminal, manager, screen, panelRedraws } = setup();
		screen.start();
		const overlay = showDiagnostic(screen, manager, "disk full", { theme: plainTheme });
		const before = panelRedraws();

		overlay.dispose();
		manager.redraw();
		assert.strictEqual(panelRedraws(), before + 1);

		const viewport = await terminal.viewport();
		assert.deepStrictEqual(viewport, ["row 0", "row 1", "row 2", "", "", "", "", "", "", ""]);
	});

	it("recenters on resize while the panels below wait for it to close", async () => {
		const { terminal, manager, screen, background, panel } = setup();
		screen.start();
		const overlay = showDiagnostic(screen, manager, "disk full", { theme: plainTheme });

		terminal.resize(60, 12);
		assert.deepStrictEqual(overlay.surface.region, rect(24, 4, 11, 3));
		assert.strictEqual(background.surface.pendingResize, true);
		assert.deepStrictEqual(panel.region, rect(0, 0, 40, 3));

		overlay.dispose();
		manager.redraw();
		assert.deepStrictEqual(background.surface.region, rect(0, 0, 60, 12));
		assert.deepStrictEqual(panel.region, rect(0, 0, 60, 3));
		const viewport = await terminal.viewport();
		assert.strictEqual(viewport[0], "row 0");
		assert.strictEqual(viewport[5], "");
	});

	it("wraps long messages to the screen width", () => {
		const { manager, screen } = setup(20, 10);
		screen.start();
		const overlay = showDiagnostic(screen, manager, "cannot open the configuration file", { theme: plainTheme });
		assert.deepStrictEqual(overlay.messageLines, ["cannot open", "the", "configuration", "file"]);
		assert.deepStrictEqual(overlay.surface.region, rect(2, 2, 15, 6));
	});
});
