import * as fs from "node:fs";
import * as path from "node:path";
import type { SurfaceConfig } from "./config.js";

export type DebugLog = (message: string) => void;

/** Log sink that drops everything. */
export const silentLog: DebugLog = () => {};

export function formatLogLine(message: string, now: Date = new Date()): string {
	return `[${now.toISOString()}] ${message}\n`;
}

/**
 * Append-only debug log. Does nothing unless SURFACES_DEBUG_REDRAW is enabled.
 */
export function createDebugLog(config: Pick<SurfaceConfig, "debugRedraw" | "debugLogPath">): DebugLog {
	if (!config.debugRedraw) return silentLog;
	let ready = false;
	return (message: string): void => {
		if (!ready) {
			fs.mkdirSync(path.dirname(config.debugLogPath), { recursive: true });
			ready = true;
		}
		fs.appendFileSync(config.debugLogPath, formatLogLine(message));
	};
}
