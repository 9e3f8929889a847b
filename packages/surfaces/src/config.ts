import * as os from "node:os";
import * as path from "node:path";

export interface SurfaceConfig {
	/** Append dispatch decisions to the debug log (SURFACES_DEBUG_REDRAW=1) */
	debugRedraw: boolean;
	/** Debug log location (SURFACES_DEBUG_LOG) */
	debugLogPath: string;
	/** Mirror every terminal write to this file when set (SURFACES_WRITE_LOG) */
	writeLogPath: string;
}

export function defaultDebugLogPath(): string {
	return path.join(os.homedir(), ".surfaces", "debug.log");
}

export function loadSurfaceConfig(env: NodeJS.ProcessEnv = process.env): SurfaceConfig {
	return {
		debugRedraw: env.SURFACES_DEBUG_REDRAW === "1",
		debugLogPath: env.SURFACES_DEBUG_LOG || defaultDebugLogPath(),
		writeLogPath: env.SURFACES_WRITE_LOG || "",
	};
}
