// Surface stack core
export * from "./dirty-region.js";
export * from "./errors.js";
export * from "./rect.js";
export * from "./redraw-plan.js";
export * from "./surface.js";
export * from "./surface-manager.js";
export * from "./surface-stack.js";
// Configuration and debug logging
export * from "./config.js";
export * from "./debug-log.js";
// Terminal interface and implementations
export * from "./terminal.js";
export * from "./terminal-screen.js";
// Drawing helpers and built-in panes
export * from "./draw.js";
export * from "./panes.js";
export * from "./utils.js";
