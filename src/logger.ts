export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold: LogLevel = "info";

/** Messages below this level are dropped. Set from the parsed configuration. */
export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

function enabled(level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

// stdout is reserved for protocol traffic, so every level goes to stderr.
export const logger = {
	info: (...args: unknown[]) => {
		if (enabled("info")) console.error("[INFO]", ...args);
	},
	warn: (...args: unknown[]) => {
		if (enabled("warn")) console.error("[WARN]", ...args);
	},
	error: (...args: unknown[]) => console.error("[ERROR]", ...args),
	debug: (...args: unknown[]) => {
		if (enabled("debug")) console.error("[DEBUG]", ...args);
	},
};
