export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
	debug(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	error(message: string, meta?: LogMeta): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 50,
};

const PREFIX = "[genwire]";

/**
 * Creates a console logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = "warn"): Logger {
	const enabled = (messageLevel: LogLevel) =>
		LEVEL_PRIORITY[messageLevel] >= LEVEL_PRIORITY[level];

	const write =
		(messageLevel: Exclude<LogLevel, "silent">) =>
		(message: string, meta?: LogMeta) => {
			if (!enabled(messageLevel)) return;
			const line = `${PREFIX} ${messageLevel.toUpperCase()} ${message}`;
			if (meta) {
				console[messageLevel](line, meta);
			} else {
				console[messageLevel](line);
			}
		};

	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}

export const silentLogger: Logger = createLogger("silent");
