/**
 * @title Logging Module
 * @description Level-gated logger with a pluggable sink.
 *
 * @module logging
 *
 * @envvar VASTLINT_LOG_LEVEL - Default level: "error", "warn" (default), "info" or "debug".
 */

/** Log levels, most severe first. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger used by the validation engine and network inspectors.
 */
export interface Logger {
	/**
	 * Log a message if its level is at or below the configured level.
	 *
	 * @param message - The message to log.
	 * @param level - The level of the message (default: "info").
	 */
	log(message: string, level?: LogLevel): void;
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

/**
 * Options for {@link createLogger}.
 */
export interface LoggerOptions {
	/** Most verbose level that is written (default: VASTLINT_LOG_LEVEL or "warn"). */
	level?: LogLevel;
	/** Receives formatted lines (default: console.error). */
	sink?: (line: string) => void;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the default log level from the environment.
 */
export function getLogLevelFromEnv(): LogLevel {
	const value = process.env["VASTLINT_LOG_LEVEL"]?.trim().toLowerCase();
	return isLogLevel(value) ? value : "warn";
}

/**
 * Create a level-gated logger.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const logger = createLogger({ level: "debug", sink: (line) => lines.push(line) });
 * logger.debug("probing asset");
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const threshold = options.level ?? getLogLevelFromEnv();
	const sink = options.sink ?? ((line: string) => console.error(line));

	const log = (message: string, level: LogLevel = "info"): void => {
		if (LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold)) {
			sink(`[vastlint] ${level}: ${message}`);
		}
	};

	return {
		log,
		error: (message) => log(message, "error"),
		warn: (message) => log(message, "warn"),
		info: (message) => log(message, "info"),
		debug: (message) => log(message, "debug"),
	};
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => undefined });
