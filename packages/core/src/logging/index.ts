/**
 * Logging utilities.
 */

export {
	createLogger,
	getLogLevelFromEnv,
	isLogLevel,
	silentLogger,
	LOG_LEVELS,
	type Logger,
	type LoggerOptions,
	type LogLevel,
} from "./log.js";
