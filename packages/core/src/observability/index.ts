/**
 * Observability: Structured logging.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	parseLogLevel,
	resetLoggingConfig,
} from "./logger.js";
export type {
	LogEntry,
	LogLevelName,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
