export {
	LogLevel,
	Logger,
	ConsoleTransport,
	FileTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
