/**
 * @logweave/core: queue, dispatcher, loggers, registry and process-wide setup.
 */

export { LogweaveError, ConfigError, SinkError, reportToStderr, type ErrorHook } from './errors.js';
export { LogQueue, DEFAULT_DRAIN_BATCH, type Task, type LogQueueOptions, type OverflowPolicy } from './queue.js';
export { QueueWorker, type QueueWorkerOptions } from './worker.js';
export { Dispatcher, type DispatcherOptions, type DispatcherOverflow } from './dispatcher.js';
export { BaseLogger, type Logger, type LoggerOptions, type CloneOptions } from './logger.js';
export { SyncLogger } from './sync-logger.js';
export { AsyncLogger, type AsyncLoggerOptions } from './async-logger.js';
export { LogStream, stringifyValue, type LogStreamTarget } from './stream.js';
export { LoggerRegistry } from './registry.js';
export { LogManager } from './manager.js';
export {
	createCategoryLogger,
	type CategoryLogger,
	type CategoryLoggerOptions,
} from './category.js';
export {
	DEFAULT_LOGGER_NAME,
	DEFAULT_LOG_FILE_NAME,
	DEFAULT_CONFIG_FILE_PATTERN,
	initialize,
	shutdown,
	getRegistry,
	getLogManager,
	getLogger,
	currentLogger,
	isLoggerAsync,
	addConsoleSink,
	addFileSink,
	setConsolePattern,
	setFilePattern,
	setLogLevel,
	setFlushLevel,
	defaultLoggerConfig,
	configureLogger,
	type LoggingConfig,
	type SinkSelection,
} from './logging.js';
export { parseLoggingConfig, loadLoggingConfig, applyEnvOverrides, parseLogLevel } from './config.js';
export { platformLogDirectory, ensureLogDirectoryExists, createLoggingFolder, type PlatformContext } from './paths.js';
