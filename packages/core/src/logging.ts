/**
 * Process-wide logging setup.
 *
 * One LogManager and one registry per process. Call initialize() or
 * configureLogger() at startup and `await shutdown()` before exit so queued
 * records reach their sinks.
 */

import { join } from 'node:path';
import {
	DEFAULT_CONSOLE_PATTERN,
	DEFAULT_FLUSH_LEVEL,
	DEFAULT_LOG_LEVEL,
	type LogLevel,
} from '@logweave/sdk';
import type { ConsoleSinkOptions } from '@logweave/sink-console';
import type { FileSinkOptions } from '@logweave/sink-file';
import type { Logger } from './logger.js';
import { LogManager } from './manager.js';
import { platformLogDirectory } from './paths.js';
import { LoggerRegistry } from './registry.js';

export const DEFAULT_LOGGER_NAME = 'logweave.default';
export const DEFAULT_LOG_FILE_NAME = 'logweave.log';
export const DEFAULT_CONFIG_FILE_PATTERN = '%x [%n] [%l] [%!] %v';

export type SinkSelection = 'none' | 'console' | 'file' | 'both';

export interface LoggingConfig {
	name: string;
	sink: SinkSelection;
	consolePattern: string;
	filePattern: string;
	/** Empty disables the file sink even when `sink` asks for one */
	filePath: string;
	logLevel: LogLevel;
	flushLevel: LogLevel;
	async: boolean;
}

// ─── Process state ────────────────────────────────────────────────────────────

const registry = new LoggerRegistry();
let manager: LogManager | null = null;

function ensureManager(): LogManager {
	if (!manager) {
		manager = new LogManager(registry);
	}
	return manager;
}

export function getRegistry(): LoggerRegistry {
	return registry;
}

export function getLogManager(): LogManager {
	return ensureManager();
}

// ─── Lifecycle ────────────────────────────────────────────────────────────────

/** Create (or reuse) the logger `name`. */
export function initialize(name = DEFAULT_LOGGER_NAME, async = false): Logger {
	return ensureManager().createLogger(name, async);
}

/**
 * Flush and close every logger and drop the manager. Safe to call more
 * than once.
 */
export async function shutdown(): Promise<void> {
	if (!manager) return;
	const current = manager;
	manager = null;
	await current.finalize();
}

// ─── Per-logger settings ──────────────────────────────────────────────────────

export function getLogger(name = DEFAULT_LOGGER_NAME): Logger | undefined {
	return registry.get(name);
}

/** The logger selected by runWithCurrent(), else the last one registered */
export function currentLogger(): Logger | undefined {
	return registry.current();
}

export function isLoggerAsync(name: string): boolean {
	return manager?.isLoggerAsync(name) ?? false;
}

export function addConsoleSink(name: string, options?: ConsoleSinkOptions): void {
	ensureManager().addConsoleSink(name, options);
}

export function addFileSink(name: string, filePath: string, options?: FileSinkOptions): void {
	ensureManager().addFileSink(name, filePath, options);
}

export function setConsolePattern(name: string, pattern: string): void {
	ensureManager().setConsolePattern(name, pattern);
}

export function setFilePattern(name: string, pattern: string): void {
	ensureManager().setFilePattern(name, pattern);
}

export function setLogLevel(name: string, level: LogLevel): void {
	ensureManager().setLogLevel(name, level);
}

export function setFlushLevel(name: string, level: LogLevel): void {
	ensureManager().setFlushLevel(name, level);
}

// ─── Configuration ────────────────────────────────────────────────────────────

/**
 * Console-only sync logger at info, flushing at error. `filePath` points
 * into the platform log directory for callers that switch `sink` to file.
 */
export function defaultLoggerConfig(): LoggingConfig {
	return {
		name: DEFAULT_LOGGER_NAME,
		sink: 'console',
		consolePattern: DEFAULT_CONSOLE_PATTERN,
		filePattern: DEFAULT_CONFIG_FILE_PATTERN,
		filePath: join(platformLogDirectory(), DEFAULT_LOG_FILE_NAME),
		logLevel: DEFAULT_LOG_LEVEL,
		flushLevel: DEFAULT_FLUSH_LEVEL,
		async: false,
	};
}

/** Create the configured logger, attach its sinks and set its levels. */
export function configureLogger(config: LoggingConfig): Logger {
	const logger = initialize(config.name, config.async);

	if (config.sink === 'console' || config.sink === 'both') {
		addConsoleSink(config.name);
		if (config.consolePattern) setConsolePattern(config.name, config.consolePattern);
	}

	if ((config.sink === 'file' || config.sink === 'both') && config.filePath) {
		addFileSink(config.name, config.filePath);
		if (config.filePattern) setFilePattern(config.name, config.filePattern);
	}

	setLogLevel(config.name, config.logLevel);
	setFlushLevel(config.name, config.flushLevel);
	return logger;
}
