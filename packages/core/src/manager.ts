/**
 * LogManager: owns named loggers and their sinks.
 *
 * Every operation that names an unknown logger is a no-op.
 */

import type { LogLevel } from '@logweave/sdk';
import { ConsoleSink, type ConsoleSinkOptions } from '@logweave/sink-console';
import { FileSink, type FileSinkOptions } from '@logweave/sink-file';
import { AsyncLogger, type AsyncLoggerOptions } from './async-logger.js';
import type { Logger } from './logger.js';
import type { LoggerRegistry } from './registry.js';
import { SyncLogger } from './sync-logger.js';

export class LogManager {
	private readonly loggers = new Map<string, Logger>();

	constructor(
		private readonly registry: LoggerRegistry,
		private readonly loggerOptions: AsyncLoggerOptions = {},
	) {}

	/**
	 * Create and register a logger. A name that already exists returns the
	 * existing logger unchanged, whatever `async` says.
	 */
	createLogger(name: string, async = false): Logger {
		const existing = this.loggers.get(name);
		if (existing) return existing;

		const logger = async
			? new AsyncLogger(name, this.loggerOptions)
			: new SyncLogger(name, this.loggerOptions);
		this.loggers.set(name, logger);
		this.registry.register(logger);
		return logger;
	}

	getLogger(name: string): Logger | undefined {
		return this.loggers.get(name);
	}

	/** False for unknown names */
	isLoggerAsync(name: string): boolean {
		return this.loggers.get(name)?.isAsync ?? false;
	}

	loggerNames(): string[] {
		return [...this.loggers.keys()];
	}

	addConsoleSink(name: string, options?: ConsoleSinkOptions): void {
		this.loggers.get(name)?.addLogSink(new ConsoleSink(options));
	}

	addFileSink(name: string, filePath: string, options?: FileSinkOptions): void {
		this.loggers.get(name)?.addLogSink(new FileSink(filePath, options));
	}

	setConsolePattern(name: string, pattern: string): void {
		for (const sink of this.loggers.get(name)?.getLogSinks() ?? []) {
			if (sink instanceof ConsoleSink) sink.setPattern(pattern);
		}
	}

	setFilePattern(name: string, pattern: string): void {
		for (const sink of this.loggers.get(name)?.getLogSinks() ?? []) {
			if (sink instanceof FileSink) sink.setPattern(pattern);
		}
	}

	setLogLevel(name: string, level: LogLevel): void {
		this.loggers.get(name)?.setCurrentLogLevel(level);
	}

	setFlushLevel(name: string, level: LogLevel): void {
		this.loggers.get(name)?.setFlushLevel(level);
	}

	/**
	 * Flush, unregister and close every logger, then forget them all.
	 */
	async finalize(): Promise<void> {
		const loggers = [...this.loggers.entries()];
		this.loggers.clear();
		for (const [name, logger] of loggers) {
			logger.flush();
			if (this.registry.get(name) === logger) {
				this.registry.unregister(name);
			}
			await logger.close();
		}
	}
}
