/**
 * Logger contract and the state both variants share.
 */

import {
	DEFAULT_FLUSH_LEVEL,
	DEFAULT_LOG_LEVEL,
	type LogLevel,
	type LogRecord,
	type LogSink,
	type TimestampKind,
	createRecord,
	isLevelEnabled,
} from '@logweave/sdk';
import { type ErrorHook, SinkError, reportToStderr } from './errors.js';

export interface CloneOptions {
	/** Clone every sink into the new logger (default: start with no sinks) */
	withSinks?: boolean;
}

export interface Logger {
	readonly isAsync: boolean;
	getName(): string;
	log(
		category: string,
		level: LogLevel,
		timestampKind: TimestampKind,
		message: string,
		file: string,
		functionName: string,
		line: number,
	): void;
	logRecord(record: LogRecord): void;
	addLogSink(sink: LogSink): void;
	getLogSinks(): readonly LogSink[];
	setCurrentLogLevel(level: LogLevel): void;
	getCurrentLogLevel(): LogLevel;
	setFlushLevel(level: LogLevel): void;
	getFlushLevel(): LogLevel;
	flush(): void;
	clone(name: string, options?: CloneOptions): Logger;
	close(): Promise<void>;
}

export interface LoggerOptions {
	/** Receives sink failures (default: one line on stderr) */
	onError?: ErrorHook;
}

// ─── Base ─────────────────────────────────────────────────────────────────────

export abstract class BaseLogger implements Logger {
	abstract readonly isAsync: boolean;
	protected readonly sinks: LogSink[] = [];
	protected currentLevel: LogLevel = DEFAULT_LOG_LEVEL;
	protected flushLevel: LogLevel = DEFAULT_FLUSH_LEVEL;
	protected closed = false;
	protected readonly onError: ErrorHook;

	constructor(
		protected readonly name: string,
		options: LoggerOptions = {},
	) {
		this.onError = options.onError ?? reportToStderr;
	}

	getName(): string {
		return this.name;
	}

	log(
		category: string,
		level: LogLevel,
		timestampKind: TimestampKind,
		message: string,
		file: string,
		functionName: string,
		line: number,
	): void {
		if (this.closed || !isLevelEnabled(level, this.currentLevel)) return;
		this.logRecord(
			createRecord({ category, level, timestampKind, message, file, functionName, line }),
		);
	}

	abstract logRecord(record: LogRecord): void;
	abstract flush(): void;
	abstract clone(name: string, options?: CloneOptions): Logger;
	abstract close(): Promise<void>;

	addLogSink(sink: LogSink): void {
		this.sinks.push(sink);
	}

	getLogSinks(): readonly LogSink[] {
		return this.sinks;
	}

	setCurrentLogLevel(level: LogLevel): void {
		this.currentLevel = level;
	}

	getCurrentLogLevel(): LogLevel {
		return this.currentLevel;
	}

	setFlushLevel(level: LogLevel): void {
		this.flushLevel = level;
	}

	getFlushLevel(): LogLevel {
		return this.flushLevel;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/** Copy levels (and optionally sinks) onto a freshly constructed logger */
	protected copyInto<T extends BaseLogger>(target: T, options: CloneOptions = {}): T {
		target.currentLevel = this.currentLevel;
		target.flushLevel = this.flushLevel;
		if (options.withSinks) {
			for (const sink of this.sinks) {
				target.addLogSink(sink.clone());
			}
		}
		return target;
	}

	protected flushSinks(): void {
		for (const sink of this.sinks) {
			try {
				sink.flush();
			} catch (err) {
				this.onError(new SinkError(sink.id, 'flush failed', { cause: err }));
			}
		}
	}
}
