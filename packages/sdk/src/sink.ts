/**
 * Sink interface: output destinations for formatted records.
 *
 * A logger owns an ordered set of sinks and hands every accepted record
 * to each of them. Sinks format with their own pattern.
 */

import type { LogRecord } from './types.js';

/**
 * Sink interface.
 *
 * Implement this to add a new output destination. `write` and `flush`
 * are synchronous: a logger relies on a record being in the sink (or in
 * its backing store, after `flush`) by the time the call returns.
 */
export interface LogSink {
	/** Sink kind, e.g. "console" or "file" */
	readonly id: string;

	/** Format and write (or buffer) one record */
	write(record: LogRecord): void;

	/** Push buffered output to the backing store */
	flush(): void;

	getPattern(): string;

	setPattern(pattern: string): void;

	/** New sink of the same kind and settings, sharing no state with this one */
	clone(): LogSink;
}

/**
 * Sink registration: what a sink package exports.
 */
export interface SinkRegistration<TOptions = Record<string, unknown>> {
	/** Sink kind */
	id: string;
	/** Build a sink from options */
	create(options: TOptions): LogSink;
	/** JSON Schema for option validation */
	configSchema?: Record<string, unknown>;
}
