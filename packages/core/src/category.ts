/**
 * Category loggers: one per module or subsystem, bound to a category name.
 *
 *   const log = createCategoryLogger('net.http');
 *   log.info('listening on ', port);
 *   log.stream('debug').append('a=', a).append(' b=', b).end();
 *
 * Each call captures its call site and emits through a LogStream, so it
 * reaches the target logger only if that logger exists when it ends.
 */

import { type LogLevel, type TimestampKind, captureCallSite } from '@logweave/sdk';
import { DEFAULT_LOGGER_NAME, getRegistry } from './logging.js';
import type { LoggerRegistry } from './registry.js';
import { LogStream } from './stream.js';

export interface CategoryLoggerOptions {
	/** Target logger (default: the process default logger) */
	loggerName?: string;
	/** Default: local */
	timestampKind?: TimestampKind;
	/** Default: the process-wide registry */
	registry?: LoggerRegistry;
}

export interface CategoryLogger {
	readonly category: string;
	trace(...parts: unknown[]): void;
	debug(...parts: unknown[]): void;
	info(...parts: unknown[]): void;
	warn(...parts: unknown[]): void;
	error(...parts: unknown[]): void;
	fatal(...parts: unknown[]): void;
	/** An open stream at `level`; the caller ends it */
	stream(level: LogLevel): LogStream;
}

export function createCategoryLogger(
	category: string,
	options: CategoryLoggerOptions = {},
): CategoryLogger {
	const loggerName = options.loggerName ?? DEFAULT_LOGGER_NAME;
	const timestampKind = options.timestampKind ?? 'local';

	// skipFrames: wrapper frames between the user's call and open()
	const open = (level: LogLevel, skipFrames: number): LogStream => {
		const site = captureCallSite(skipFrames);
		return new LogStream(options.registry ?? getRegistry(), {
			loggerName,
			category,
			level,
			timestampKind,
			file: site.file,
			functionName: site.functionName,
			line: site.line,
		});
	};

	const emit = (level: LogLevel, parts: unknown[]): void => {
		open(level, 2)
			.append(...parts)
			.end();
	};

	return {
		category,
		trace: (...parts) => emit('trace', parts),
		debug: (...parts) => emit('debug', parts),
		info: (...parts) => emit('info', parts),
		warn: (...parts) => emit('warn', parts),
		error: (...parts) => emit('error', parts),
		fatal: (...parts) => emit('fatal', parts),
		stream: (level) => open(level, 1),
	};
}
