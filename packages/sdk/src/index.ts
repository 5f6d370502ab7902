/**
 * @logweave/sdk: contracts shared by loggers and sinks.
 */

export {
	LOG_LEVELS,
	LEVEL_NAMES,
	DEFAULT_LOG_LEVEL,
	DEFAULT_FLUSH_LEVEL,
	isLevelEnabled,
	levelLabel,
	toLogLevel,
	createRecord,
	type LogLevel,
	type LogRecord,
	type LogRecordInput,
	type TimestampKind,
} from './types.js';

export {
	DEFAULT_CONSOLE_PATTERN,
	DEFAULT_FILE_PATTERN,
	formatRecord,
	formatTimestamp,
	threadLabel,
} from './format.js';

export type { LogSink, SinkRegistration } from './sink.js';

export { captureCallSite, parseStackFrame, UNKNOWN_CALL_SITE, type CallSite } from './call-site.js';

export { MemorySink, createTestRecord } from './testing.js';
