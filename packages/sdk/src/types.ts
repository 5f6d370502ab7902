/**
 * Core record types shared by every logweave package.
 */

// ─── Log levels ───────────────────────────────────────────────────────────────

/** Severity ordinals. Filtering and flush gating compare these numbers. */
export const LOG_LEVELS = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	fatal: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/** All levels, lowest severity first. */
export const LEVEL_NAMES: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_LABELS: Record<LogLevel, string> = {
	trace: 'TRACE',
	debug: 'DEBUG',
	info: 'INFO',
	warn: 'WARN',
	error: 'ERROR',
	fatal: 'FATAL',
};

/** Level a new logger starts at. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/** Level at or above which a new logger flushes its sinks after writing. */
export const DEFAULT_FLUSH_LEVEL: LogLevel = 'error';

/**
 * True when `level` is at or above `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
	return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}

/** Upper-case label used in formatted output (`INFO`). */
export function levelLabel(level: LogLevel): string {
	return LEVEL_LABELS[level];
}

/**
 * Parse a level name, case-insensitively. Returns undefined for anything else.
 */
export function toLogLevel(value: unknown): LogLevel | undefined {
	if (typeof value !== 'string') return undefined;
	const normalized = value.trim().toLowerCase();
	return LEVEL_NAMES.find((name) => name === normalized);
}

// ─── Records ──────────────────────────────────────────────────────────────────

/** Which clock `%x` renders. */
export type TimestampKind = 'local' | 'utc';

/**
 * One log event. Created when a message is emitted and consumed once
 * by the sinks of a single logger.
 */
export interface LogRecord {
	/** Category the caller logs under (e.g. "renderer", "net.http") */
	category: string;
	level: LogLevel;
	timestampKind: TimestampKind;
	/** Fully rendered message text */
	message: string;
	/** Source file of the call site, '' when unknown */
	file: string;
	/** Function of the call site, '' when unknown */
	functionName: string;
	/** Line of the call site, 0 when unknown */
	line: number;
	/** When the event was emitted */
	time: Date;
}

/** Fields a caller supplies; `time` defaults to now. */
export type LogRecordInput = Omit<LogRecord, 'time'> & { time?: Date };

/** Build a record, stamping the current time unless one is given. */
export function createRecord(input: LogRecordInput): LogRecord {
	return {
		category: input.category,
		level: input.level,
		timestampKind: input.timestampKind,
		message: input.message,
		file: input.file,
		functionName: input.functionName,
		line: input.line,
		time: input.time ?? new Date(),
	};
}
