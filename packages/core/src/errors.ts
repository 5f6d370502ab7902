/**
 * Typed errors for configuration and sink failures.
 *
 * Logging calls themselves never throw; these surface from setup paths
 * (config loading, sink construction) and through error hooks.
 */

export class LogweaveError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'LogweaveError';
		this.code = code;
	}
}

export class ConfigError extends LogweaveError {
	readonly field: string;

	constructor(field: string, message: string, options?: { cause?: unknown }) {
		super('CONFIG_INVALID', `${field}: ${message}`, options);
		this.name = 'ConfigError';
		this.field = field;
	}
}

export class SinkError extends LogweaveError {
	readonly sinkId: string;

	constructor(sinkId: string, message: string, options?: { cause?: unknown }) {
		super('SINK_FAILED', `[${sinkId}] ${message}`, options);
		this.name = 'SinkError';
		this.sinkId = sinkId;
	}
}

/** Called with failures the logging pipeline caught and did not propagate */
export type ErrorHook = (error: Error) => void;

/**
 * Default error hook: one line straight to stderr, never back into a logger.
 */
export function reportToStderr(error: Error): void {
	const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
	process.stderr.write(`[logweave] ${error.message}${cause}\n`);
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
