/**
 * LogStream: accumulates a message and emits it once on end().
 */

import { type LogLevel, type TimestampKind, isLevelEnabled } from '@logweave/sdk';
import type { LoggerRegistry } from './registry.js';

export interface LogStreamTarget {
	loggerName: string;
	category: string;
	level: LogLevel;
	timestampKind: TimestampKind;
	file: string;
	functionName: string;
	line: number;
}

export class LogStream {
	private text = '';
	private ended = false;

	constructor(
		private readonly registry: LoggerRegistry,
		private readonly target: LogStreamTarget,
	) {}

	/** Append values to the message, without separators. */
	append(...values: unknown[]): this {
		if (this.ended) return this;
		for (const value of values) {
			this.text += stringifyValue(value);
		}
		return this;
	}

	get message(): string {
		return this.text;
	}

	get isEnded(): boolean {
		return this.ended;
	}

	/**
	 * Emit the message to the named logger when it exists and the level
	 * passes its threshold. Later calls do nothing.
	 */
	end(): void {
		if (this.ended) return;
		this.ended = true;

		const logger = this.registry.get(this.target.loggerName);
		if (!logger) return;
		const { category, level, timestampKind, file, functionName, line } = this.target;
		if (!isLevelEnabled(level, logger.getCurrentLogLevel())) return;
		logger.log(category, level, timestampKind, this.text, file, functionName, line);
	}
}

// ─── Value formatting ─────────────────────────────────────────────────────────

export function stringifyValue(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value instanceof Error) return `${value.name}: ${value.message}`;
	if (value === null || typeof value !== 'object') return String(value);
	return safeJson(value);
}

function safeJson(value: object): string {
	const seen = new WeakSet<object>();
	try {
		const json = JSON.stringify(value, (_key, v: unknown) => {
			if (typeof v === 'bigint') return v.toString();
			if (typeof v === 'object' && v !== null) {
				if (seen.has(v)) return '[Circular]';
				seen.add(v);
			}
			return v;
		});
		return json ?? String(value);
	} catch {
		return String(value);
	}
}
