/**
 * Console sink: one colored line per record.
 *
 * Writes to process.stdout by default; pass `stream: 'stderr'` to keep
 * stdout clean for program output.
 */

import type { LogRecord, LogSink } from '@logweave/sdk';
import { DEFAULT_CONSOLE_PATTERN, formatRecord } from '@logweave/sdk';
import { colorize } from './colors.js';

export interface ConsoleSinkOptions {
	/** Output stream (default: stdout) */
	stream?: 'stdout' | 'stderr';
	/** Pattern (default: "%x [%l] %v") */
	pattern?: string;
	/** Color lines by level; when omitted, follows color detection */
	color?: boolean;
}

export class ConsoleSink implements LogSink {
	readonly id = 'console';
	private pattern: string;
	private readonly stream: 'stdout' | 'stderr';
	private readonly color: boolean | undefined;

	constructor(options: ConsoleSinkOptions = {}) {
		this.pattern = options.pattern ?? DEFAULT_CONSOLE_PATTERN;
		this.stream = options.stream ?? 'stdout';
		this.color = options.color;
	}

	write(record: LogRecord): void {
		const formatted = formatRecord(record, this.pattern);
		const line = this.color === false ? formatted : colorize(record.level, formatted);
		const out = this.stream === 'stderr' ? process.stderr : process.stdout;
		out.write(`${line}\n`);
	}

	flush(): void {
		// Console output is unbuffered
	}

	getPattern(): string {
		return this.pattern;
	}

	setPattern(pattern: string): void {
		this.pattern = pattern;
	}

	clone(): ConsoleSink {
		return new ConsoleSink({ stream: this.stream, color: this.color, pattern: this.pattern });
	}
}
