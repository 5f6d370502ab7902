/**
 * File sink: buffers formatted lines and appends them on flush.
 *
 * Lines stay in memory until flush() (or until the buffer passes
 * `highWaterMark` bytes), so a reader of the file sees a record only
 * after its logger flushed. The parent directory is created on open.
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogRecord, LogSink } from '@logweave/sdk';
import { DEFAULT_FILE_PATTERN, formatRecord } from '@logweave/sdk';

export interface FileSinkOptions {
	/** Append to an existing file (default: true); false truncates on open */
	append?: boolean;
	/** Pattern (default: "%x [%l] [%!] %v") */
	pattern?: string;
	/** Buffered bytes that trigger a flush on write (default: 64 KiB) */
	highWaterMark?: number;
	/** Lines kept while the file is unwritable; the oldest go first (default: 10000) */
	maxBufferedLines?: number;
	/** Called instead of the stderr fallback when the file cannot be opened or written */
	onError?: (error: Error) => void;
}

const DEFAULT_HIGH_WATER_MARK = 64 * 1024;
const DEFAULT_MAX_BUFFERED_LINES = 10_000;

export class FileSink implements LogSink {
	readonly id = 'file';
	readonly filePath: string;
	readonly append: boolean;
	private pattern: string;
	private readonly highWaterMark: number;
	private readonly maxBufferedLines: number;
	private readonly onError: (error: Error) => void;
	private buffer: string[] = [];
	private bufferedBytes = 0;
	private droppedLines = 0;
	private opened = false;
	/** Set after a failure is reported; cleared by the next successful open or write */
	private failing = false;

	constructor(filePath: string, options: FileSinkOptions = {}) {
		this.filePath = filePath;
		this.append = options.append ?? true;
		this.pattern = options.pattern ?? DEFAULT_FILE_PATTERN;
		this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
		this.maxBufferedLines = Math.max(1, options.maxBufferedLines ?? DEFAULT_MAX_BUFFERED_LINES);
		this.onError = options.onError ?? reportToStderr;
		this.open();
	}

	private open(): void {
		if (!this.filePath) {
			this.fail(new Error('No log file specified.'));
			return;
		}
		try {
			const dir = dirname(this.filePath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}
			if (this.append) {
				appendFileSync(this.filePath, '');
			} else {
				writeFileSync(this.filePath, '');
			}
			this.opened = true;
			this.failing = false;
		} catch (err) {
			this.fail(new Error(`Couldn't open file ${this.filePath} for write.`, { cause: err }));
		}
	}

	private fail(error: Error): void {
		if (this.failing) return;
		this.failing = true;
		this.onError(error);
	}

	write(record: LogRecord): void {
		const line = `${formatRecord(record, this.pattern)}\n`;
		this.buffer.push(line);
		this.bufferedBytes += Buffer.byteLength(line);
		if (this.buffer.length > this.maxBufferedLines) {
			const oldest = this.buffer.shift();
			if (oldest !== undefined) {
				this.bufferedBytes -= Buffer.byteLength(oldest);
				this.droppedLines++;
			}
		}
		// An unopened sink retries only on an explicit flush()
		if (this.opened && this.bufferedBytes >= this.highWaterMark) {
			this.flush();
		}
	}

	flush(): void {
		if (this.buffer.length === 0) return;
		if (!this.opened) {
			this.open();
			if (!this.opened) return;
		}
		const chunk = this.buffer.join('');
		try {
			appendFileSync(this.filePath, chunk);
			this.buffer = [];
			this.bufferedBytes = 0;
			this.failing = false;
		} catch (err) {
			// Keep the lines; the next flush retries them
			this.fail(new Error(`Failed to write ${this.filePath}`, { cause: err }));
		}
	}

	/** Bytes waiting for the next flush */
	get pending(): number {
		return this.bufferedBytes;
	}

	/** Lines discarded because the buffer was full */
	get dropped(): number {
		return this.droppedLines;
	}

	getPattern(): string {
		return this.pattern;
	}

	setPattern(pattern: string): void {
		this.pattern = pattern;
	}

	getFileName(): string {
		return this.filePath;
	}

	isAppend(): boolean {
		return this.append;
	}

	clone(): FileSink {
		// A clone always appends, so it never truncates what this sink wrote
		return new FileSink(this.filePath, {
			append: true,
			pattern: this.pattern,
			highWaterMark: this.highWaterMark,
			maxBufferedLines: this.maxBufferedLines,
			onError: this.onError,
		});
	}
}

function reportToStderr(error: Error): void {
	const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
	process.stderr.write(`[logweave:file] ${error.message}${cause}\n`);
}
