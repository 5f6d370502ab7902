/**
 * Test harness for sink and logger authors.
 *
 * Provides an in-memory sink and record helpers for testing loggers
 * and pipelines in isolation.
 */

import { formatRecord } from './format.js';
import type { LogSink } from './sink.js';
import type { LogRecord, LogRecordInput } from './types.js';
import { createRecord } from './types.js';

// ─── Memory Sink ──────────────────────────────────────────────────────────────

/**
 * In-memory sink for testing.
 * Records every write and flush for assertion.
 */
export class MemorySink implements LogSink {
	readonly id: string;
	readonly records: LogRecord[] = [];
	/** Formatted lines, in write order */
	readonly lines: string[] = [];
	/** Lines that were written before the most recent flush */
	flushedLines: string[] = [];
	flushCount = 0;
	private pattern: string;
	private shouldFail = false;

	constructor(id = 'memory', pattern = '%v') {
		this.id = id;
		this.pattern = pattern;
	}

	/** Make subsequent writes throw */
	setFailOnWrite(fail: boolean): void {
		this.shouldFail = fail;
	}

	write(record: LogRecord): void {
		if (this.shouldFail) {
			throw new Error(`Sink ${this.id} write failed`);
		}
		this.records.push(record);
		this.lines.push(formatRecord(record, this.pattern));
	}

	flush(): void {
		this.flushCount++;
		this.flushedLines = [...this.lines];
	}

	getPattern(): string {
		return this.pattern;
	}

	setPattern(pattern: string): void {
		this.pattern = pattern;
	}

	clone(): MemorySink {
		return new MemorySink(this.id, this.pattern);
	}

	/** Messages of every record written so far */
	get messages(): string[] {
		return this.records.map((r) => r.message);
	}
}

// ─── Test Record Factory ──────────────────────────────────────────────────────

/**
 * Create a test record with sensible defaults.
 */
export function createTestRecord(overrides?: Partial<LogRecordInput>): LogRecord {
	return createRecord({
		category: 'test',
		level: 'info',
		timestampKind: 'utc',
		message: 'test message',
		file: 'test.ts',
		functionName: 'testFn',
		line: 1,
		time: new Date(Date.UTC(2024, 0, 15, 10, 30, 45)),
		...overrides,
	});
}
