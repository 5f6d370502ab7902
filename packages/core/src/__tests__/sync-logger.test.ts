import { readFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type LogRecord, MemorySink } from '@logweave/sdk';
import { FileSink } from '@logweave/sink-file';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SinkError } from '../errors.js';
import { SyncLogger } from '../sync-logger.js';

class OrderedSink extends MemorySink {
	constructor(
		id: string,
		private readonly order: string[],
	) {
		super(id);
	}

	override write(record: LogRecord): void {
		this.order.push(this.id);
		super.write(record);
	}
}

function info(logger: SyncLogger, message: string): void {
	logger.log('test', 'info', 'utc', message, 'main.ts', 'run', 1);
}

describe('SyncLogger', () => {
	it('starts at info with flush level error', () => {
		const logger = new SyncLogger('app');
		expect(logger.getName()).toBe('app');
		expect(logger.getCurrentLogLevel()).toBe('info');
		expect(logger.getFlushLevel()).toBe('error');
		expect(logger.isAsync).toBe(false);
	});

	it('builds a record from the log arguments', () => {
		const logger = new SyncLogger('app');
		const sink = new MemorySink();
		logger.addLogSink(sink);

		logger.log('net', 'warn', 'utc', 'slow response', 'client.ts', 'fetchAll', 42);

		expect(sink.records).toHaveLength(1);
		const [record] = sink.records;
		expect(record.category).toBe('net');
		expect(record.level).toBe('warn');
		expect(record.timestampKind).toBe('utc');
		expect(record.message).toBe('slow response');
		expect(record.file).toBe('client.ts');
		expect(record.functionName).toBe('fetchAll');
		expect(record.line).toBe(42);
		expect(record.time).toBeInstanceOf(Date);
	});

	it('drops records below the current level', () => {
		const logger = new SyncLogger('app');
		const sink = new MemorySink();
		logger.addLogSink(sink);
		logger.setCurrentLogLevel('warn');

		info(logger, 'hidden');
		logger.log('test', 'warn', 'utc', 'shown', 'main.ts', 'run', 1);
		logger.log('test', 'fatal', 'utc', 'also shown', 'main.ts', 'run', 1);

		expect(sink.messages).toEqual(['shown', 'also shown']);
	});

	it('writes to sinks in the order they were added', () => {
		const order: string[] = [];
		const logger = new SyncLogger('app');
		logger.addLogSink(new OrderedSink('first', order));
		logger.addLogSink(new OrderedSink('second', order));

		info(logger, 'one');
		info(logger, 'two');

		expect(order).toEqual(['first', 'second', 'first', 'second']);
		expect(logger.getLogSinks().map((s) => s.id)).toEqual(['first', 'second']);
	});

	it('flushes every sink at or above the flush level', () => {
		const logger = new SyncLogger('app');
		const first = new MemorySink('first');
		const second = new MemorySink('second');
		logger.addLogSink(first);
		logger.addLogSink(second);
		logger.setFlushLevel('warn');

		info(logger, 'quiet');
		expect(first.flushCount).toBe(0);

		logger.log('test', 'warn', 'utc', 'loud', 'main.ts', 'run', 1);
		expect(first.flushCount).toBe(1);
		expect(second.flushedLines).toEqual(['quiet', 'loud']);
	});

	it('flush() flushes all sinks', () => {
		const logger = new SyncLogger('app');
		const sink = new MemorySink();
		logger.addLogSink(sink);
		logger.flush();
		expect(sink.flushCount).toBe(1);
	});

	it('reports a failing sink and still writes to the rest', () => {
		const onError = vi.fn();
		const logger = new SyncLogger('app', { onError });
		const bad = new MemorySink('bad');
		bad.setFailOnWrite(true);
		const good = new MemorySink('good');
		logger.addLogSink(bad);
		logger.addLogSink(good);

		info(logger, 'x');

		expect(good.messages).toEqual(['x']);
		expect(onError).toHaveBeenCalledTimes(1);
		expect(onError.mock.calls[0][0]).toBeInstanceOf(SinkError);
	});

	it('logs nothing with no sinks', () => {
		const logger = new SyncLogger('app');
		expect(() => info(logger, 'nowhere')).not.toThrow();
	});

	describe('clone', () => {
		it('copies levels and starts without sinks', () => {
			const logger = new SyncLogger('app');
			logger.setCurrentLogLevel('debug');
			logger.setFlushLevel('warn');
			logger.addLogSink(new MemorySink());

			const copy = logger.clone('copy');
			expect(copy.getName()).toBe('copy');
			expect(copy.getCurrentLogLevel()).toBe('debug');
			expect(copy.getFlushLevel()).toBe('warn');
			expect(copy.getLogSinks()).toHaveLength(0);
			expect(copy.isAsync).toBe(false);
		});

		it('clones sinks on request', () => {
			const logger = new SyncLogger('app');
			const sink = new MemorySink('mem', '%l %v');
			logger.addLogSink(sink);

			const copy = logger.clone('copy', { withSinks: true });
			const [cloned] = copy.getLogSinks();
			expect(cloned).not.toBe(sink);
			expect(cloned.getPattern()).toBe('%l %v');

			info(copy, 'only in copy');
			expect(sink.records).toHaveLength(0);
		});
	});

	it('close flushes once and silences the logger', async () => {
		const logger = new SyncLogger('app');
		const sink = new MemorySink();
		logger.addLogSink(sink);

		await logger.close();
		await logger.close();
		info(logger, 'too late');

		expect(sink.flushCount).toBe(1);
		expect(sink.records).toHaveLength(0);
		expect(logger.isClosed).toBe(true);
	});

	describe('with a file sink', () => {
		let tempDir: string;

		beforeEach(async () => {
			tempDir = await mkdtemp(join(tmpdir(), 'logweave-sync-'));
		});

		afterEach(async () => {
			await rm(tempDir, { recursive: true, force: true });
		});

		it('makes records visible on reaching the flush level', () => {
			const path = join(tempDir, 'app.log');
			const logger = new SyncLogger('app');
			logger.addLogSink(new FileSink(path, { pattern: '%v' }));
			logger.setFlushLevel('warn');

			info(logger, 'a');
			expect(readFileSync(path, 'utf-8')).toBe('');

			logger.log('test', 'warn', 'utc', 'b', 'main.ts', 'run', 2);
			expect(readFileSync(path, 'utf-8')).toBe('a\nb\n');

			logger.flush();
			expect(readFileSync(path, 'utf-8')).toBe('a\nb\n');
		});

		it('keeps each line whole with several async producers', async () => {
			const path = join(tempDir, 'app.log');
			const logger = new SyncLogger('app');
			logger.addLogSink(new FileSink(path, { pattern: '%v', highWaterMark: 256 }));
			const payload = 'x'.repeat(40);

			const producer = async (id: number) => {
				for (let i = 0; i < 100; i++) {
					info(logger, `p${id}:${i}:${payload}`);
					await new Promise<void>((resolve) => setImmediate(resolve));
				}
			};
			await Promise.all([0, 1, 2, 3].map(producer));
			logger.flush();

			const lines = readFileSync(path, 'utf-8').split('\n');
			expect(lines.pop()).toBe('');
			expect(lines).toHaveLength(400);
			for (const line of lines) {
				expect(line).toMatch(/^p[0-3]:\d+:x{40}$/);
			}
			for (const id of [0, 1, 2, 3]) {
				const own = lines.filter((line) => line.startsWith(`p${id}:`));
				expect(own).toEqual(Array.from({ length: 100 }, (_, i) => `p${id}:${i}:${payload}`));
			}
		});
	});
});
