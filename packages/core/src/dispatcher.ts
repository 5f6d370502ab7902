/**
 * Dispatcher: hands sink writes to a queue worker.
 *
 * dispatch() captures the sink array by reference and the record by value
 * and returns at once. flush() runs every queued write on the caller, then
 * flushes the sinks.
 */

import type { LogRecord, LogSink } from '@logweave/sdk';
import { type ErrorHook, SinkError, reportToStderr } from './errors.js';
import { LogQueue, type OverflowPolicy } from './queue.js';
import { QueueWorker } from './worker.js';

/** `drain` executes queued writes on the caller instead of discarding any */
export type DispatcherOverflow = OverflowPolicy | 'drain';

export interface DispatcherOptions {
	/** Queued writes before the overflow policy applies (default: unbounded) */
	capacity?: number;
	/** Default: drain */
	overflow?: DispatcherOverflow;
	/** Writes executed per worker wake-up */
	batchSize?: number;
	/** Receives sink and task failures (default: one line on stderr) */
	onError?: ErrorHook;
}

export class Dispatcher {
	private readonly queue: LogQueue;
	private readonly worker: QueueWorker;
	private readonly capacity: number;
	private readonly spillToCaller: boolean;
	private readonly onError: ErrorHook;
	private closed = false;

	constructor(options: DispatcherOptions = {}) {
		const overflow = options.overflow ?? 'drain';
		this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
		this.spillToCaller = overflow === 'drain';
		this.onError = options.onError ?? reportToStderr;
		this.queue = new LogQueue(
			overflow === 'drain' ? {} : { capacity: options.capacity, overflow },
		);
		this.worker = new QueueWorker(this.queue, {
			batchSize: options.batchSize,
			onError: this.onError,
		});
		this.worker.start();
	}

	dispatch(sinks: readonly LogSink[], record: LogRecord): void {
		if (this.closed) return;
		if (this.spillToCaller && this.queue.size >= this.capacity) {
			this.worker.flush();
		}
		const snapshot: LogRecord = { ...record };
		this.queue.push(() => {
			for (const sink of sinks) {
				this.writeTo(sink, snapshot);
			}
		});
	}

	flush(sinks: readonly LogSink[]): void {
		this.worker.flush();
		for (const sink of sinks) {
			try {
				sink.flush();
			} catch (err) {
				this.onError(new SinkError(sink.id, 'flush failed', { cause: err }));
			}
		}
	}

	/** Stop the worker. Queued writes stay queued; flush first to keep them. */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.worker.stop();
	}

	get pending(): number {
		return this.queue.size;
	}

	get dropped(): number {
		return this.queue.dropped;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	private writeTo(sink: LogSink, record: LogRecord): void {
		try {
			sink.write(record);
		} catch (err) {
			// One failing sink must not starve the rest
			this.onError(new SinkError(sink.id, 'write failed', { cause: err }));
		}
	}
}
