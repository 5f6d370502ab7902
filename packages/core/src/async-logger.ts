/**
 * AsyncLogger: queues sink writes on a dispatcher.
 *
 * Records below the flush level return immediately; the worker writes them
 * later. A record at or above the flush level drains the queue and flushes
 * every sink before log() returns.
 */

import { type LogRecord, isLevelEnabled } from '@logweave/sdk';
import { Dispatcher, type DispatcherOptions } from './dispatcher.js';
import { BaseLogger, type CloneOptions, type LoggerOptions } from './logger.js';

export interface AsyncLoggerOptions extends LoggerOptions {
	dispatcher?: Omit<DispatcherOptions, 'onError'>;
}

export class AsyncLogger extends BaseLogger {
	readonly isAsync = true;
	private readonly dispatcher: Dispatcher;

	constructor(name: string, private readonly options: AsyncLoggerOptions = {}) {
		super(name, options);
		this.dispatcher = new Dispatcher({ ...options.dispatcher, onError: this.onError });
	}

	logRecord(record: LogRecord): void {
		if (this.closed || !isLevelEnabled(record.level, this.currentLevel)) return;
		this.dispatcher.dispatch(this.sinks, record);
		if (isLevelEnabled(record.level, this.flushLevel)) {
			this.dispatcher.flush(this.sinks);
		}
	}

	flush(): void {
		this.dispatcher.flush(this.sinks);
	}

	clone(name: string, options?: CloneOptions): AsyncLogger {
		return this.copyInto(new AsyncLogger(name, this.options), options);
	}

	/**
	 * Execute everything still queued, flush the sinks, then stop the
	 * worker. No queued write runs after this resolves.
	 */
	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.dispatcher.flush(this.sinks);
		await this.dispatcher.close();
	}

	/** Writes waiting for the worker */
	get pending(): number {
		return this.dispatcher.pending;
	}

	get dropped(): number {
		return this.dispatcher.dropped;
	}
}
