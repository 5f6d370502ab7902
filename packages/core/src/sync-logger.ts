/**
 * SyncLogger: writes every record on the caller.
 */

import { type LogRecord, isLevelEnabled } from '@logweave/sdk';
import { SinkError } from './errors.js';
import { BaseLogger, type CloneOptions, type LoggerOptions } from './logger.js';

export class SyncLogger extends BaseLogger {
	readonly isAsync = false;

	constructor(name: string, private readonly options: LoggerOptions = {}) {
		super(name, options);
	}

	/**
	 * Write to every sink in order, then flush them all when the record is
	 * at or above the flush level. Runs to completion without yielding.
	 */
	logRecord(record: LogRecord): void {
		if (this.closed || !isLevelEnabled(record.level, this.currentLevel)) return;
		for (const sink of this.sinks) {
			try {
				sink.write(record);
			} catch (err) {
				this.onError(new SinkError(sink.id, 'write failed', { cause: err }));
			}
		}
		if (isLevelEnabled(record.level, this.flushLevel)) {
			this.flushSinks();
		}
	}

	flush(): void {
		this.flushSinks();
	}

	clone(name: string, options?: CloneOptions): SyncLogger {
		return this.copyInto(new SyncLogger(name, this.options), options);
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.flushSinks();
		this.closed = true;
	}
}
