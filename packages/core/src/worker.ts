/**
 * Single consumer for a LogQueue.
 *
 * The loop waits for work, then takes and executes a batch in one
 * synchronous step. A task is never held across an await, so flush()
 * on the caller sees every task that is not yet executed.
 */

import { type ErrorHook, reportToStderr, toError } from './errors.js';
import { DEFAULT_DRAIN_BATCH, type LogQueue, type Task } from './queue.js';

export interface QueueWorkerOptions {
	/** Tasks taken per wake-up, at least 1 (default: 32) */
	batchSize?: number;
	/** Receives errors thrown by tasks (default: one line on stderr) */
	onError?: ErrorHook;
}

function normalizeBatchSize(value: number | undefined): number {
	if (value === undefined || !Number.isFinite(value)) return DEFAULT_DRAIN_BATCH;
	return Math.max(1, Math.floor(value));
}

export class QueueWorker {
	private running = false;
	private generation = 0;
	private loop: Promise<void> | null = null;
	private readonly batchSize: number;
	private readonly onError: ErrorHook;

	constructor(
		private readonly queue: LogQueue,
		options: QueueWorkerOptions = {},
	) {
		this.batchSize = normalizeBatchSize(options.batchSize);
		this.onError = options.onError ?? reportToStderr;
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		const generation = ++this.generation;
		this.loop = this.run(generation);
	}

	/**
	 * Stop the consumer loop and wait for it to exit.
	 * Queued tasks are not drained; use flush() first for that.
	 */
	async stop(): Promise<void> {
		if (!this.running) {
			await this.loop;
			return;
		}
		this.running = false;
		// Wake a consumer parked on an empty queue
		this.queue.wake();
		await this.loop;
	}

	/**
	 * Execute every queued task on the caller. Valid whether or not the
	 * loop is running.
	 */
	flush(): void {
		for (let task = this.queue.tryPop(); task; task = this.queue.tryPop()) {
			this.execute(task);
		}
	}

	get isRunning(): boolean {
		return this.running;
	}

	private async run(generation: number): Promise<void> {
		while (this.isCurrent(generation)) {
			await this.queue.ready();
			for (const task of this.queue.take(this.batchSize)) {
				this.execute(task);
			}
		}
	}

	private isCurrent(generation: number): boolean {
		return this.running && this.generation === generation;
	}

	private execute(task: Task): void {
		try {
			task();
		} catch (err) {
			// A failing task must not stop the loop
			this.onError(toError(err));
		}
	}
}
