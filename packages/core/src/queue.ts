/**
 * FIFO task queue shared by producers and a single consumer.
 *
 * push() never waits. Consumers wait through pop(), drain() or ready(),
 * which park on a waiter list; each push wakes exactly one waiter, which
 * re-checks the queue before taking anything.
 */

/** Deferred unit of work. Runs synchronously when executed. */
export type Task = () => void;

export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

export interface LogQueueOptions {
	/** Maximum queued tasks (default: unbounded) */
	capacity?: number;
	/** What to discard when full (default: drop-newest) */
	overflow?: OverflowPolicy;
}

export const DEFAULT_DRAIN_BATCH = 32;

export class LogQueue {
	private readonly tasks: Task[] = [];
	private readonly waiters: Array<() => void> = [];
	private readonly capacity: number;
	private readonly overflow: OverflowPolicy;
	private droppedCount = 0;
	private wakePending = false;

	constructor(options: LogQueueOptions = {}) {
		this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
		this.overflow = options.overflow ?? 'drop-newest';
	}

	/**
	 * Append a task. Returns false only when a full bounded queue rejects it.
	 */
	push(task: Task): boolean {
		if (this.tasks.length >= this.capacity) {
			this.droppedCount++;
			if (this.overflow === 'drop-newest') return false;
			this.tasks.shift();
		}
		this.tasks.push(task);
		this.notifyOne();
		return true;
	}

	/** Wait for a task and remove it. */
	async pop(): Promise<Task> {
		for (;;) {
			const task = this.tryPop();
			if (task) return task;
			await this.wait();
		}
	}

	/** Wait for at least one task, then remove up to `maxItems` in one step. */
	async drain(maxItems = DEFAULT_DRAIN_BATCH): Promise<Task[]> {
		await this.ready();
		return this.take(maxItems);
	}

	/**
	 * Resolves once the queue holds a task, or after wake(). Removes nothing.
	 */
	async ready(): Promise<void> {
		while (this.tasks.length === 0) {
			if (this.wakePending) {
				this.wakePending = false;
				return;
			}
			await this.wait();
		}
	}

	/**
	 * Release a consumer parked in ready() without queueing anything.
	 * Bypasses capacity, so nothing is dropped.
	 */
	wake(): void {
		this.wakePending = true;
		this.notifyOne();
	}

	tryPop(): Task | undefined {
		return this.tasks.shift();
	}

	take(maxItems: number): Task[] {
		return this.tasks.splice(0, Math.max(0, maxItems));
	}

	empty(): boolean {
		return this.tasks.length === 0;
	}

	get size(): number {
		return this.tasks.length;
	}

	/** Tasks discarded by the overflow policy */
	get dropped(): number {
		return this.droppedCount;
	}

	get isFull(): boolean {
		return this.tasks.length >= this.capacity;
	}

	private wait(): Promise<void> {
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	private notifyOne(): void {
		const waiter = this.waiters.shift();
		if (waiter) waiter();
	}
}
