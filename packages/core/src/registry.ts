/**
 * Logger registry: name to logger lookup plus an async-scoped
 * "current logger".
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from './logger.js';

export class LoggerRegistry {
	private readonly loggers = new Map<string, Logger>();
	private readonly currentName = new AsyncLocalStorage<string>();
	private fallbackCurrent: string | null = null;

	/**
	 * Register a logger under its name, replacing any previous one. The most
	 * recently registered logger becomes current outside runWithCurrent().
	 */
	register(logger: Logger): void {
		const name = logger.getName();
		this.loggers.set(name, logger);
		this.fallbackCurrent = name;
	}

	unregister(name: string): void {
		this.loggers.delete(name);
	}

	unregisterAll(): void {
		this.loggers.clear();
		this.fallbackCurrent = null;
	}

	get(name: string): Logger | undefined {
		return this.loggers.get(name);
	}

	has(name: string): boolean {
		return this.loggers.has(name);
	}

	names(): string[] {
		return [...this.loggers.keys()];
	}

	/**
	 * Run `fn` with `name` as the current logger for its whole async
	 * continuation, including work it awaits.
	 */
	runWithCurrent<T>(name: string, fn: () => T): T {
		return this.currentName.run(name, fn);
	}

	/** The current logger, or undefined when it is not registered. */
	current(): Logger | undefined {
		const name = this.currentName.getStore() ?? this.fallbackCurrent;
		return name === null ? undefined : this.loggers.get(name);
	}
}
