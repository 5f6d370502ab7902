import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemorySink } from '@logweave/sdk';
import { ConsoleSink } from '@logweave/sink-console';
import { FileSink } from '@logweave/sink-file';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LogManager } from '../manager.js';
import { LoggerRegistry } from '../registry.js';

describe('LogManager', () => {
	let registry: LoggerRegistry;
	let manager: LogManager;
	let tempDir: string;

	beforeEach(async () => {
		registry = new LoggerRegistry();
		manager = new LogManager(registry);
		tempDir = await mkdtemp(join(tmpdir(), 'logweave-manager-'));
	});

	afterEach(async () => {
		await manager.finalize();
		await rm(tempDir, { recursive: true, force: true });
	});

	it('creates and registers sync and async loggers', () => {
		const sync = manager.createLogger('sync');
		const async = manager.createLogger('async', true);

		expect(sync.isAsync).toBe(false);
		expect(async.isAsync).toBe(true);
		expect(registry.get('sync')).toBe(sync);
		expect(manager.getLogger('async')).toBe(async);
		expect(manager.isLoggerAsync('async')).toBe(true);
		expect(manager.isLoggerAsync('sync')).toBe(false);
		expect(manager.loggerNames()).toEqual(['sync', 'async']);
	});

	it('returns the existing logger for a known name', () => {
		const first = manager.createLogger('app');
		const second = manager.createLogger('app', true);
		expect(second).toBe(first);
		expect(manager.isLoggerAsync('app')).toBe(false);
	});

	it('reports unknown loggers as sync', () => {
		expect(manager.isLoggerAsync('nope')).toBe(false);
		expect(manager.getLogger('nope')).toBeUndefined();
	});

	it('attaches console and file sinks', () => {
		manager.createLogger('app');
		manager.addConsoleSink('app', { stream: 'stderr' });
		manager.addFileSink('app', join(tempDir, 'app.log'));

		const sinks = manager.getLogger('app')?.getLogSinks() ?? [];
		expect(sinks).toHaveLength(2);
		expect(sinks[0]).toBeInstanceOf(ConsoleSink);
		expect(sinks[1]).toBeInstanceOf(FileSink);
	});

	it('sets patterns only on sinks of the matching kind', () => {
		const logger = manager.createLogger('app');
		manager.addConsoleSink('app');
		manager.addFileSink('app', join(tempDir, 'app.log'));
		const other = new MemorySink('other', '%v');
		logger.addLogSink(other);

		manager.setConsolePattern('app', '[console] %v');
		manager.setFilePattern('app', '[file] %v');

		const patterns = logger.getLogSinks().map((s) => s.getPattern());
		expect(patterns).toEqual(['[console] %v', '[file] %v', '%v']);
	});

	it('sets levels', () => {
		const logger = manager.createLogger('app');
		manager.setLogLevel('app', 'trace');
		manager.setFlushLevel('app', 'info');
		expect(logger.getCurrentLogLevel()).toBe('trace');
		expect(logger.getFlushLevel()).toBe('info');
	});

	it('ignores operations on unknown loggers', () => {
		expect(() => {
			manager.addConsoleSink('ghost');
			manager.addFileSink('ghost', join(tempDir, 'ghost.log'));
			manager.setConsolePattern('ghost', '%v');
			manager.setFilePattern('ghost', '%v');
			manager.setLogLevel('ghost', 'debug');
			manager.setFlushLevel('ghost', 'debug');
		}).not.toThrow();
		expect(manager.loggerNames()).toEqual([]);
	});

	it('finalize flushes, unregisters and closes every logger', async () => {
		const logger = manager.createLogger('app', true);
		const sink = new MemorySink();
		logger.addLogSink(sink);
		logger.log('test', 'info', 'utc', 'queued', 'main.ts', 'run', 1);
		expect(sink.records).toHaveLength(0);

		await manager.finalize();

		expect(sink.messages).toEqual(['queued']);
		expect(registry.get('app')).toBeUndefined();
		expect(manager.loggerNames()).toEqual([]);

		logger.log('test', 'fatal', 'utc', 'after', 'main.ts', 'run', 2);
		expect(sink.records).toHaveLength(1);
	});

	it('finalize leaves a replacement registered under the same name', async () => {
		manager.createLogger('app');
		const replacement = new LogManager(registry).createLogger('app');

		await manager.finalize();
		expect(registry.get('app')).toBe(replacement);
		await replacement.close();
	});
});
