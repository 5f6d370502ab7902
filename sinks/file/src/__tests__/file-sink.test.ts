import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTestRecord } from '@logweave/sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileSink } from '../file-sink.js';
import { register } from '../index.js';

describe('FileSink', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logweave-file-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('creates missing parent directories', () => {
		const path = join(tempDir, 'nested', 'deeper', 'app.log');
		new FileSink(path);
		expect(existsSync(path)).toBe(true);
	});

	it('buffers lines until flush', () => {
		const path = join(tempDir, 'app.log');
		const sink = new FileSink(path, { pattern: '%l %v' });

		sink.write(createTestRecord({ message: 'first' }));
		expect(readFileSync(path, 'utf-8')).toBe('');
		expect(sink.pending).toBe('INFO first\n'.length);

		sink.flush();
		expect(readFileSync(path, 'utf-8')).toBe('INFO first\n');
		expect(sink.pending).toBe(0);
	});

	it('keeps write order across flushes', () => {
		const path = join(tempDir, 'app.log');
		const sink = new FileSink(path, { pattern: '%v' });

		sink.write(createTestRecord({ message: 'a' }));
		sink.write(createTestRecord({ message: 'b' }));
		sink.flush();
		sink.write(createTestRecord({ message: 'c' }));
		sink.flush();

		expect(readFileSync(path, 'utf-8')).toBe('a\nb\nc\n');
	});

	it('uses the default file pattern', () => {
		const path = join(tempDir, 'app.log');
		const sink = new FileSink(path);
		expect(sink.getPattern()).toBe('%x [%l] [%!] %v');

		sink.write(createTestRecord({ message: 'hello' }));
		sink.flush();
		expect(readFileSync(path, 'utf-8')).toBe('2024-01-15 10:30:45 [INFO] [testFn] hello\n');
	});

	it('flushes on its own once the buffer passes the high-water mark', () => {
		const path = join(tempDir, 'app.log');
		const sink = new FileSink(path, { pattern: '%v', highWaterMark: 8 });

		sink.write(createTestRecord({ message: 'abc' }));
		expect(readFileSync(path, 'utf-8')).toBe('');

		sink.write(createTestRecord({ message: 'defgh' }));
		expect(readFileSync(path, 'utf-8')).toBe('abc\ndefgh\n');
	});

	it('appends to an existing file by default', () => {
		const path = join(tempDir, 'app.log');
		writeFileSync(path, 'previous\n');
		const sink = new FileSink(path, { pattern: '%v' });
		sink.write(createTestRecord({ message: 'next' }));
		sink.flush();
		expect(readFileSync(path, 'utf-8')).toBe('previous\nnext\n');
		expect(sink.isAppend()).toBe(true);
	});

	it('truncates when append is false', () => {
		const path = join(tempDir, 'app.log');
		writeFileSync(path, 'previous\n');
		const sink = new FileSink(path, { append: false, pattern: '%v' });
		expect(readFileSync(path, 'utf-8')).toBe('');
		sink.write(createTestRecord({ message: 'fresh' }));
		sink.flush();
		expect(readFileSync(path, 'utf-8')).toBe('fresh\n');
	});

	it('reports an empty path through onError and does not throw on use', () => {
		const onError = vi.fn();
		const sink = new FileSink('', { onError });
		expect(onError).toHaveBeenCalledTimes(1);
		expect(onError.mock.calls[0][0].message).toBe('No log file specified.');

		sink.write(createTestRecord());
		expect(() => sink.flush()).not.toThrow();
	});

	it('reports an unusable path once and caps the lines it keeps', () => {
		const onError = vi.fn();
		const sink = new FileSink('', { pattern: '%v', highWaterMark: 10, maxBufferedLines: 100, onError });

		for (let i = 0; i < 1000; i++) sink.write(createTestRecord({ message: 'x' }));
		sink.flush();

		expect(onError).toHaveBeenCalledTimes(1);
		expect(sink.dropped).toBe(900);
		expect(sink.pending).toBe(200);
	});

	it('writes retained lines once the path becomes usable', () => {
		const blocker = join(tempDir, 'blocker');
		const path = join(blocker, 'app.log');
		writeFileSync(blocker, 'a file, not a directory');
		const onError = vi.fn();
		const sink = new FileSink(path, { pattern: '%v', onError });

		sink.write(createTestRecord({ message: 'kept' }));
		sink.flush();
		expect(onError).toHaveBeenCalledTimes(1);

		rmSync(blocker);
		sink.flush();
		expect(readFileSync(path, 'utf-8')).toBe('kept\n');
		expect(sink.pending).toBe(0);
		expect(onError).toHaveBeenCalledTimes(1);
	});

	it('reports a path it cannot open', () => {
		const blocker = join(tempDir, 'blocker');
		writeFileSync(blocker, 'a file, not a directory');
		const onError = vi.fn();
		const sink = new FileSink(join(blocker, 'app.log'), { onError });
		expect(onError).toHaveBeenCalled();
		expect(onError.mock.calls[0][0].message).toBe(`Couldn't open file ${join(blocker, 'app.log')} for write.`);
		expect(sink.getFileName()).toBe(join(blocker, 'app.log'));
	});

	it('clones into an appending sink on the same file', () => {
		const path = join(tempDir, 'app.log');
		const sink = new FileSink(path, { pattern: '%v' });
		sink.write(createTestRecord({ message: 'original' }));
		sink.flush();

		const copy = sink.clone();
		expect(copy).not.toBe(sink);
		expect(copy.getFileName()).toBe(path);
		copy.write(createTestRecord({ message: 'copy' }));
		copy.flush();

		expect(readFileSync(path, 'utf-8')).toBe('original\ncopy\n');
	});
});

describe('register', () => {
	it('advertises the file sink and builds one from its config', async () => {
		const tempDir = await mkdtemp(join(tmpdir(), 'logweave-register-'));
		try {
			const registration = register();
			expect(registration.id).toBe('file');
			expect(registration.configSchema?.required).toEqual(['path']);

			const path = join(tempDir, 'app.log');
			const sink = registration.create({ path, append: false, pattern: '%l %v' });
			expect(sink).toBeInstanceOf(FileSink);
			expect(sink.getPattern()).toBe('%l %v');

			sink.write(createTestRecord({ message: 'registered' }));
			sink.flush();
			expect(readFileSync(path, 'utf-8')).toBe('INFO registered\n');
		} finally {
			await rm(tempDir, { recursive: true, force: true });
		}
	});
});
