/**
 * logweave bench: Time sync and async file logging.
 */

import { platformLogDirectory } from '@logweave/core';
import type { Command } from 'commander';
import { type BenchmarkMode, type BenchmarkResult, improvement, runBenchmark } from '../bench.js';
import * as output from '../output.js';

interface BenchOptions {
	count: string;
	warmup: string;
	dir?: string;
	mode: string;
}

function parseCount(flag: string, value: string): number {
	const n = Number.parseInt(value, 10);
	if (!Number.isInteger(n) || n < 0) {
		throw new Error(`${flag} must be a non-negative integer, got "${value}"`);
	}
	return n;
}

function printResult(result: BenchmarkResult): void {
	output.blank();
	output.heading(`${result.mode === 'sync' ? 'Sync' : 'Async'} logging`);
	output.field('Iterations', String(result.iterations));
	output.field('Total time', `${result.totalMs.toFixed(2)} ms`);
	output.field('Avg latency', `${result.avgUs.toFixed(3)} us`);
	output.field('Min latency', `${result.minUs.toFixed(3)} us`);
	output.field('Max latency', `${result.maxUs.toFixed(3)} us`);
	output.field('Throughput', `${result.throughput.toFixed(0)} logs/sec`);
	output.verbose(`log file ${result.filePath}`);
}

function signed(percent: number): string {
	return `${percent > 0 ? '+' : ''}${percent.toFixed(1)}%`;
}

export function registerBenchCommand(program: Command): void {
	program
		.command('bench')
		.description('Measure logging latency and throughput into a file')
		.option('--count <n>', 'Timed records per mode', '10000')
		.option('--warmup <n>', 'Untimed records written first', '1000')
		.option('--dir <path>', 'Directory for the benchmark log files')
		.option('--mode <mode>', 'sync, async or both', 'both')
		.action(async (opts: BenchOptions) => {
			try {
				const iterations = parseCount('--count', opts.count);
				const warmup = parseCount('--warmup', opts.warmup);
				if (opts.mode !== 'sync' && opts.mode !== 'async' && opts.mode !== 'both') {
					throw new Error(`--mode must be sync, async or both, got "${opts.mode}"`);
				}
				const modes: BenchmarkMode[] = opts.mode === 'both' ? ['sync', 'async'] : [opts.mode];
				const dir = opts.dir ?? platformLogDirectory();

				const results: BenchmarkResult[] = [];
				for (const mode of modes) {
					const spin = output.spinner(`Running ${mode} benchmark (${iterations} records)...`);
					const result = await runBenchmark(mode, { iterations, warmup, dir });
					spin.succeed(`${mode} benchmark done`);
					results.push(result);
				}

				if (output.isJsonMode()) {
					output.json(results);
					return;
				}

				for (const result of results) printResult(result);

				const sync = results.find((r) => r.mode === 'sync');
				const queued = results.find((r) => r.mode === 'async');
				if (sync && queued) {
					output.blank();
					output.heading('Async vs sync');
					output.field('Latency', signed(improvement(sync.avgUs, queued.avgUs, true)));
					output.field('Throughput', signed(improvement(sync.throughput, queued.throughput, false)));
				}
			} catch (err) {
				output.error(`Benchmark failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
