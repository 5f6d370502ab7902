/**
 * Logging throughput benchmark.
 *
 * Writes numbered records through a category logger into a file-only
 * logger and times each call. Each mode gets its own registry and manager
 * so a benchmark never touches the process-wide loggers.
 */

import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import { LogManager, LoggerRegistry, createCategoryLogger } from '@logweave/core';

export type BenchmarkMode = 'sync' | 'async';

export interface BenchmarkOptions {
	iterations: number;
	warmup: number;
	/** Directory that receives perf_<mode>.log */
	dir: string;
}

export interface BenchmarkResult {
	mode: BenchmarkMode;
	iterations: number;
	totalMs: number;
	avgUs: number;
	minUs: number;
	maxUs: number;
	/** Records per second over the timed run */
	throughput: number;
	filePath: string;
}

export type LatencySummary = Omit<BenchmarkResult, 'mode' | 'filePath'>;

export const BENCH_CATEGORY = 'performance.test';

export function summarize(latenciesUs: number[], totalMs: number): LatencySummary {
	const iterations = latenciesUs.length;
	if (iterations === 0) {
		return { iterations, totalMs, avgUs: 0, minUs: 0, maxUs: 0, throughput: 0 };
	}
	let sum = 0;
	let minUs = Number.POSITIVE_INFINITY;
	let maxUs = 0;
	for (const t of latenciesUs) {
		sum += t;
		if (t < minUs) minUs = t;
		if (t > maxUs) maxUs = t;
	}
	return {
		iterations,
		totalMs,
		avgUs: sum / iterations,
		minUs,
		maxUs,
		throughput: totalMs > 0 ? (iterations / totalMs) * 1000 : 0,
	};
}

/** Percent by which `candidate` beats `baseline` (positive = better). */
export function improvement(baseline: number, candidate: number, lowerIsBetter: boolean): number {
	if (baseline === 0) return 0;
	const delta = lowerIsBetter ? baseline - candidate : candidate - baseline;
	return (delta / baseline) * 100;
}

export async function runBenchmark(
	mode: BenchmarkMode,
	options: BenchmarkOptions,
): Promise<BenchmarkResult> {
	const registry = new LoggerRegistry();
	const manager = new LogManager(registry);
	const loggerName = `${mode}_perf`;
	const filePath = join(options.dir, `perf_${mode}.log`);

	manager.createLogger(loggerName, mode === 'async');
	manager.addFileSink(loggerName, filePath, { append: false });
	manager.setFilePattern(loggerName, `[${mode.toUpperCase()}] %x [%l] %v`);

	const log = createCategoryLogger(BENCH_CATEGORY, { registry, loggerName });
	const write = (i: number) => {
		log.info('Benchmark message #', i, ' with some additional data for realistic size');
	};

	try {
		for (let i = 0; i < options.warmup; i++) write(i);

		const latencies: number[] = [];
		const start = performance.now();
		for (let i = 0; i < options.iterations; i++) {
			const before = performance.now();
			write(i);
			latencies.push((performance.now() - before) * 1000);
		}
		const totalMs = performance.now() - start;

		return { mode, filePath, ...summarize(latencies, totalMs) };
	} finally {
		await manager.finalize();
	}
}
