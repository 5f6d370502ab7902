/**
 * logweave command line.
 *
 *   logweave [--json] [--quiet] [--verbose] <command>
 */

import { Command } from 'commander';
import { registerBenchCommand } from './commands/bench.js';
import { registerDemoCommand } from './commands/demo.js';
import { registerPathsCommand } from './commands/paths.js';
import { getVersion, registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

interface GlobalOptions {
	json?: boolean;
	quiet?: boolean;
	verbose?: boolean;
}

export async function createProgram(): Promise<Command> {
	const program = new Command();
	program
		.name('logweave')
		.description('Structured logging toolkit: demo output, benchmarks and log locations')
		.version(await getVersion())
		.option('--json', 'Machine-readable output')
		.option('--quiet', 'Only print errors')
		.option('--verbose', 'Print extra detail')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts<GlobalOptions>();
			output.setJsonMode(opts.json ?? false);
			output.setQuietMode(opts.quiet ?? false);
			output.setVerboseMode(opts.verbose ?? false);
		});

	registerDemoCommand(program);
	registerBenchCommand(program);
	registerPathsCommand(program);
	registerVersionCommand(program);
	return program;
}

export async function run(argv: string[]): Promise<void> {
	const program = await createProgram();
	await program.parseAsync(argv);
}

export { runBenchmark, summarize, improvement, type BenchmarkResult, type BenchmarkMode } from './bench.js';
