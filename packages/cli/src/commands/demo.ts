/**
 * logweave demo: Configure the default logger and emit one record per level.
 *
 * Config comes from --config (YAML), then LOGWEAVE_* variables, then flags.
 */

import {
	type LoggingConfig,
	applyEnvOverrides,
	configureLogger,
	createCategoryLogger,
	defaultLoggerConfig,
	loadLoggingConfig,
	parseLogLevel,
	shutdown,
} from '@logweave/core';
import type { Command } from 'commander';
import * as output from '../output.js';

export interface DemoOptions {
	config?: string;
	async?: boolean;
	file?: string;
	level?: string;
}

export async function resolveDemoConfig(
	opts: DemoOptions,
	env: NodeJS.ProcessEnv = process.env,
): Promise<LoggingConfig> {
	const base = opts.config ? await loadLoggingConfig(opts.config) : defaultLoggerConfig();
	const config = applyEnvOverrides(base, env);
	if (opts.async) config.async = true;
	if (opts.level) config.logLevel = parseLogLevel('--level', opts.level);
	if (opts.file) {
		config.filePath = opts.file;
		if (config.sink === 'none') config.sink = 'file';
		else if (config.sink === 'console') config.sink = 'both';
	}
	return config;
}

function emitSamples(): void {
	const app = createCategoryLogger('demo.app');
	const net = createCategoryLogger('demo.net');

	app.trace('entering main loop');
	app.debug('loaded ', 3, ' plugins');
	app.info('service ready');
	net.warn('slow response from upstream: ', { host: 'upstream.local', ms: 1250 });
	net.error(new Error('connection reset'));
	app.fatal('out of disk space');
}

export function registerDemoCommand(program: Command): void {
	program
		.command('demo')
		.description('Emit one record at every level through the default logger')
		.option('--config <path>', 'Logging config file (YAML)')
		.option('--async', 'Use an async logger')
		.option('--file <path>', 'Also write to this file')
		.option('--level <level>', 'Minimum level to emit')
		.action(async (opts: DemoOptions) => {
			try {
				const config = await resolveDemoConfig(opts);
				output.verbose(`logger ${config.name} (${config.async ? 'async' : 'sync'}), sink ${config.sink}`);

				configureLogger(config);
				emitSamples();
				await shutdown();

				if (output.isJsonMode()) {
					output.json({
						logger: config.name,
						async: config.async,
						sink: config.sink,
						level: config.logLevel,
						file: config.sink === 'file' || config.sink === 'both' ? config.filePath : null,
					});
					return;
				}
				if (config.sink === 'file' || config.sink === 'both') {
					output.success(`Wrote ${config.filePath}`);
				}
			} catch (err) {
				await shutdown();
				output.error(`Demo failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
