/**
 * logweave paths: Show where logs go on this machine.
 */

import { join } from 'node:path';
import { DEFAULT_LOG_FILE_NAME, platformLogDirectory } from '@logweave/core';
import type { Command } from 'commander';
import * as output from '../output.js';

export interface LogPaths {
	directory: string;
	defaultFile: string;
	platform: NodeJS.Platform;
}

export function describeLogPaths(
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): LogPaths {
	const directory = platformLogDirectory({ env, platform });
	return { directory, defaultFile: join(directory, DEFAULT_LOG_FILE_NAME), platform };
}

export function registerPathsCommand(program: Command): void {
	program
		.command('paths')
		.description('Print the platform log directory')
		.action(() => {
			const paths = describeLogPaths();
			if (output.isJsonMode()) {
				output.json(paths);
				return;
			}
			output.field('platform', paths.platform, 14);
			output.field('log directory', paths.directory, 14);
			output.field('default file', paths.defaultFile, 14);
		});
}
