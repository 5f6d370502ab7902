/**
 * logweave version: Print version info.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function getVersion(): Promise<string> {
	try {
		// commands/ -> src/ -> package root
		const pkgPath = resolve(__dirname, '..', '..', 'package.json');
		const content = await readFile(pkgPath, 'utf-8');
		const pkg: unknown = JSON.parse(content);
		if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
			return pkg.version;
		}
		return 'unknown';
	} catch {
		return 'unknown';
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					logweave: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.field('logweave', version, 10);
			output.field('node', process.version, 10);
			output.field('platform', `${process.platform} ${process.arch}`, 10);
		});
}
