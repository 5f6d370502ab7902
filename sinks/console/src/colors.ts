/**
 * Level colors for terminal output.
 *
 * Color support is detected by chalk (FORCE_COLOR, NO_COLOR, TTY, TERM)
 * unless overridden with setColorEnabled().
 */

import type { LogLevel } from '@logweave/sdk';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

let override: boolean | null = null;

const plain = new Chalk({ level: 0 });
const forced = new Chalk({ level: chalk.level > 0 ? chalk.level : 1 });

/** Force colors on or off; `null` returns to auto-detection. */
export function setColorEnabled(enabled: boolean | null): void {
	override = enabled;
}

/** Whether console output is colored right now. */
export function isColorEnabled(): boolean {
	return override ?? chalk.level > 0;
}

function palette(): ChalkInstance {
	if (override === null) return chalk;
	return override ? forced : plain;
}

/** Wrap a formatted line in its level's color. */
export function colorize(level: LogLevel, line: string): string {
	const c = palette();
	switch (level) {
		case 'trace':
			return c.gray(line);
		case 'debug':
			return c.blue(line);
		case 'info':
			return c.green(line);
		case 'warn':
			return c.bold.yellow(line);
		case 'error':
			return c.bold.red(line);
		case 'fatal':
			return c.bold.magenta(line);
	}
}
