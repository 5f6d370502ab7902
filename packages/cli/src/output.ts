/**
 * Output formatting for the CLI.
 *
 * Colored status lines, aligned fields, JSON mode, quiet and verbose
 * modes, and spinners.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function verbose(message: string): void {
	if (!verboseMode || quietMode || jsonMode) return;
	console.log(chalk.dim(`  … ${message}`));
}

export function blank(): void {
	if (quietMode || jsonMode) return;
	console.log();
}

export function heading(text: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.bold(text));
}

// ─── Fields ──────────────────────────────────────────────────────────────────

/** Print `label` padded to `width`, then the value. */
export function field(label: string, value: string, width = 16): void {
	if (quietMode || jsonMode) return;
	console.log(`  ${chalk.dim(`${label}:`.padEnd(width))}${value}`);
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Spinner ─────────────────────────────────────────────────────────────────

export function spinner(text: string): Ora {
	if (jsonMode || quietMode) {
		return ora({ text, isSilent: true });
	}
	return ora({ text, color: 'cyan' }).start();
}
