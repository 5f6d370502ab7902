/**
 * Pattern formatter: renders a record through a `%`-token pattern.
 *
 *   %x  timestamp (YYYY-MM-DD HH:MM:SS, local or UTC per record)
 *   %n  category
 *   %l  level label
 *   %t  thread label
 *   %$  source file
 *   %!  function name
 *   %#  line number
 *   %v  message
 *
 * Any other `%c` pair is copied through unchanged.
 */

import { threadId } from 'node:worker_threads';
import type { LogRecord, TimestampKind } from './types.js';
import { levelLabel } from './types.js';

export const DEFAULT_CONSOLE_PATTERN = '%x [%l] %v';
export const DEFAULT_FILE_PATTERN = '%x [%l] [%!] %v';

function pad(value: number): string {
	return value < 10 ? `0${value}` : String(value);
}

/** Render `YYYY-MM-DD HH:MM:SS` for the given clock. */
export function formatTimestamp(time: Date, kind: TimestampKind): string {
	if (kind === 'utc') {
		return `${time.getUTCFullYear()}-${pad(time.getUTCMonth() + 1)}-${pad(time.getUTCDate())} ${pad(
			time.getUTCHours(),
		)}:${pad(time.getUTCMinutes())}:${pad(time.getUTCSeconds())}`;
	}
	return `${time.getFullYear()}-${pad(time.getMonth() + 1)}-${pad(time.getDate())} ${pad(
		time.getHours(),
	)}:${pad(time.getMinutes())}:${pad(time.getSeconds())}`;
}

/** Label of the thread doing the formatting, numbered from `Thread-1` (the main thread). */
export function threadLabel(): string {
	return `Thread-${threadId + 1}`;
}

/**
 * Format a record with a pattern. Pure apart from `%t`, which reads the
 * current thread id.
 */
export function formatRecord(record: LogRecord, pattern: string): string {
	let out = '';
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern[i];
		if (ch !== '%' || i + 1 >= pattern.length) {
			out += ch;
			continue;
		}
		switch (pattern[i + 1]) {
			case 'x':
				out += formatTimestamp(record.time, record.timestampKind);
				break;
			case 'n':
				out += record.category;
				break;
			case 'l':
				out += levelLabel(record.level);
				break;
			case 't':
				out += threadLabel();
				break;
			case '$':
				out += record.file;
				break;
			case '!':
				out += record.functionName;
				break;
			case '#':
				out += String(record.line);
				break;
			case 'v':
				out += record.message;
				break;
			default:
				// Unknown token: emit the '%' and let the next pass copy the character
				out += ch;
				continue;
		}
		i++;
	}
	return out;
}
