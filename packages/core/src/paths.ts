/**
 * Where log files go by default on each platform.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join, posix, win32 } from 'node:path';

const APP_DIR = 'Logweave';
const BUILD_DIR_MARKERS = ['build', 'out', 'bin', 'cmake-build'];

export interface PlatformContext {
	env?: NodeJS.ProcessEnv;
	platform?: NodeJS.Platform;
	cwd?: string;
}

/**
 * Per-user log directory:
 *   win32   %LOCALAPPDATA%\Logweave\logs
 *   darwin  ~/Library/Logs/Logweave
 *   linux   $XDG_DATA_HOME/Logweave/logs or ~/.local/share/Logweave/logs
 * Falls back to <cwd>/logs inside a build directory, else a relative "logs".
 */
export function platformLogDirectory(context: PlatformContext = {}): string {
	const env = context.env ?? process.env;
	const platform = context.platform ?? process.platform;
	const path = platform === 'win32' ? win32 : posix;
	const home = platform === 'win32' ? env.USERPROFILE : env.HOME;

	if (platform === 'win32') {
		if (env.LOCALAPPDATA) return path.join(env.LOCALAPPDATA, APP_DIR, 'logs');
		if (home) return path.join(home, 'AppData', 'Local', APP_DIR, 'logs');
	} else if (platform === 'darwin') {
		if (home) return path.join(home, 'Library', 'Logs', APP_DIR);
	} else if (platform === 'linux') {
		if (env.XDG_DATA_HOME) return path.join(env.XDG_DATA_HOME, APP_DIR, 'logs');
		if (home) return path.join(home, '.local', 'share', APP_DIR, 'logs');
	}

	const cwd = context.cwd ?? process.cwd();
	if (BUILD_DIR_MARKERS.some((marker) => cwd.includes(marker))) {
		return path.join(cwd, 'logs');
	}
	return 'logs';
}

/** Create `dir` (and parents). False for an empty path or on failure. */
export function ensureLogDirectoryExists(dir: string): boolean {
	if (!dir) return false;
	try {
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}
		return true;
	} catch {
		return false;
	}
}

/**
 * Path for `filename` inside a fresh `YYYY-MM-DD_HH-MM-SS` folder under
 * `baseDir` (local time). Falls back to `baseDir` itself, then to the bare
 * filename, when directories cannot be created.
 */
export function createLoggingFolder(baseDir: string, filename: string, now = new Date()): string {
	const stamped = join(baseDir, folderStamp(now));
	if (ensureLogDirectoryExists(stamped)) {
		return join(stamped, filename);
	}
	if (ensureLogDirectoryExists(baseDir)) {
		return join(baseDir, filename);
	}
	return filename;
}

function folderStamp(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, '0');
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}
