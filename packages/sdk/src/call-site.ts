/**
 * Call-site capture from V8 stack traces.
 */

export interface CallSite {
	file: string;
	functionName: string;
	line: number;
}

export const UNKNOWN_CALL_SITE: CallSite = { file: '', functionName: '', line: 0 };

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME_WITH_NAME = /^\s*at (?:async )?(.+?) \((.+):(\d+):\d+\)$/;
const FRAME_ANONYMOUS = /^\s*at (?:async )?(.+):(\d+):\d+$/;

/**
 * Parse one stack frame line. Returns undefined for frames that carry no
 * location (native frames, `<anonymous>`).
 */
export function parseStackFrame(frame: string): CallSite | undefined {
	const named = FRAME_WITH_NAME.exec(frame);
	if (named) {
		return {
			functionName: named[1],
			file: stripFileUrl(named[2]),
			line: Number.parseInt(named[3], 10),
		};
	}
	const anonymous = FRAME_ANONYMOUS.exec(frame);
	if (anonymous) {
		return {
			functionName: '',
			file: stripFileUrl(anonymous[1]),
			line: Number.parseInt(anonymous[2], 10),
		};
	}
	return undefined;
}

function stripFileUrl(location: string): string {
	return location.startsWith('file://') ? location.slice('file://'.length) : location;
}

/**
 * Location of the caller `skipFrames` levels above the function calling
 * this one (0 = that function's caller).
 */
export function captureCallSite(skipFrames = 0): CallSite {
	const stack = new Error().stack;
	if (!stack) return UNKNOWN_CALL_SITE;

	// Line 0 is the message, 1 is this function, 2 its caller
	const frames = stack.split('\n').slice(3 + skipFrames);
	for (const frame of frames) {
		const site = parseStackFrame(frame);
		if (site) return site;
	}
	return UNKNOWN_CALL_SITE;
}
