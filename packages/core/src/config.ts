/**
 * Logging configuration from YAML and the environment.
 *
 * File keys are snake_case:
 *
 *   name: app
 *   sink: both            # none | console | file | both
 *   log_level: debug
 *   flush_level: warn
 *   file_path: ./logs/app.log
 *   console_pattern: "%x [%l] %v"
 *   file_pattern: "%x [%n] [%l] [%!] %v"
 *   async: true
 */

import { readFile } from 'node:fs/promises';
import { type LogLevel, toLogLevel } from '@logweave/sdk';
import yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { type LoggingConfig, type SinkSelection, defaultLoggerConfig } from './logging.js';

const SINK_SELECTIONS: readonly SinkSelection[] = ['none', 'console', 'file', 'both'];

// ─── Value parsing ────────────────────────────────────────────────────────────

export function parseLogLevel(field: string, value: unknown): LogLevel {
	const level = toLogLevel(value);
	if (!level) {
		throw new ConfigError(
			field,
			`unknown level ${JSON.stringify(value)} (expected trace, debug, info, warn, error or fatal)`,
		);
	}
	return level;
}

function parseSink(field: string, value: unknown): SinkSelection {
	const match = SINK_SELECTIONS.find((s) => s === value);
	if (!match) {
		throw new ConfigError(field, `expected one of ${SINK_SELECTIONS.join(', ')}`);
	}
	return match;
}

function parseString(field: string, value: unknown): string {
	if (typeof value !== 'string') {
		throw new ConfigError(field, 'expected a string');
	}
	return value;
}

function parseBoolean(field: string, value: unknown): boolean {
	if (typeof value === 'boolean') return value;
	if (typeof value === 'string') {
		const normalized = value.trim().toLowerCase();
		if (normalized === '1' || normalized === 'true') return true;
		if (normalized === '0' || normalized === 'false') return false;
	}
	throw new ConfigError(field, 'expected true or false');
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── YAML ─────────────────────────────────────────────────────────────────────

/**
 * Parse YAML text over `base` (default: defaultLoggerConfig()). Keys left
 * out keep their base value; unknown keys are rejected.
 */
export function parseLoggingConfig(text: string, base: LoggingConfig = defaultLoggerConfig()): LoggingConfig {
	let doc: unknown;
	try {
		doc = yaml.load(text);
	} catch (err) {
		throw new ConfigError('yaml', 'invalid YAML', { cause: err });
	}
	if (doc === undefined || doc === null) return { ...base };
	if (!isRecord(doc)) {
		throw new ConfigError('yaml', 'expected a mapping at the top level');
	}

	const config: LoggingConfig = { ...base };
	for (const [key, value] of Object.entries(doc)) {
		switch (key) {
			case 'name':
				config.name = parseString(key, value);
				if (!config.name) throw new ConfigError(key, 'must not be empty');
				break;
			case 'sink':
				config.sink = parseSink(key, value);
				break;
			case 'log_level':
				config.logLevel = parseLogLevel(key, value);
				break;
			case 'flush_level':
				config.flushLevel = parseLogLevel(key, value);
				break;
			case 'file_path':
				config.filePath = parseString(key, value);
				break;
			case 'console_pattern':
				config.consolePattern = parseString(key, value);
				break;
			case 'file_pattern':
				config.filePattern = parseString(key, value);
				break;
			case 'async':
				config.async = parseBoolean(key, value);
				break;
			default:
				throw new ConfigError(key, 'unknown key');
		}
	}
	return config;
}

export async function loadLoggingConfig(
	path: string,
	base: LoggingConfig = defaultLoggerConfig(),
): Promise<LoggingConfig> {
	let text: string;
	try {
		text = await readFile(path, 'utf-8');
	} catch (err) {
		throw new ConfigError('file', `cannot read ${path}`, { cause: err });
	}
	return parseLoggingConfig(text, base);
}

// ─── Environment ──────────────────────────────────────────────────────────────

/**
 * Apply LOGWEAVE_LOG_LEVEL, LOGWEAVE_FLUSH_LEVEL, LOGWEAVE_ASYNC and
 * LOGWEAVE_LOG_FILE. Setting LOGWEAVE_LOG_FILE also turns the file sink on.
 */
export function applyEnvOverrides(
	config: LoggingConfig,
	env: NodeJS.ProcessEnv = process.env,
): LoggingConfig {
	const result: LoggingConfig = { ...config };
	if (env.LOGWEAVE_LOG_LEVEL) {
		result.logLevel = parseLogLevel('LOGWEAVE_LOG_LEVEL', env.LOGWEAVE_LOG_LEVEL);
	}
	if (env.LOGWEAVE_FLUSH_LEVEL) {
		result.flushLevel = parseLogLevel('LOGWEAVE_FLUSH_LEVEL', env.LOGWEAVE_FLUSH_LEVEL);
	}
	if (env.LOGWEAVE_ASYNC) {
		result.async = parseBoolean('LOGWEAVE_ASYNC', env.LOGWEAVE_ASYNC);
	}
	if (env.LOGWEAVE_LOG_FILE) {
		result.filePath = env.LOGWEAVE_LOG_FILE;
		if (result.sink === 'none') result.sink = 'file';
		else if (result.sink === 'console') result.sink = 'both';
	}
	return result;
}
