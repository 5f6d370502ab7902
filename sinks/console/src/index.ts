/**
 * @logweave/sink-console: registration entry point.
 */

import type { SinkRegistration } from '@logweave/sdk';
import { ConsoleSink, type ConsoleSinkOptions } from './console-sink.js';

export function register(): SinkRegistration<ConsoleSinkOptions> {
	return {
		id: 'console',
		create: (options) => new ConsoleSink(options),
		configSchema: {
			type: 'object',
			properties: {
				stream: {
					type: 'string',
					enum: ['stdout', 'stderr'],
					description: 'Stream to write to.',
					default: 'stdout',
				},
				pattern: {
					type: 'string',
					description: 'Line pattern (%x %n %l %t %$ %! %# %v).',
					default: '%x [%l] %v',
				},
				color: {
					type: 'boolean',
					description: 'Use ANSI colors in output.',
				},
			},
			additionalProperties: false,
		},
	};
}

export { ConsoleSink, type ConsoleSinkOptions } from './console-sink.js';
export { colorize, isColorEnabled, setColorEnabled } from './colors.js';
