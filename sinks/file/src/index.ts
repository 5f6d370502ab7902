/**
 * @logweave/sink-file: registration entry point.
 */

import type { SinkRegistration } from '@logweave/sdk';
import { FileSink, type FileSinkOptions } from './file-sink.js';

export interface FileSinkConfig extends FileSinkOptions {
	path: string;
}

export function register(): SinkRegistration<FileSinkConfig> {
	return {
		id: 'file',
		create: ({ path, ...options }) => new FileSink(path, options),
		configSchema: {
			type: 'object',
			properties: {
				path: {
					type: 'string',
					description: 'File to append log lines to.',
				},
				append: {
					type: 'boolean',
					description: 'Append to an existing file instead of truncating it.',
					default: true,
				},
				pattern: {
					type: 'string',
					description: 'Line pattern (%x %n %l %t %$ %! %# %v).',
					default: '%x [%l] [%!] %v',
				},
				highWaterMark: {
					type: 'number',
					description: 'Buffered bytes that force a flush.',
					default: 65536,
				},
				maxBufferedLines: {
					type: 'number',
					description: 'Lines kept while the file is unwritable.',
					default: 10000,
				},
			},
			required: ['path'],
			additionalProperties: false,
		},
	};
}

export { FileSink, type FileSinkOptions } from './file-sink.js';
