import type { SchemaObject } from 'ajv';

export const configSchema: SchemaObject = {
	type: 'object',
	properties: {
		level: {
			type: 'string',
			enum: ['debug', 'info', 'warn', 'error'],
			description: 'Minimum log level to display.',
			default: 'info',
		},
		color: {
			type: 'boolean',
			description: 'Use ANSI colors in output.',
			default: true,
		},
		compact: {
			type: 'boolean',
			description: 'One line per entry.',
			default: true,
		},
		show_metadata: {
			type: 'boolean',
			description: 'Print entry metadata below the line in verbose mode.',
			default: false,
		},
	},
	additionalProperties: false,
};
