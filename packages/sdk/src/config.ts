/**
 * Plugin config parsing.
 *
 * Plugins receive their config as a plain record. A parser built from the
 * plugin's JSON Schema validates it, fills schema defaults, and hands back a
 * typed copy.
 */

import { Ajv, type SchemaObject } from 'ajv';

const ajv = new Ajv({ allErrors: true, useDefaults: true });

export type ConfigParser<T> = (config: Record<string, unknown>) => T;

export function createConfigParser<T>(plugin: string, schema: SchemaObject): ConfigParser<T> {
	const validate = ajv.compile<T>(schema);
	return (config) => {
		const value: unknown = structuredClone(config);
		if (!validate(value)) {
			const details = (validate.errors ?? [])
				.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
				.join('; ');
			throw new Error(`Invalid ${plugin} config: ${details}`);
		}
		return value;
	};
}

/**
 * Replace `${NAME}` references with environment values.
 * Throws when a referenced variable is not set.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
	return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
		const resolved = env[name];
		if (resolved === undefined) {
			throw new Error(`Environment variable ${name} is not set`);
		}
		return resolved;
	});
}
