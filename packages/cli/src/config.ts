/**
 * Project config loading: `sluice.yaml`.
 *
 * Every field is optional. Relative directories resolve against the
 * directory holding the config file (or the working directory when there is
 * none), and `${VAR}` references in any string resolve from the environment.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ConfigurationError, compileSchema, DEFAULT_TIMEZONE, formatSchemaErrors } from '@sluice/core';
import { expandEnv } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import yaml from 'js-yaml';

export const DEFAULT_CONFIG_FILE = 'sluice.yaml';

export interface SinkDefinition {
	id: string;
	/** Connector registration id, e.g. "postgres" */
	connector: string;
	config: Record<string, unknown>;
}

export interface LoggerDefinition {
	name: string;
	/** Logger registration id, e.g. "console" */
	type: string;
	config: Record<string, unknown>;
}

export interface ProjectConfig {
	/** Directory the relative paths below were resolved against */
	projectDir: string;
	/** Config file the values came from, when there was one */
	configPath?: string;
	jobsDir: string;
	queriesDir: string;
	workDir: string;
	timezone: string;
	sinks: SinkDefinition[];
	loggers: LoggerDefinition[];
	/** Module specifiers of extra plugin packages */
	plugins: string[];
}

interface ProjectFile {
	jobs_dir?: string;
	queries_dir?: string;
	work_dir?: string;
	timezone?: string;
	sinks?: Array<{ id: string; connector: string; config?: Record<string, unknown> }>;
	loggers?: Array<{ name: string; type: string; config?: Record<string, unknown> }>;
	plugins?: string[];
}

const PROJECT_FILE_SCHEMA: SchemaObject = {
	type: 'object',
	properties: {
		jobs_dir: { type: 'string', minLength: 1 },
		queries_dir: { type: 'string', minLength: 1 },
		work_dir: { type: 'string', minLength: 1 },
		timezone: { type: 'string', minLength: 1 },
		sinks: {
			type: 'array',
			items: {
				type: 'object',
				required: ['id', 'connector'],
				properties: {
					id: { type: 'string', minLength: 1 },
					connector: { type: 'string', minLength: 1 },
					config: { type: 'object' },
				},
				additionalProperties: false,
			},
		},
		loggers: {
			type: 'array',
			items: {
				type: 'object',
				required: ['name', 'type'],
				properties: {
					name: { type: 'string', minLength: 1 },
					type: { type: 'string', minLength: 1 },
					config: { type: 'object' },
				},
				additionalProperties: false,
			},
		},
		plugins: { type: 'array', items: { type: 'string', minLength: 1 } },
	},
	additionalProperties: false,
};

const validateProjectFile = compileSchema<ProjectFile>(PROJECT_FILE_SCHEMA);

export const DEFAULT_SINKS: readonly SinkDefinition[] = [
	{ id: 'default', connector: 'postgres', config: { connection_env: 'DATABASE_URL' } },
];

export const DEFAULT_LOGGERS: readonly LoggerDefinition[] = [
	{ name: 'console', type: 'console', config: { level: 'info' } },
];

export interface LoadConfigOptions {
	/** Explicit config path; a missing file is then an error */
	configPath?: string;
	/** Directory searched for sluice.yaml when no path is given */
	cwd?: string;
	env?: NodeJS.ProcessEnv;
}

/** Replace `${VAR}` in every string of a parsed YAML document. */
export function expandEnvDeep(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
	if (typeof value === 'string') return expandEnv(value, env);
	if (Array.isArray(value)) return value.map((item) => expandEnvDeep(item, env));
	if (value !== null && typeof value === 'object') {
		return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, expandEnvDeep(v, env)]));
	}
	return value;
}

async function readProjectFile(path: string, required: boolean): Promise<string | null> {
	try {
		return await readFile(path, 'utf-8');
	} catch (err) {
		if (!required && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
			return null;
		}
		throw new ConfigurationError(`Cannot read config file ${path}`, { cause: err });
	}
}

function parseProjectFile(content: string, path: string, env: NodeJS.ProcessEnv): ProjectFile {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (err) {
		throw new ConfigurationError(`Invalid YAML in ${path}`, { cause: err });
	}
	if (raw === undefined || raw === null) return {};

	let expanded: unknown;
	try {
		expanded = expandEnvDeep(raw, env);
	} catch (err) {
		throw new ConfigurationError(`Cannot resolve ${path}`, { cause: err });
	}
	if (!validateProjectFile(expanded)) {
		throw new ConfigurationError(`Invalid config in ${path}: ${formatSchemaErrors(validateProjectFile.errors)}`);
	}
	return expanded;
}

/**
 * Load the project config, falling back to defaults for every absent field.
 */
export async function loadProjectConfig(options: LoadConfigOptions = {}): Promise<ProjectConfig> {
	const cwd = options.cwd ?? process.cwd();
	const env = options.env ?? process.env;
	const path = resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

	const content = await readProjectFile(path, options.configPath !== undefined);
	const file = content === null ? {} : parseProjectFile(content, path, env);
	const projectDir = content === null ? cwd : dirname(path);
	const dir = (value: string) => (isAbsolute(value) ? value : resolve(projectDir, value));

	const sinks = file.sinks?.map((s) => ({ id: s.id, connector: s.connector, config: s.config ?? {} }));
	const loggers = file.loggers?.map((l) => ({ name: l.name, type: l.type, config: l.config ?? {} }));

	const seen = new Set<string>();
	for (const sink of sinks ?? []) {
		if (seen.has(sink.id)) {
			throw new ConfigurationError(`Duplicate sink id "${sink.id}" in ${path}`);
		}
		seen.add(sink.id);
	}

	return {
		projectDir,
		configPath: content === null ? undefined : path,
		jobsDir: dir(file.jobs_dir ?? 'reports'),
		queriesDir: dir(file.queries_dir ?? 'queries'),
		workDir: dir(file.work_dir ?? 'data'),
		timezone: file.timezone ?? DEFAULT_TIMEZONE,
		sinks: sinks ?? DEFAULT_SINKS.map((s) => ({ ...s, config: { ...s.config } })),
		loggers: loggers ?? DEFAULT_LOGGERS.map((l) => ({ ...l, config: { ...l.config } })),
		plugins: file.plugins ?? [],
	};
}
