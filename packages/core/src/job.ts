/**
 * Job records: parsing and normalising the YAML records of a job file.
 *
 * A record that fails validation does not take its siblings down: it becomes
 * a rejected record that surfaces as a failed job.
 */

import type {
	CleaningStepSpec,
	JobDefinition,
	LoadTarget,
	ProcessorSelection,
	SinkAction,
	StatementRef,
	StepParams,
} from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import yaml from 'js-yaml';
import { ConfigurationError, describeError } from './errors.js';
import { compileSchema, formatSchemaErrors, toList } from './schema.js';

/** Sink id used when an upload or sql_exec block names none */
export const DEFAULT_SINK = 'default';

/** Column width used when an upload block sets no varchar_size */
export const DEFAULT_COLUMN_SIZE = 2500;

/** One record of a job file, parsed or rejected */
export type CatalogRecord =
	| { ok: true; job: JobDefinition }
	| { ok: false; label: string; enabled: boolean; error: ConfigurationError };

// ─── Raw record shape ─────────────────────────────────────────────────────────

type StringOrList = string | string[];

type RawStepSpec = string | Record<string, StepParams | null>;

interface RawUpload {
	table: string;
	schema?: string;
	if_exists?: 'replace' | 'append';
	database?: string;
	sink?: string;
	varchar_size?: number;
	sql_file?: StringOrList;
	sql_query?: StringOrList;
}

interface RawSqlExec {
	sink?: string;
	database?: string;
	sql_file?: StringOrList;
	sql_query?: StringOrList;
}

interface RawJobRecord {
	service: string;
	sub_service: string;
	enabled: boolean;
	downloader: { name: string; [key: string]: unknown };
	processor?: { name: string; cleaning?: RawStepSpec[]; [key: string]: unknown };
	upload?: RawUpload | RawUpload[];
	sql_exec?: RawSqlExec;
}

const STRING_OR_LIST: SchemaObject = {
	anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
};

const STEP_SPEC: SchemaObject = {
	anyOf: [
		{ type: 'string', minLength: 1 },
		{
			type: 'object',
			minProperties: 1,
			maxProperties: 1,
			additionalProperties: { anyOf: [{ type: 'object' }, { type: 'null' }] },
		},
	],
};

const UPLOAD: SchemaObject = {
	type: 'object',
	properties: {
		table: { type: 'string', minLength: 1 },
		schema: { type: 'string', minLength: 1 },
		if_exists: { type: 'string', enum: ['replace', 'append'] },
		database: { type: 'string', minLength: 1 },
		sink: { type: 'string', minLength: 1 },
		varchar_size: { type: 'integer', minimum: 1 },
		sql_file: STRING_OR_LIST,
		sql_query: STRING_OR_LIST,
	},
	required: ['table'],
	additionalProperties: false,
};

const JOB_RECORD: SchemaObject = {
	type: 'object',
	properties: {
		service: { type: 'string', minLength: 1 },
		sub_service: { type: 'string', minLength: 1 },
		enabled: { type: 'boolean' },
		downloader: {
			type: 'object',
			properties: { name: { type: 'string', minLength: 1 } },
			required: ['name'],
		},
		processor: {
			type: 'object',
			properties: {
				name: { type: 'string', minLength: 1 },
				cleaning: { type: 'array', items: STEP_SPEC },
			},
			required: ['name'],
		},
		upload: { anyOf: [UPLOAD, { type: 'array', items: UPLOAD }] },
		sql_exec: {
			type: 'object',
			properties: {
				sink: { type: 'string', minLength: 1 },
				database: { type: 'string', minLength: 1 },
				sql_file: STRING_OR_LIST,
				sql_query: STRING_OR_LIST,
			},
			additionalProperties: false,
		},
	},
	required: ['service', 'sub_service', 'enabled', 'downloader'],
};

const validateRecord = compileSchema<RawJobRecord>(JOB_RECORD);

// ─── Normalisation ────────────────────────────────────────────────────────────

/** "trim_column_names" or { replace_values: {...} } → { name, params } */
export function normalizeStepSpec(raw: RawStepSpec): CleaningStepSpec {
	if (typeof raw === 'string') return { name: raw };
	const [name, params] = Object.entries(raw)[0];
	return params ? { name, params } : { name };
}

function statementRefs(files: StringOrList | undefined, queries: StringOrList | undefined): StatementRef[] {
	return [
		...toList(files).map((name): StatementRef => ({ kind: 'file', name })),
		...toList(queries).map((text): StatementRef => ({ kind: 'literal', text })),
	];
}

function uploadAction(upload: RawUpload): SinkAction {
	const load: LoadTarget = {
		table: upload.table,
		schema: upload.schema,
		mode: upload.if_exists ?? 'replace',
		database: upload.database,
		columnSize: upload.varchar_size ?? DEFAULT_COLUMN_SIZE,
	};
	return {
		sink: upload.sink ?? DEFAULT_SINK,
		load,
		database: upload.database,
		statements: statementRefs(upload.sql_file, upload.sql_query),
	};
}

function withoutKeys(obj: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
	return Object.fromEntries(Object.entries(obj).filter(([key]) => !keys.includes(key)));
}

function toJobDefinition(record: RawJobRecord, catalogId: string, index: number): JobDefinition {
	const uploads = record.upload === undefined ? [] : Array.isArray(record.upload) ? record.upload : [record.upload];
	const sinks = uploads.map(uploadAction);

	if (record.sql_exec) {
		sinks.push({
			sink: record.sql_exec.sink ?? DEFAULT_SINK,
			database: record.sql_exec.database,
			statements: statementRefs(record.sql_exec.sql_file, record.sql_exec.sql_query),
		});
	}

	let processor: ProcessorSelection | undefined;
	if (record.processor) {
		processor = {
			name: record.processor.name,
			config: withoutKeys(record.processor, ['name', 'cleaning']),
			cleaning: (record.processor.cleaning ?? []).map(normalizeStepSpec),
		};
	}

	return {
		catalogId,
		index,
		name: `${record.service} - ${record.sub_service}`,
		service: record.service,
		subService: record.sub_service,
		enabled: record.enabled,
		source: {
			name: record.downloader.name,
			config: withoutKeys(record.downloader, ['name']),
		},
		processor,
		sinks,
	};
}

function labelOf(raw: unknown, catalogId: string, index: number): string {
	if (raw !== null && typeof raw === 'object') {
		const service = 'service' in raw ? raw.service : undefined;
		const subService = 'sub_service' in raw ? raw.sub_service : undefined;
		if (typeof service === 'string' && typeof subService === 'string') {
			return `${service} - ${subService}`;
		}
	}
	return `${catalogId} #${index + 1}`;
}

/**
 * Parse one raw record. Never throws.
 */
export function parseJobRecord(raw: unknown, catalogId: string, index: number): CatalogRecord {
	if (validateRecord(raw)) {
		return { ok: true, job: toJobDefinition(raw, catalogId, index) };
	}
	const enabled = !(raw !== null && typeof raw === 'object' && 'enabled' in raw && raw.enabled === false);
	return {
		ok: false,
		label: labelOf(raw, catalogId, index),
		enabled,
		error: new ConfigurationError(
			`Invalid job record ${index + 1} in ${catalogId}: ${formatSchemaErrors(validateRecord.errors)}`,
		),
	};
}

/**
 * Parse a job file's YAML text into records. Never throws: unparsable text
 * becomes a single rejected record.
 */
export function parseJobFile(content: string, catalogId: string): CatalogRecord[] {
	let doc: unknown;
	try {
		doc = yaml.load(content);
	} catch (err) {
		return [
			{
				ok: false,
				label: catalogId,
				enabled: true,
				error: new ConfigurationError(`Cannot parse ${catalogId}: ${describeError(err)}`, { cause: err }),
			},
		];
	}

	if (doc === undefined || doc === null) return [];
	if (!Array.isArray(doc)) {
		return [
			{
				ok: false,
				label: catalogId,
				enabled: true,
				error: new ConfigurationError(`${catalogId} must contain a list of job records`),
			},
		];
	}
	return doc.map((raw: unknown, index) => parseJobRecord(raw, catalogId, index));
}
