/**
 * HTTP source: downloads a file, or reads JSON records straight into a dataset.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, parse } from 'node:path';
import type { DownloadNaming, HttpAgent, SourceConnector, SourceContext, SourceOutput } from '@sluice/sdk';
import {
	DOWNLOAD_NAMING_PROPERTIES,
	buildDownloadPath,
	closeHttpAgent,
	createConfigParser,
	createHttpAgent,
	datasetFromRecords,
	expandEnv,
	fetchWithAgent,
} from '@sluice/sdk';
import type { SchemaObject } from 'ajv';

export interface HttpSourceConfig extends DownloadNaming {
	/** `${NAME}` references in the url and header values resolve from the environment */
	url: string;
	method: 'GET' | 'POST';
	headers?: Record<string, string>;
	body?: string;
	/** 'file' saves the body; 'json' parses it into records */
	format: 'file' | 'json';
	/** Extension of the saved file; defaults to the URL's */
	extension?: string;
	/** Dot path to the records array inside a JSON body, e.g. "data.items" */
	records_path?: string;
}

export const configSchema: SchemaObject = {
	type: 'object',
	required: ['url'],
	properties: {
		url: { type: 'string', pattern: '^(https?://|\\$\\{)' },
		method: { type: 'string', enum: ['GET', 'POST'], default: 'GET' },
		headers: { type: 'object', additionalProperties: { type: 'string' } },
		body: { type: 'string' },
		format: { type: 'string', enum: ['file', 'json'], default: 'file' },
		extension: { type: 'string' },
		records_path: { type: 'string', minLength: 1 },
		...DOWNLOAD_NAMING_PROPERTIES,
	},
};

const parseConfig = createConfigParser<HttpSourceConfig>('http', configSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Walk a dot path and return the array of records found there. */
export function recordsAt(body: unknown, path: string | undefined): Record<string, unknown>[] {
	let current = body;
	for (const key of path ? path.split('.') : []) {
		if (!isRecord(current) || !(key in current)) {
			throw new Error(`No value at "${path}" in response body`);
		}
		current = current[key];
	}
	if (!Array.isArray(current)) {
		throw new Error(path ? `Value at "${path}" is not an array` : 'Response body is not an array');
	}
	return current.map((item, i) => {
		if (!isRecord(item)) throw new Error(`Record ${i} is not an object`);
		return item;
	});
}

export class HttpSource implements SourceConnector {
	readonly id = 'http';
	private config: HttpSourceConfig | null = null;
	private agent: HttpAgent | null = null;

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
		this.agent = createHttpAgent({ connections: 1 });
	}

	async fetch(context: SourceContext): Promise<SourceOutput> {
		if (!this.config || !this.agent) throw new Error('http source used before init()');
		const { method, body, format } = this.config;
		const url = expandEnv(this.config.url);
		const headers = Object.fromEntries(
			Object.entries(this.config.headers ?? {}).map(([key, value]) => [key, expandEnv(value)]),
		);

		const response = await fetchWithAgent(this.agent, url, { method, headers, body });
		if (!response.ok) {
			throw new Error(`HTTP ${response.status} ${response.statusText} from ${url}`);
		}

		if (format === 'json') {
			const parsed: unknown = await response.json();
			return { kind: 'dataset', dataset: datasetFromRecords(recordsAt(parsed, this.config.records_path)) };
		}

		const { name, ext } = parse(new URL(url).pathname);
		const target = buildDownloadPath({
			workDir: context.workDir,
			service: context.service,
			subService: context.subService,
			downloader: this.id,
			extension: this.config.extension ?? ext.replace(/^\./, ''),
			originalName: name,
			naming: this.config,
			timezone: context.timezone,
		});
		await mkdir(dirname(target), { recursive: true });
		await writeFile(target, Buffer.from(await response.arrayBuffer()));
		return { kind: 'files', files: [target] };
	}

	async shutdown(): Promise<void> {
		if (this.agent) {
			await closeHttpAgent(this.agent);
			this.agent = null;
		}
	}
}
