/**
 * CSV processor: every value is read as text, with no missing-value
 * inference: an empty field stays an empty string.
 */

import { readFile } from 'node:fs/promises';
import type { Dataset, Processor } from '@sluice/sdk';
import { createConfigParser, datasetFromMatrix, emptyDataset } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import { parse } from 'csv-parse/sync';

export interface CsvProcessorConfig {
	separator: string;
	/** Any WHATWG encoding label: utf8, latin1, windows-1252, utf-16le… */
	encoding: string;
	/** Lines to skip before the header row */
	skip_rows: number;
}

export const configSchema: SchemaObject = {
	type: 'object',
	properties: {
		separator: { type: 'string', minLength: 1, default: ',' },
		encoding: { type: 'string', minLength: 1, default: 'utf8' },
		skip_rows: { type: 'integer', minimum: 0, default: 0 },
	},
};

const parseConfig = createConfigParser<CsvProcessorConfig>('csv', configSchema);

function isStringMatrix(value: unknown): value is string[][] {
	return (
		Array.isArray(value) &&
		value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
	);
}

export class CsvProcessor implements Processor {
	readonly id = 'csv';
	private config: CsvProcessorConfig = { separator: ',', encoding: 'utf8', skip_rows: 0 };

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
		// Unknown encoding labels throw here rather than on the first read
		new TextDecoder(this.config.encoding);
	}

	async read(file: string): Promise<Dataset> {
		const bytes = await readFile(file);
		const text = new TextDecoder(this.config.encoding).decode(bytes);

		const records: unknown = parse(text, {
			delimiter: this.config.separator,
			from_line: this.config.skip_rows + 1,
			bom: true,
			relax_column_count: true,
			skip_empty_lines: true,
		});
		if (!isStringMatrix(records)) {
			throw new Error(`Unexpected parser output for ${file}`);
		}

		const [header, ...body] = records;
		if (!header) return emptyDataset();
		return datasetFromMatrix(header, body);
	}
}
