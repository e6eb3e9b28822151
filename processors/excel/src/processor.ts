/**
 * Excel processor: reads one sheet as formatted cell text.
 */

import { readFile } from 'node:fs/promises';
import type { Dataset, Processor } from '@sluice/sdk';
import { createConfigParser, datasetFromMatrix, emptyDataset } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import * as XLSX from 'xlsx';

export interface ExcelProcessorConfig {
	/** Sheet name, or zero-based sheet index */
	sheet_name: string | number;
	/** Rows to skip before the header row */
	skip_rows: number;
}

export const configSchema: SchemaObject = {
	type: 'object',
	properties: {
		sheet_name: {
			anyOf: [{ type: 'string', minLength: 1 }, { type: 'integer', minimum: 0 }],
			default: 0,
		},
		skip_rows: { type: 'integer', minimum: 0, default: 0 },
	},
};

const parseConfig = createConfigParser<ExcelProcessorConfig>('excel', configSchema);

export class ExcelProcessor implements Processor {
	readonly id = 'excel';
	private config: ExcelProcessorConfig = { sheet_name: 0, skip_rows: 0 };

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
	}

	async read(file: string): Promise<Dataset> {
		const workbook = XLSX.read(await readFile(file), { type: 'buffer', cellDates: true });
		const { sheet_name, skip_rows } = this.config;

		const sheetName = typeof sheet_name === 'number' ? workbook.SheetNames[sheet_name] : sheet_name;
		const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
		if (!sheet) {
			throw new Error(`Sheet ${JSON.stringify(sheet_name)} not found in ${file}`);
		}

		// A numeric range starts reading at that (zero-based) sheet row
		const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
			header: 1,
			raw: false,
			defval: '',
			blankrows: false,
			range: skip_rows,
		});

		const [header, ...body] = rows;
		if (!header) return emptyDataset();
		return datasetFromMatrix(header, body);
	}
}
