/**
 * Cleaning steps that rewrite cell values.
 */

import { type CellValue, type Dataset, cellOf, createRow } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import { COLUMN_LIST_SCHEMA, toList } from '../schema.js';
import { NO_PARAMS, type RegisteredStep, defineStep } from './registry.js';

type Scalar = string | number | boolean | null;

const SCALAR_LIST: SchemaObject = {
	type: 'array',
	items: {
		anyOf: [{ type: 'string' }, { type: 'number' }, { type: 'boolean' }, { type: 'null' }],
	},
};

/**
 * Map every cell of the chosen columns through `fn`.
 * Columns missing from the dataset are skipped.
 */
export function mapCells(
	dataset: Dataset,
	columns: readonly string[] | 'all',
	fn: (value: CellValue) => CellValue,
): Dataset {
	const present = new Set(dataset.columns);
	const targets = columns === 'all' ? dataset.columns : columns.filter((c) => present.has(c));
	if (targets.length === 0) return dataset;

	const rows = dataset.rows.map((row) => {
		const next = createRow();
		for (const column of dataset.columns) {
			next[column] = cellOf(row, column);
		}
		for (const column of targets) {
			next[column] = fn(cellOf(row, column));
		}
		return next;
	});
	return { columns: [...dataset.columns], rows };
}

function trimString(value: CellValue): CellValue {
	return typeof value === 'string' ? value.trim() : value;
}

/** Cells match when they are identical, or render to the same text. */
function sameValue(cell: CellValue, candidate: Scalar): boolean {
	if (cell === candidate) return true;
	if (cell === null || candidate === null) return false;
	return String(cell) === String(candidate);
}

const SINONA: ReadonlyMap<string, string> = new Map([
	['sí', 'SI'],
	['si', 'SI'],
	['no', 'NO'],
	['no aplica', 'NA'],
	['n.a.', 'NA'],
]);

export function parseSiNoNa(value: CellValue): CellValue {
	if (typeof value !== 'string') return value;
	return SINONA.get(value.toLowerCase()) ?? value;
}

interface ReplaceValuesParams {
	old_values: Scalar[];
	new_values: Scalar[];
	columns: string | string[];
}

export const valueSteps: RegisteredStep[] = [
	defineStep<Record<string, never>>({
		name: 'empty_asnull',
		description: 'Replace blank strings with null',
		params: NO_PARAMS,
		apply: (dataset) =>
			mapCells(dataset, 'all', (value) =>
				typeof value === 'string' && value.trim() === '' ? null : value,
			),
	}),

	defineStep<{ columns: string | string[] }>({
		name: 'trim_column_values',
		description: 'Trim string values of the listed columns',
		params: {
			type: 'object',
			properties: { columns: COLUMN_LIST_SCHEMA },
			required: ['columns'],
			additionalProperties: false,
		},
		apply: (dataset, { columns }) => mapCells(dataset, toList(columns), trimString),
	}),

	defineStep<Record<string, never>>({
		name: 'trim_all_values',
		description: 'Trim every string value',
		params: NO_PARAMS,
		apply: (dataset) => mapCells(dataset, 'all', trimString),
	}),

	defineStep<{ columns: string | string[] }>({
		name: 'only_numbers_columns',
		description: 'Strip non-digit characters from values of the listed columns',
		params: {
			type: 'object',
			properties: { columns: COLUMN_LIST_SCHEMA },
			required: ['columns'],
			additionalProperties: false,
		},
		apply: (dataset, { columns }) =>
			mapCells(dataset, toList(columns), (value) =>
				value === null ? null : String(value).replace(/\D/g, ''),
			),
	}),

	defineStep<ReplaceValuesParams>({
		name: 'replace_values',
		description: 'Replace old_values[i] with new_values[i] within the listed columns',
		params: {
			type: 'object',
			properties: {
				old_values: SCALAR_LIST,
				new_values: SCALAR_LIST,
				columns: COLUMN_LIST_SCHEMA,
			},
			required: ['old_values', 'new_values', 'columns'],
			additionalProperties: false,
		},
		check: ({ old_values, new_values }) =>
			old_values.length === new_values.length
				? null
				: `old_values has ${old_values.length} entries but new_values has ${new_values.length}`,
		apply: (dataset, { old_values, new_values, columns }) =>
			mapCells(dataset, toList(columns), (value) => {
				const i = old_values.findIndex((candidate) => sameValue(value, candidate));
				return i === -1 ? value : new_values[i];
			}),
	}),

	defineStep<Record<string, never>>({
		name: 'parse_sinona',
		description: 'Normalise Sí/Si/No/No aplica/N.A. answers to SI/NO/NA',
		params: NO_PARAMS,
		apply: (dataset) => mapCells(dataset, 'all', parseSiNoNa),
	}),
];
