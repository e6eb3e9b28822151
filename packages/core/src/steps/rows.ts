/**
 * Cleaning steps that drop rows.
 */

import { type CellValue, type Dataset, type Row, cellOf } from '@sluice/sdk';
import { NO_PARAMS, type RegisteredStep, defineStep } from './registry.js';

function isEmpty(value: CellValue): boolean {
	return value === null || value === undefined || value === '';
}

/** Key that tells cells of different types apart ("1" vs 1, dates by instant). */
function cellKey(value: CellValue): string {
	if (value instanceof Date) return `d:${value.toISOString()}`;
	if (value === null) return 'n:';
	return `${typeof value}:${String(value)}`;
}

export function rowKey(row: Row, columns: readonly string[]): string {
	return JSON.stringify(columns.map((column) => cellKey(cellOf(row, column))));
}

export const rowSteps: RegisteredStep[] = [
	defineStep<Record<string, never>>({
		name: 'remove_empty_rows',
		description: 'Drop rows where every value is null or an empty string',
		params: NO_PARAMS,
		apply: (dataset: Dataset) => ({
			columns: [...dataset.columns],
			rows: dataset.rows.filter((row) => dataset.columns.some((column) => !isEmpty(cellOf(row, column)))),
		}),
	}),

	defineStep<Record<string, never>>({
		name: 'remove_duplicate_rows',
		description: 'Drop rows identical to an earlier row, keeping the first',
		params: NO_PARAMS,
		apply: (dataset: Dataset) => {
			const seen = new Set<string>();
			const rows = dataset.rows.filter((row) => {
				const key = rowKey(row, dataset.columns);
				if (seen.has(key)) return false;
				seen.add(key);
				return true;
			});
			return { columns: [...dataset.columns], rows };
		},
	}),
];
