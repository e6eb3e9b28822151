/**
 * Cleaning steps that rename, drop, or select columns.
 */

import { type Dataset, cellOf, createRow } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import { TransformError } from '../errors.js';
import { COLUMN_LIST_SCHEMA, toList } from '../schema.js';
import { NO_PARAMS, type RegisteredStep, defineStep } from './registry.js';

interface ColumnsParams {
	columns: string | string[];
}

const COLUMNS_PARAMS: SchemaObject = {
	type: 'object',
	properties: { columns: COLUMN_LIST_SCHEMA },
	required: ['columns'],
	additionalProperties: false,
};

/**
 * Rename every column through `rename`.
 * Fails when two columns end up with the same name.
 */
export function renameColumns(dataset: Dataset, step: string, rename: (name: string) => string): Dataset {
	const columns = dataset.columns.map(rename);

	const origin = new Map<string, string>();
	columns.forEach((name, i) => {
		const previous = origin.get(name);
		if (previous !== undefined) {
			throw new TransformError(
				step,
				`Column names "${previous}" and "${dataset.columns[i]}" both become "${name}"`,
			);
		}
		origin.set(name, dataset.columns[i]);
	});

	const rows = dataset.rows.map((row) => {
		const renamed = createRow();
		dataset.columns.forEach((old, i) => {
			renamed[columns[i]] = cellOf(row, old);
		});
		return renamed;
	});
	return { columns, rows };
}

/** Project the dataset onto `keep`, in the given order. */
export function selectColumns(dataset: Dataset, keep: readonly string[]): Dataset {
	const rows = dataset.rows.map((row) => {
		const selected = createRow();
		for (const column of keep) {
			selected[column] = cellOf(row, column);
		}
		return selected;
	});
	return { columns: [...keep], rows };
}

export function trimColumnName(name: string): string {
	return name
		.trim()
		.replace(/[\r\n]/g, '')
		.split(/\s+/)
		.filter((part) => part !== '')
		.join(' ');
}

export function stripSpecialChars(name: string): string {
	return name.replace(/[^\p{L}\p{N}_]/gu, '');
}

/** Fold accents, keep [A-Za-z0-9_], uppercase. */
export function normalizeColumnName(name: string): string {
	return name
		.normalize('NFD')
		.replace(/\p{M}/gu, '')
		.replace(/[^A-Za-z0-9_]/g, '')
		.toUpperCase();
}

export const columnSteps: RegisteredStep[] = [
	defineStep<Record<string, never>>({
		name: 'trim_column_names',
		description: 'Trim column names, drop line breaks, collapse inner whitespace',
		params: NO_PARAMS,
		apply: (dataset) => renameColumns(dataset, 'trim_column_names', trimColumnName),
	}),

	defineStep<{ length: number }>({
		name: 'truncate_column_names',
		description: 'Cut column names to at most `length` characters (code points)',
		params: {
			type: 'object',
			properties: { length: { type: 'integer', minimum: 1 } },
			required: ['length'],
			additionalProperties: false,
		},
		apply: (dataset, { length }) =>
			renameColumns(dataset, 'truncate_column_names', (name) => [...name].slice(0, length).join('')),
	}),

	defineStep<Record<string, never>>({
		name: 'remove_specialchars_from_column_names',
		description: 'Strip characters other than letters, digits and underscore from column names',
		params: NO_PARAMS,
		apply: (dataset) =>
			renameColumns(dataset, 'remove_specialchars_from_column_names', stripSpecialChars),
	}),

	defineStep<Record<string, never>>({
		name: 'normalize_column_names',
		description: 'Strip special characters and accents from column names, then uppercase them',
		params: NO_PARAMS,
		apply: (dataset) => renameColumns(dataset, 'normalize_column_names', normalizeColumnName),
	}),

	defineStep<ColumnsParams>({
		name: 'ignore_columns',
		description: 'Drop the listed columns; absent ones are ignored',
		params: COLUMNS_PARAMS,
		apply: (dataset, { columns }) => {
			const drop = new Set(toList(columns));
			return selectColumns(
				dataset,
				dataset.columns.filter((column) => !drop.has(column)),
			);
		},
	}),

	defineStep<ColumnsParams>({
		name: 'filter_columns',
		description: 'Keep only the listed columns, in listed order; absent ones are ignored',
		params: COLUMNS_PARAMS,
		apply: (dataset, { columns }) => {
			const present = new Set(dataset.columns);
			const keep = [...new Set(toList(columns))].filter((column) => present.has(column));
			return selectColumns(dataset, keep);
		},
	}),
];
