/**
 * Dataset helpers: building, checking, and combining tabular datasets.
 */

import type { CellValue, Dataset, Row } from './types.js';

/** Check whether a value can be stored in a cell as-is. */
export function isCellValue(value: unknown): value is CellValue {
	return (
		value === null ||
		typeof value === 'string' ||
		typeof value === 'number' ||
		typeof value === 'boolean' ||
		value instanceof Date
	);
}

/**
 * Coerce an arbitrary value into a cell.
 * `undefined` becomes null; objects and arrays are stored as JSON text.
 */
export function toCellValue(value: unknown): CellValue {
	if (value === undefined) return null;
	if (isCellValue(value)) return value;
	if (typeof value === 'bigint') return value.toString();
	return JSON.stringify(value) ?? null;
}

/** A row with no prototype, so any column name, "__proto__" included, is an own key */
export function createRow(): Row {
	return Object.create(null);
}

/** Own cell of a row; a column the row lacks reads as null */
export function cellOf(row: Row, column: string): CellValue {
	return Object.hasOwn(row, column) ? row[column] : null;
}

/** An empty dataset with no columns and no rows */
export function emptyDataset(): Dataset {
	return { columns: [], rows: [] };
}

/**
 * Make header names unique the way spreadsheet readers do:
 * blanks become "Unnamed: <i>", repeats get ".1", ".2", … suffixes.
 */
export function uniqueColumnNames(names: readonly string[]): string[] {
	const seen = new Set<string>();
	const result: string[] = [];
	names.forEach((raw, i) => {
		const base = raw === '' ? `Unnamed: ${i}` : raw;
		let name = base;
		let n = 0;
		while (seen.has(name)) {
			n++;
			name = `${base}.${n}`;
		}
		seen.add(name);
		result.push(name);
	});
	return result;
}

/**
 * Build a dataset from a header row and positional body rows.
 * Short rows are padded with null; surplus cells are dropped.
 */
export function datasetFromMatrix(header: readonly unknown[], body: readonly unknown[][]): Dataset {
	const columns = uniqueColumnNames(header.map((h) => (h === null || h === undefined ? '' : String(h))));
	const rows = body.map((cells) => {
		const row = createRow();
		columns.forEach((column, i) => {
			row[column] = toCellValue(cells[i]);
		});
		return row;
	});
	return { columns, rows };
}

/**
 * Build a dataset from loosely shaped records.
 * Columns are the union of record keys in first-seen order.
 */
export function datasetFromRecords(records: readonly Record<string, unknown>[]): Dataset {
	const columns: string[] = [];
	const known = new Set<string>();
	for (const record of records) {
		for (const key of Object.keys(record)) {
			if (!known.has(key)) {
				known.add(key);
				columns.push(key);
			}
		}
	}
	const rows = records.map((record) => {
		const row = createRow();
		for (const column of columns) {
			row[column] = toCellValue(Object.hasOwn(record, column) ? record[column] : undefined);
		}
		return row;
	});
	return { columns, rows };
}

/**
 * Check the dataset shape invariant: unique column names, and every row
 * holding exactly those columns.
 */
export function isConsistent(dataset: Dataset): boolean {
	const columns = new Set(dataset.columns);
	if (columns.size !== dataset.columns.length) return false;
	for (const row of dataset.rows) {
		const keys = Object.keys(row);
		if (keys.length !== columns.size) return false;
		for (const key of keys) {
			if (!columns.has(key)) return false;
		}
	}
	return true;
}

/**
 * Concatenate datasets row-wise.
 * Columns are unioned in first-seen order; cells a dataset lacks are null.
 */
export function concatDatasets(datasets: readonly Dataset[]): Dataset {
	if (datasets.length === 1) return datasets[0];

	const columns: string[] = [];
	const known = new Set<string>();
	for (const dataset of datasets) {
		for (const column of dataset.columns) {
			if (!known.has(column)) {
				known.add(column);
				columns.push(column);
			}
		}
	}

	const rows: Row[] = [];
	for (const dataset of datasets) {
		for (const source of dataset.rows) {
			const row = createRow();
			for (const column of columns) {
				row[column] = cellOf(source, column);
			}
			rows.push(row);
		}
	}
	return { columns, rows };
}
