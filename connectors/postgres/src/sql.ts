/**
 * SQL text builders for the Postgres sink.
 *
 * Every column is created as VARCHAR(n); cells are sent as text parameters.
 */

import type { CellValue, Row } from '@sluice/sdk';

/** Postgres caps a statement at 65535 bind parameters */
export const MAX_PARAMETERS = 65_535;

export type SqlParam = string | null;

export interface InsertBatch {
	text: string;
	values: SqlParam[];
	rows: number;
}

export function quoteIdentifier(input: string): string {
	return `"${input.replace(/"/g, '""')}"`;
}

export function qualifiedName(table: string, schema?: string): string {
	return schema ? `${quoteIdentifier(schema)}.${quoteIdentifier(table)}` : quoteIdentifier(table);
}

export function dropTableSql(name: string): string {
	return `DROP TABLE IF EXISTS ${name}`;
}

export function createTableSql(name: string, columns: readonly string[], size: number, ifNotExists: boolean): string {
	const definitions = columns.map((column) => `${quoteIdentifier(column)} VARCHAR(${size})`).join(', ');
	return `CREATE TABLE ${ifNotExists ? 'IF NOT EXISTS ' : ''}${name} (${definitions})`;
}

export function toSqlParam(value: CellValue): SqlParam {
	if (value === null) return null;
	if (value instanceof Date) return value.toISOString();
	return String(value);
}

/**
 * Split rows into multi-row INSERT statements of at most `batchSize` rows,
 * staying under the bind-parameter limit.
 */
export function insertBatches(
	name: string,
	columns: readonly string[],
	rows: readonly Row[],
	batchSize: number,
): InsertBatch[] {
	if (columns.length === 0 || rows.length === 0) return [];

	const perBatch = Math.max(1, Math.min(batchSize, Math.floor(MAX_PARAMETERS / columns.length)));
	const columnList = columns.map(quoteIdentifier).join(', ');
	const batches: InsertBatch[] = [];

	for (let start = 0; start < rows.length; start += perBatch) {
		const chunk = rows.slice(start, start + perBatch);
		const values: SqlParam[] = [];
		const tuples = chunk.map((row) => {
			const placeholders = columns.map((column) => {
				values.push(toSqlParam(row[column]));
				return `$${values.length}`;
			});
			return `(${placeholders.join(', ')})`;
		});
		batches.push({
			text: `INSERT INTO ${name} (${columnList}) VALUES ${tuples.join(', ')}`,
			values,
			rows: chunk.length,
		});
	}
	return batches;
}

/** Point a connection string at another database on the same server. */
export function withDatabase(connectionString: string, database: string | undefined): string {
	if (!database) return connectionString;
	const url = new URL(connectionString);
	url.pathname = `/${encodeURIComponent(database)}`;
	return url.toString();
}
