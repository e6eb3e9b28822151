import { describe, expect, it } from 'vitest';
import { createTableSql, insertBatches, qualifiedName, quoteIdentifier, toSqlParam, withDatabase } from '../sql.js';

describe('sql builders', () => {
	it('quotes identifiers and doubles embedded quotes', () => {
		expect(quoteIdentifier('my "table"')).toBe('"my ""table"""');
		expect(qualifiedName('t', 'raw')).toBe('"raw"."t"');
	});

	it('creates VARCHAR columns of the requested size', () => {
		expect(createTableSql('"t"', ['A', 'B'], 50, false)).toBe('CREATE TABLE "t" ("A" VARCHAR(50), "B" VARCHAR(50))');
	});

	it('keeps batches under the bind-parameter limit', () => {
		const columns = Array.from({ length: 40_000 }, (_, i) => `C${i}`);
		const row = Object.fromEntries(columns.map((c) => [c, 'x']));
		const batches = insertBatches('"wide"', columns, [row, row], 1000);
		expect(batches.map((b) => b.rows)).toEqual([1, 1]);
	});

	it('produces no batches for an empty dataset', () => {
		expect(insertBatches('"t"', ['A'], [], 10)).toEqual([]);
	});

	it('renders cells as text parameters', () => {
		expect(toSqlParam(new Date('2024-03-05T17:04:09Z'))).toBe('2024-03-05T17:04:09.000Z');
		expect(toSqlParam(true)).toBe('true');
		expect(toSqlParam(1.5)).toBe('1.5');
		expect(toSqlParam(null)).toBeNull();
	});

	it('swaps the database of a connection string', () => {
		expect(withDatabase('postgres://u:p@h:5432/main?sslmode=require', 'other')).toBe(
			'postgres://u:p@h:5432/other?sslmode=require',
		);
		expect(withDatabase('postgres://h/main', undefined)).toBe('postgres://h/main');
	});
});
