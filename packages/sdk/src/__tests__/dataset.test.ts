import { describe, expect, it } from 'vitest';
import {
	cellOf,
	concatDatasets,
	datasetFromMatrix,
	datasetFromRecords,
	isConsistent,
	toCellValue,
	uniqueColumnNames,
} from '../dataset.js';

describe('uniqueColumnNames', () => {
	it('suffixes repeated names', () => {
		expect(uniqueColumnNames(['A', 'B', 'A', 'A'])).toEqual(['A', 'B', 'A.1', 'A.2']);
	});

	it('names blank headers by position', () => {
		expect(uniqueColumnNames(['A', '', 'C'])).toEqual(['A', 'Unnamed: 1', 'C']);
	});
});

describe('datasetFromMatrix', () => {
	it('pads short rows and drops surplus cells', () => {
		const ds = datasetFromMatrix(['A', 'B'], [['1'], ['2', '3', '4']]);
		expect(ds.columns).toEqual(['A', 'B']);
		expect(ds.rows).toEqual([
			{ A: '1', B: null },
			{ A: '2', B: '3' },
		]);
	});

	it('keeps a "__proto__" header as an ordinary column', () => {
		const ds = datasetFromMatrix(['__proto__', 'A'], [['p', 'a']]);
		expect(Object.keys(ds.rows[0])).toEqual(['__proto__', 'A']);
		expect(cellOf(ds.rows[0], '__proto__')).toBe('p');
		expect(isConsistent(ds)).toBe(true);
	});
});

describe('datasetFromRecords', () => {
	it('unions keys in first-seen order', () => {
		const ds = datasetFromRecords([{ a: 1 }, { b: true, a: 2 }]);
		expect(ds.columns).toEqual(['a', 'b']);
		expect(ds.rows).toEqual([
			{ a: 1, b: null },
			{ a: 2, b: true },
		]);
	});

	it('stores nested values as JSON text', () => {
		const ds = datasetFromRecords([{ tags: ['x', 'y'] }]);
		expect(ds.rows[0].tags).toBe('["x","y"]');
	});
});

describe('toCellValue', () => {
	it('maps undefined to null and keeps dates', () => {
		const date = new Date('2024-01-01T00:00:00Z');
		expect(toCellValue(undefined)).toBeNull();
		expect(toCellValue(date)).toBe(date);
		expect(toCellValue(10n)).toBe('10');
	});
});

describe('isConsistent', () => {
	it('accepts a well-formed dataset', () => {
		expect(isConsistent({ columns: ['A'], rows: [{ A: '1' }] })).toBe(true);
	});

	it('rejects a row with a missing column', () => {
		expect(isConsistent({ columns: ['A', 'B'], rows: [{ A: '1' }] })).toBe(false);
	});

	it('rejects a row with an extra column', () => {
		expect(isConsistent({ columns: ['A'], rows: [{ A: '1', B: '2' }] })).toBe(false);
	});

	it('rejects duplicate column names', () => {
		expect(isConsistent({ columns: ['A', 'A'], rows: [] })).toBe(false);
	});
});

describe('cellOf', () => {
	it('reads inherited names as missing', () => {
		expect(cellOf({ A: '1' }, 'A')).toBe('1');
		expect(cellOf({ A: '1' }, 'constructor')).toBeNull();
	});
});

describe('concatDatasets', () => {
	it('unions columns and fills gaps with null', () => {
		const merged = concatDatasets([
			{ columns: ['A', 'B'], rows: [{ A: '1', B: '2' }] },
			{ columns: ['B', 'C'], rows: [{ B: '3', C: '4' }] },
		]);
		expect(merged.columns).toEqual(['A', 'B', 'C']);
		expect(merged.rows).toEqual([
			{ A: '1', B: '2', C: null },
			{ A: null, B: '3', C: '4' },
		]);
	});

	it('fills a column named like an Object method with null where a dataset lacks it', () => {
		const merged = concatDatasets([
			{ columns: ['toString'], rows: [{ toString: 'x' }] },
			{ columns: ['other'], rows: [{ other: 'y' }] },
		]);
		expect(merged.columns).toEqual(['toString', 'other']);
		expect(cellOf(merged.rows[1], 'toString')).toBeNull();
		expect(cellOf(merged.rows[1], 'other')).toBe('y');
		expect(isConsistent(merged)).toBe(true);
	});

	it('returns a single dataset unchanged', () => {
		const only = { columns: ['A'], rows: [{ A: '1' }] };
		expect(concatDatasets([only])).toBe(only);
	});
});
