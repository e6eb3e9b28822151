import { createTestDataset } from '@sluice/sdk';
import { describe, expect, it } from 'vitest';
import { ConfigurationError, TransformError } from '../errors.js';
import { type StepReport, applyPipeline, resolvePipeline } from '../pipeline.js';
import { createDefaultRegistry, defineStep, NO_PARAMS, StepRegistry } from '../steps/index.js';

const registry = createDefaultRegistry();

describe('resolvePipeline', () => {
	it('resolves an empty list to an identity pipeline', () => {
		const dataset = createTestDataset();
		expect(applyPipeline(dataset, resolvePipeline([], registry))).toEqual(dataset);
	});

	it('names the position of an unknown step', () => {
		expect(() =>
			resolvePipeline([{ name: 'trim_column_names' }, { name: 'make_coffee' }], registry),
		).toThrow('Unknown cleaning step "make_coffee" at position 2');
	});

	it('rejects parameters that fail the schema', () => {
		expect(() =>
			resolvePipeline([{ name: 'truncate_column_names', params: { length: 0 } }], registry),
		).toThrow(ConfigurationError);
	});

	it('rejects parameters on a step that takes none', () => {
		expect(() => resolvePipeline([{ name: 'empty_asnull', params: { columns: 'A' } }], registry)).toThrow(
			ConfigurationError,
		);
	});
});

describe('applyPipeline', () => {
	it('runs steps in order and reports each one', () => {
		const reports: StepReport[] = [];
		const steps = resolvePipeline(
			[{ name: 'filter_columns', params: { columns: ['NAME'] } }, { name: 'normalize_column_names' }],
			registry,
		);
		const out = applyPipeline(createTestDataset(), steps, { onStep: (r) => reports.push(r) });

		expect(out).toEqual({ columns: ['NAME'], rows: [{ NAME: 'Ana' }, { NAME: 'Luis' }] });
		expect(reports.map((r) => [r.step, r.index, r.rows, r.columns])).toEqual([
			['filter_columns', 0, 2, 1],
			['normalize_column_names', 1, 2, 1],
		]);
	});

	it('does not mutate the input dataset', () => {
		const dataset = createTestDataset();
		applyPipeline(dataset, resolvePipeline([{ name: 'normalize_column_names' }, { name: 'empty_asnull' }], registry));
		expect(dataset).toEqual(createTestDataset());
	});

	it('wraps a step error in TransformError and stops', () => {
		let laterStepRan = false;
		const custom = new StepRegistry()
			.register(
				defineStep<Record<string, never>>({
					name: 'explode',
					description: 'Always fails',
					params: NO_PARAMS,
					apply: () => {
						throw new Error('boom');
					},
				}),
			)
			.register(
				defineStep<Record<string, never>>({
					name: 'after',
					description: 'Records that it ran',
					params: NO_PARAMS,
					apply: (dataset) => {
						laterStepRan = true;
						return dataset;
					},
				}),
			);

		let caught: unknown;
		try {
			applyPipeline(createTestDataset(), resolvePipeline([{ name: 'explode' }, { name: 'after' }], custom));
		} catch (err) {
			caught = err;
		}

		expect(caught).toBeInstanceOf(TransformError);
		expect(caught instanceof TransformError && caught.step).toBe('explode');
		expect(caught instanceof Error && caught.message).toBe('Cleaning step "explode" failed');
		expect(laterStepRan).toBe(false);
	});

	it('rejects a step that breaks the dataset shape', () => {
		const custom = new StepRegistry().register(
			defineStep<Record<string, never>>({
				name: 'drop_header',
				description: 'Loses a column name but keeps the cells',
				params: NO_PARAMS,
				apply: (dataset) => ({ columns: dataset.columns.slice(1), rows: dataset.rows }),
			}),
		);
		expect(() => applyPipeline(createTestDataset(), resolvePipeline([{ name: 'drop_header' }], custom))).toThrow(
			'Cleaning step "drop_header" left rows that do not match the column list',
		);
	});
});
