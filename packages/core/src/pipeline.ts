/**
 * Transformation pipeline.
 *
 * resolvePipeline binds an ordered list of step specs against a registry,
 * failing with ConfigurationError before any data is touched.
 * applyPipeline runs the bound steps strictly in order and stops at the first
 * step that throws.
 */

import type { CleaningStepSpec, Dataset } from '@sluice/sdk';
import { isConsistent } from '@sluice/sdk';
import { ConfigurationError, TransformError } from './errors.js';
import type { BoundStep, StepRegistry } from './steps/registry.js';

export interface StepReport {
	step: string;
	/** Zero-based position in the pipeline */
	index: number;
	rows: number;
	columns: number;
	durationMs: number;
}

export interface PipelineOptions {
	/** Called after each step completes */
	onStep?: (report: StepReport) => void;
}

/**
 * Resolve step specs into bound steps.
 */
export function resolvePipeline(specs: readonly CleaningStepSpec[], registry: StepRegistry): BoundStep[] {
	return specs.map((spec, i) => {
		const step = registry.get(spec.name);
		if (!step) {
			throw new ConfigurationError(`Unknown cleaning step "${spec.name}" at position ${i + 1}`);
		}
		try {
			return step.bind(spec.params);
		} catch (err) {
			if (err instanceof ConfigurationError) {
				throw new ConfigurationError(`Cleaning step ${i + 1}: ${err.message}`, { cause: err });
			}
			throw err;
		}
	});
}

/**
 * Apply bound steps in order. An empty list returns the dataset unchanged.
 */
export function applyPipeline(
	dataset: Dataset,
	steps: readonly BoundStep[],
	options?: PipelineOptions,
): Dataset {
	let current = dataset;
	steps.forEach((step, index) => {
		const startTime = Date.now();
		let next: Dataset;
		try {
			next = step.apply(current);
		} catch (err) {
			if (err instanceof TransformError) throw err;
			throw new TransformError(step.name, `Cleaning step "${step.name}" failed`, { cause: err });
		}

		if (!isConsistent(next)) {
			throw new TransformError(
				step.name,
				`Cleaning step "${step.name}" left rows that do not match the column list`,
			);
		}

		options?.onStep?.({
			step: step.name,
			index,
			rows: next.rows.length,
			columns: next.columns.length,
			durationMs: Date.now() - startTime,
		});
		current = next;
	});
	return current;
}
