/**
 * Cleaning-step registry.
 *
 * A step is a pure function (dataset, params) → dataset with a JSON schema for
 * its params. Binding validates params up front, so a pipeline that resolves
 * never fails on configuration once data starts flowing.
 */

import type { Dataset, StepParams } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import { ConfigurationError } from '../errors.js';
import { compileSchema, formatSchemaErrors } from '../schema.js';

export interface StepDefinition<P> {
	name: string;
	description: string;
	/** Schema the parameter object must satisfy; `{}` is validated for bare steps */
	params: SchemaObject;
	/** Cross-field check run after the schema; returns a problem or null */
	check?(params: P): string | null;
	apply(dataset: Dataset, params: P): Dataset;
}

/** A step with its parameters validated and bound */
export interface BoundStep {
	readonly name: string;
	apply(dataset: Dataset): Dataset;
}

/** A registered step, not yet bound to parameters */
export interface RegisteredStep {
	readonly name: string;
	readonly description: string;
	bind(params: StepParams | undefined): BoundStep;
}

/** Schema for steps that take no parameters */
export const NO_PARAMS: SchemaObject = { type: 'object', additionalProperties: false };

export function defineStep<P>(def: StepDefinition<P>): RegisteredStep {
	const validate = compileSchema<P>(def.params);
	return {
		name: def.name,
		description: def.description,
		bind(params: StepParams | undefined): BoundStep {
			const value = params ?? {};
			if (!validate(value)) {
				throw new ConfigurationError(
					`Invalid parameters for cleaning step "${def.name}": ${formatSchemaErrors(validate.errors)}`,
				);
			}
			const bound: P = value;
			const problem = def.check?.(bound) ?? null;
			if (problem) {
				throw new ConfigurationError(`Invalid parameters for cleaning step "${def.name}": ${problem}`);
			}
			return {
				name: def.name,
				apply: (dataset) => def.apply(dataset, bound),
			};
		},
	};
}

export class StepRegistry {
	private readonly steps = new Map<string, RegisteredStep>();

	/** Register a step. Names are unique. */
	register(step: RegisteredStep): this {
		if (this.steps.has(step.name)) {
			throw new ConfigurationError(`Cleaning step "${step.name}" is already registered`);
		}
		this.steps.set(step.name, step);
		return this;
	}

	get(name: string): RegisteredStep | undefined {
		return this.steps.get(name);
	}

	has(name: string): boolean {
		return this.steps.has(name);
	}

	/** Registered steps in registration order */
	list(): RegisteredStep[] {
		return [...this.steps.values()];
	}
}
