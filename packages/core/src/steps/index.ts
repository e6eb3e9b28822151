/**
 * Built-in cleaning steps.
 */

import { columnSteps } from './columns.js';
import { StepRegistry } from './registry.js';
import { rowSteps } from './rows.js';
import { valueSteps } from './values.js';

export const builtinSteps = [...rowSteps, ...valueSteps, ...columnSteps];

/** A registry holding every built-in step */
export function createDefaultRegistry(): StepRegistry {
	const registry = new StepRegistry();
	for (const step of builtinSteps) {
		registry.register(step);
	}
	return registry;
}

export { NO_PARAMS, StepRegistry, defineStep } from './registry.js';
export type { BoundStep, RegisteredStep, StepDefinition } from './registry.js';
export { normalizeColumnName, renameColumns, selectColumns, stripSpecialChars, trimColumnName } from './columns.js';
export { mapCells, parseSiNoNa } from './values.js';
export { rowKey } from './rows.js';
