/**
 * sluice steps: list the registered cleaning steps.
 */

import { createDefaultRegistry } from '@sluice/core';
import type { Command } from 'commander';
import * as output from '../output.js';

export function registerStepsCommand(program: Command): void {
	program
		.command('steps')
		.description('List the cleaning steps jobs can use')
		.action(() => {
			const steps = createDefaultRegistry()
				.list()
				.map((s) => ({ name: s.name, description: s.description }));
			output.table(
				[
					{ header: 'STEP', key: 'name' },
					{ header: 'DESCRIPTION', key: 'description' },
				],
				steps,
			);
		});
}
