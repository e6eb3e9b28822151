/**
 * sluice plan: show which job files the next run would select, without
 * running anything.
 */

import { FileCatalogStore, JobSelector, describeError } from '@sluice/core';
import type { Command } from 'commander';
import * as output from '../output.js';
import { globalOptions, loadProject } from './shared.js';

export function registerPlanCommand(program: Command): void {
	program
		.command('plan')
		.description('Show the jobs the next run would select')
		.action(async (_opts, cmd: Command) => {
			try {
				const { config } = await loadProject(globalOptions(cmd));
				const selector = new JobSelector(new FileCatalogStore(config.jobsDir));
				output.printSelectionPlan(await selector.select());
			} catch (err) {
				output.error(`Plan failed: ${describeError(err)}`);
				process.exitCode = 1;
			}
		});
}
