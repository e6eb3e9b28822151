/**
 * sluice run: select jobs from the catalog and run them.
 *
 * The default command. Exit status is 1 when any job failed or the catalog
 * could not be read.
 */

import type { RunSummary } from '@sluice/core';
import { describeError } from '@sluice/core';
import type { Command } from 'commander';
import * as output from '../output.js';
import { createRuntime } from '../runtime.js';
import { type Project, globalOptions, loadProject } from './shared.js';

export interface RunOptions {
	runId?: string;
}

/**
 * Run every selected job of a loaded project. Sinks and loggers are shut
 * down afterwards, whatever happened; shutdown problems become warnings.
 * Throws when the catalog cannot be read.
 */
export async function runProject(project: Project, options: RunOptions = {}): Promise<RunSummary> {
	const runtime = await createRuntime(project.config, project.plugins, { runId: options.runId });
	let summary: RunSummary | undefined;
	try {
		const selection = await runtime.orchestrator.select(runtime.selector);
		summary = await runtime.orchestrator.runAll(selection, runtime.selector);
		return summary;
	} finally {
		const problems = await runtime.close();
		summary?.warnings.push(...problems);
	}
}

export function registerRunCommand(program: Command): void {
	program
		.command('run', { isDefault: true })
		.description('Run the selected jobs')
		.action(async (_opts, cmd: Command) => {
			try {
				const project = await loadProject(globalOptions(cmd));
				const summary = await runProject(project);
				output.printRunSummary(summary);
				if (summary.failed > 0) process.exitCode = 1;
			} catch (err) {
				output.error(`Run failed: ${describeError(err)}`);
				process.exitCode = 1;
			}
		});
}
