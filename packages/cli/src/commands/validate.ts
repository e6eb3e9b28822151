/**
 * sluice validate: parse every job file and resolve what each record refers
 * to: source, processor, cleaning steps, sinks and statement files.
 *
 * Disabled files and records are checked too. Nothing is fetched or loaded.
 */

import { type CatalogEntry, FileCatalogStore, describeError } from '@sluice/core';
import type { Command } from 'commander';
import * as output from '../output.js';
import { createRuntime } from '../runtime.js';
import { type Project, globalOptions, loadProject } from './shared.js';

export interface RecordReport {
	file: string;
	job: string;
	problems: string[];
}

export async function validateProject(project: Project): Promise<RecordReport[]> {
	const store = new FileCatalogStore(project.config.jobsDir);
	const entries: CatalogEntry[] = await store.scan();
	entries.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

	const runtime = await createRuntime(project.config, project.plugins, { quiet: true });
	const reports: RecordReport[] = [];
	try {
		for (const entry of entries) {
			for (const record of entry.records) {
				if (!record.ok) {
					reports.push({ file: entry.id, job: record.label, problems: [record.error.message] });
					continue;
				}
				const problems = await runtime.orchestrator.check(record.job);
				reports.push({ file: entry.id, job: record.job.name, problems: problems.map((p) => p.message) });
			}
		}
	} finally {
		for (const problem of await runtime.close()) output.warn(problem);
	}
	return reports;
}

export function registerValidateCommand(program: Command): void {
	program
		.command('validate')
		.description('Check every job file without running anything')
		.action(async (_opts, cmd: Command) => {
			try {
				const spin = output.spinner('Checking job files…');
				let reports: RecordReport[];
				try {
					reports = await validateProject(await loadProject(globalOptions(cmd)));
				} finally {
					spin.stop();
				}
				output.printValidationReport(reports);
				if (reports.some((r) => r.problems.length > 0)) process.exitCode = 1;
			} catch (err) {
				output.error(`Validation failed: ${describeError(err)}`);
				process.exitCode = 1;
			}
		});
}
