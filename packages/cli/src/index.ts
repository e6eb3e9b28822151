#!/usr/bin/env tsx
/**
 * sluice: command line entry point.
 *
 * `sluice` with no command runs the selected jobs.
 */

import { Command } from 'commander';
import { registerPlanCommand } from './commands/plan.js';
import { registerRunCommand } from './commands/run.js';
import { registerStepsCommand } from './commands/steps.js';
import { registerValidateCommand } from './commands/validate.js';
import { getVersion, registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

const program = new Command();

program
	.name('sluice')
	.description('Configuration-driven ETL runner')
	.version(await getVersion(), '-V, --version')
	.option('-c, --config <path>', 'Project config file', 'sluice.yaml')
	.option('--jobs-dir <dir>', 'Job file directory (overrides jobs_dir)')
	.option('--json', 'Machine-readable output')
	.option('-q, --quiet', 'Only print errors')
	.option('-v, --verbose', 'Print extra detail')
	.hook('preAction', (thisCommand) => {
		const opts = thisCommand.opts();
		output.setJsonMode(opts.json === true);
		output.setQuietMode(opts.quiet === true);
		output.setVerboseMode(opts.verbose === true);
	});

registerRunCommand(program);
registerPlanCommand(program);
registerValidateCommand(program);
registerStepsCommand(program);
registerVersionCommand(program);

await program.parseAsync(process.argv);
