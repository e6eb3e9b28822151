/**
 * Pieces shared by the commands: global option parsing and project loading.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { type ProjectConfig, loadProjectConfig } from '../config.js';
import { type PluginSet, resolvePlugins } from '../plugins.js';

export interface ProjectOptions {
	config?: string;
	jobsDir?: string;
}

/** Options given on the root program, wherever the subcommand sits */
export function globalOptions(cmd: Command): ProjectOptions {
	const opts: Record<string, unknown> = cmd.optsWithGlobals();
	return {
		config: typeof opts.config === 'string' ? opts.config : undefined,
		jobsDir: typeof opts.jobsDir === 'string' ? opts.jobsDir : undefined,
	};
}

export interface Project {
	config: ProjectConfig;
	plugins: PluginSet;
}

export async function loadProject(options: ProjectOptions, cwd = process.cwd()): Promise<Project> {
	const config = await loadProjectConfig({ configPath: options.config, cwd });
	if (options.jobsDir) {
		config.jobsDir = resolve(cwd, options.jobsDir);
	}
	const plugins = await resolvePlugins(config.plugins, config.projectDir);
	return { config, plugins };
}
