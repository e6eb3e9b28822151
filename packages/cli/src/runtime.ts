/**
 * Runtime assembly: turns a project config and a plugin set into a ready
 * orchestrator, selector and the resources to release afterwards.
 */

import {
	ConfigurationError,
	FileCatalogStore,
	FileStatementStore,
	JobSelector,
	LoggerManager,
	Orchestrator,
	checkConfig,
	describeError,
} from '@sluice/core';
import type { ConnectorRegistration, SinkConnector } from '@sluice/sdk';
import type { ProjectConfig } from './config.js';
import type { PluginSet } from './plugins.js';

export interface Runtime {
	orchestrator: Orchestrator;
	selector: JobSelector;
	/** Shut down sinks and loggers. Problems are reported, not thrown. */
	close(): Promise<string[]>;
}

export interface RuntimeOptions {
	/** Skip loggers; used by commands that print their own output */
	quiet?: boolean;
	runId?: string;
}

function sourceRegistrations(plugins: PluginSet): Map<string, ConnectorRegistration> {
	const sources = new Map<string, ConnectorRegistration>();
	for (const [id, registration] of plugins.connectors) {
		if (registration.source) sources.set(id, registration);
	}
	return sources;
}

async function createSinks(config: ProjectConfig, plugins: PluginSet): Promise<Map<string, SinkConnector>> {
	const sinks = new Map<string, SinkConnector>();
	for (const def of config.sinks) {
		const registration = plugins.connectors.get(def.connector);
		if (!registration?.sink) {
			throw new ConfigurationError(`Sink "${def.id}" uses unknown sink connector "${def.connector}"`);
		}
		const problem = checkConfig(registration.configSchema, def.config);
		if (problem) {
			throw new ConfigurationError(`Invalid config for sink "${def.id}": ${problem}`);
		}
		const sink = new registration.sink();
		try {
			await sink.init(def.config);
		} catch (err) {
			throw new ConfigurationError(`Failed to initialize sink "${def.id}"`, { cause: err });
		}
		sinks.set(def.id, sink);
	}
	return sinks;
}

async function createLoggers(config: ProjectConfig, plugins: PluginSet): Promise<LoggerManager> {
	const manager = new LoggerManager();
	for (const def of config.loggers) {
		const registration = plugins.loggers.get(def.type);
		if (!registration) {
			throw new ConfigurationError(`Logger "${def.name}" uses unknown logger type "${def.type}"`);
		}
		const problem = checkConfig(registration.configSchema, def.config);
		if (problem) {
			throw new ConfigurationError(`Invalid config for logger "${def.name}": ${problem}`);
		}
		const logger = new registration.logger();
		await logger.init(def.config);
		manager.addLogger(logger);
	}
	return manager;
}

export async function createRuntime(
	config: ProjectConfig,
	plugins: PluginSet,
	options: RuntimeOptions = {},
): Promise<Runtime> {
	const loggers = options.quiet ? new LoggerManager() : await createLoggers(config, plugins);
	const sinks = await createSinks(config, plugins);

	const orchestrator = new Orchestrator({
		sources: sourceRegistrations(plugins),
		processors: plugins.processors,
		sinks,
		statements: new FileStatementStore(config.queriesDir),
		loggers,
		workDir: config.workDir,
		timezone: config.timezone,
		runId: options.runId,
	});

	return {
		orchestrator,
		selector: new JobSelector(new FileCatalogStore(config.jobsDir)),
		async close() {
			const problems: string[] = [];
			for (const [id, sink] of sinks) {
				try {
					await sink.shutdown();
				} catch (err) {
					problems.push(`Sink "${id}" shutdown failed: ${describeError(err)}`);
				}
			}
			await loggers.shutdown();
			return problems;
		},
	};
}
