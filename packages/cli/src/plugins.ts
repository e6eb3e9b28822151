/**
 * Plugin resolution: built-in registrations plus the packages a project
 * lists under `plugins`.
 *
 * A plugin module exports a `register()` function (default or named) that
 * returns a connector, processor or logger registration.
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import registerHttp from '@sluice/connector-http';
import registerLocalFolder from '@sluice/connector-localfolder';
import registerLocalPath from '@sluice/connector-localpath';
import registerPostgres from '@sluice/connector-postgres';
import { ConfigurationError } from '@sluice/core';
import registerConsole from '@sluice/logger-console';
import registerCsv from '@sluice/processor-csv';
import registerExcel from '@sluice/processor-excel';
import type { ConnectorRegistration, LoggerRegistration, ProcessorRegistration } from '@sluice/sdk';

export interface PluginSet {
	connectors: Map<string, ConnectorRegistration>;
	processors: Map<string, ProcessorRegistration>;
	loggers: Map<string, LoggerRegistration>;
}

export type Registration = ConnectorRegistration | ProcessorRegistration | LoggerRegistration;

function hasId(value: unknown): value is { id: string } {
	return typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string';
}

export function isProcessorRegistration(value: unknown): value is ProcessorRegistration {
	return hasId(value) && 'processor' in value && typeof value.processor === 'function';
}

export function isLoggerRegistration(value: unknown): value is LoggerRegistration {
	return hasId(value) && 'logger' in value && typeof value.logger === 'function';
}

export function isConnectorRegistration(value: unknown): value is ConnectorRegistration {
	if (!hasId(value)) return false;
	const source = 'source' in value ? value.source : undefined;
	const sink = 'sink' in value ? value.sink : undefined;
	return typeof source === 'function' || typeof sink === 'function';
}

export function emptyPluginSet(): PluginSet {
	return { connectors: new Map(), processors: new Map(), loggers: new Map() };
}

/** Add a registration under its id. Later registrations replace earlier ones. */
export function addRegistration(set: PluginSet, registration: Registration): void {
	if (isProcessorRegistration(registration)) {
		set.processors.set(registration.id, registration);
	} else if (isLoggerRegistration(registration)) {
		set.loggers.set(registration.id, registration);
	} else {
		set.connectors.set(registration.id, registration);
	}
}

export function builtinPlugins(): PluginSet {
	const set = emptyPluginSet();
	for (const register of [
		registerLocalPath,
		registerLocalFolder,
		registerHttp,
		registerPostgres,
		registerCsv,
		registerExcel,
		registerConsole,
	]) {
		addRegistration(set, register());
	}
	return set;
}

function moduleUrl(specifier: string, baseDir: string): string {
	if (specifier.startsWith('.') || isAbsolute(specifier)) {
		return pathToFileURL(resolve(baseDir, specifier)).href;
	}
	return specifier;
}

function registerFunction(mod: unknown): (() => unknown) | null {
	if (typeof mod !== 'object' || mod === null) return null;
	if ('register' in mod && typeof mod.register === 'function') {
		const register = mod.register;
		return () => register();
	}
	if ('default' in mod && typeof mod.default === 'function') {
		const register = mod.default;
		return () => register();
	}
	return null;
}

/**
 * Import a plugin module and return its registration.
 * Relative specifiers resolve against `baseDir`.
 */
export async function importPlugin(specifier: string, baseDir: string): Promise<Registration> {
	let mod: unknown;
	try {
		mod = await import(moduleUrl(specifier, baseDir));
	} catch (err) {
		throw new ConfigurationError(`Cannot load plugin "${specifier}"`, { cause: err });
	}

	const register = registerFunction(mod);
	if (!register) {
		throw new ConfigurationError(`Plugin "${specifier}" does not export a register() function`);
	}
	const registration = register();
	if (
		isProcessorRegistration(registration) ||
		isLoggerRegistration(registration) ||
		isConnectorRegistration(registration)
	) {
		return registration;
	}
	throw new ConfigurationError(
		`Plugin "${specifier}" register() did not return a connector, processor or logger registration`,
	);
}

/** Built-ins plus every listed plugin, in order. */
export async function resolvePlugins(specifiers: readonly string[], baseDir: string): Promise<PluginSet> {
	const set = builtinPlugins();
	for (const specifier of specifiers) {
		addRegistration(set, await importPlugin(specifier, baseDir));
	}
	return set;
}
