import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MockSink } from '@sluice/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
	addRegistration,
	builtinPlugins,
	importPlugin,
	isConnectorRegistration,
	isLoggerRegistration,
	isProcessorRegistration,
	resolvePlugins,
} from '../plugins.js';

describe('builtinPlugins', () => {
	it('registers the bundled connectors, processors and logger', () => {
		const set = builtinPlugins();
		expect([...set.connectors.keys()]).toEqual(['localpath', 'localfolder', 'http', 'postgres']);
		expect([...set.processors.keys()]).toEqual(['csv', 'excel']);
		expect([...set.loggers.keys()]).toEqual(['console']);
		expect(set.connectors.get('postgres')?.sink).toBeDefined();
		expect(set.connectors.get('postgres')?.source).toBeUndefined();
	});

	it('lets a later registration replace a built-in one', () => {
		const set = builtinPlugins();
		class MemorySink extends MockSink {}
		addRegistration(set, { id: 'postgres', sink: MemorySink });
		expect(set.connectors.get('postgres')?.sink).toBe(MemorySink);
	});
});

describe('registration guards', () => {
	class Anything {}

	it('tells the registration kinds apart', () => {
		expect(isProcessorRegistration({ id: 'p', processor: Anything })).toBe(true);
		expect(isLoggerRegistration({ id: 'l', logger: Anything })).toBe(true);
		expect(isConnectorRegistration({ id: 's', sink: Anything })).toBe(true);
		expect(isConnectorRegistration({ id: 's', source: Anything })).toBe(true);
	});

	it('rejects shapes without an id or class', () => {
		expect(isConnectorRegistration({ id: 's' })).toBe(false);
		expect(isProcessorRegistration({ processor: Anything })).toBe(false);
		expect(isLoggerRegistration({ id: 'l', logger: 'console' })).toBe(false);
		expect(isConnectorRegistration(null)).toBe(false);
	});
});

describe('importPlugin', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'sluice-plugin-'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('loads a relative module through its named register()', async () => {
		await writeFile(
			join(dir, 'fixed-width.mjs'),
			'export function register() { return { id: "fixed-width", processor: class {} }; }\n',
		);

		const set = await resolvePlugins(['./fixed-width.mjs'], dir);

		expect(set.processors.get('fixed-width')?.id).toBe('fixed-width');
		expect(set.processors.has('csv')).toBe(true);
	});

	it('accepts a default-exported register()', async () => {
		await writeFile(
			join(dir, 'audit.mjs'),
			'export default function register() { return { id: "audit", logger: class {} }; }\n',
		);
		const registration = await importPlugin('./audit.mjs', dir);
		expect(isLoggerRegistration(registration)).toBe(true);
	});

	it('rejects a module without register()', async () => {
		await writeFile(join(dir, 'empty.mjs'), 'export const id = "empty";\n');
		await expect(importPlugin('./empty.mjs', dir)).rejects.toThrow(
			'Plugin "./empty.mjs" does not export a register() function',
		);
	});

	it('rejects a registration of unknown shape', async () => {
		await writeFile(join(dir, 'odd.mjs'), 'export function register() { return { id: "odd" }; }\n');
		await expect(importPlugin('./odd.mjs', dir)).rejects.toThrow(
			'Plugin "./odd.mjs" register() did not return a connector, processor or logger registration',
		);
	});

	it('reports a module that cannot be found', async () => {
		await expect(importPlugin('./missing.mjs', dir)).rejects.toThrow('Cannot load plugin "./missing.mjs"');
	});
});
