/**
 * sluice version: Print version info.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Command } from 'commander';
import * as output from '../output.js';

const here = dirname(fileURLToPath(import.meta.url));

export async function getVersion(): Promise<string> {
	// src/commands → package root
	const content = await readFile(resolve(here, '..', '..', 'package.json'), 'utf-8');
	const pkg: unknown = JSON.parse(content);
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return 'unknown';
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					sluice: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`sluice   ${version}`);
			output.info(`node     ${process.version}`);
			output.info(`platform ${process.platform} ${process.arch}`);
		});
}
