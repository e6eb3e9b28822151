/**
 * Local path source: copies one file into the job's download folder.
 */

import { copyFile, mkdir, stat } from 'node:fs/promises';
import { dirname, parse } from 'node:path';
import type { DownloadNaming, SourceConnector, SourceContext, SourceOutput } from '@sluice/sdk';
import { DOWNLOAD_NAMING_PROPERTIES, buildDownloadPath, createConfigParser } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';

export interface LocalPathConfig extends DownloadNaming {
	/** File to copy, absolute or relative to the working directory */
	path: string;
}

export const configSchema: SchemaObject = {
	type: 'object',
	required: ['path'],
	properties: {
		path: { type: 'string', minLength: 1, description: 'File to copy' },
		...DOWNLOAD_NAMING_PROPERTIES,
	},
};

const parseConfig = createConfigParser<LocalPathConfig>('localpath', configSchema);

export class LocalPathSource implements SourceConnector {
	readonly id = 'localpath';
	private config: LocalPathConfig | null = null;

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
	}

	async fetch(context: SourceContext): Promise<SourceOutput> {
		if (!this.config) throw new Error('localpath source used before init()');
		const { path } = this.config;

		const info = await stat(path);
		if (!info.isFile()) {
			throw new Error(`${path} is not a file`);
		}

		const { name, ext } = parse(path);
		const target = buildDownloadPath({
			workDir: context.workDir,
			service: context.service,
			subService: context.subService,
			downloader: this.id,
			extension: ext.replace(/^\./, ''),
			originalName: name,
			naming: this.config,
			timezone: context.timezone,
		});

		await mkdir(dirname(target), { recursive: true });
		await copyFile(path, target);
		return { kind: 'files', files: [target] };
	}

	async shutdown(): Promise<void> {
		this.config = null;
	}
}
