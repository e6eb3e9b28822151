/**
 * Local folder source: copies every regular file of a folder into the job's
 * download folder, in name order.
 */

import { copyFile, mkdir, readdir } from 'node:fs/promises';
import { dirname, extname, join, parse } from 'node:path';
import type { DownloadNaming, SourceConnector, SourceContext, SourceOutput } from '@sluice/sdk';
import { DOWNLOAD_NAMING_PROPERTIES, buildDownloadPath, createConfigParser } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';

export interface LocalFolderConfig extends DownloadNaming {
	path: string;
	/** Only copy files with these extensions (without the dot, case-insensitive) */
	extensions?: string[];
}

export const configSchema: SchemaObject = {
	type: 'object',
	required: ['path'],
	properties: {
		path: { type: 'string', minLength: 1, description: 'Folder to copy from' },
		extensions: { type: 'array', items: { type: 'string', minLength: 1 } },
		...DOWNLOAD_NAMING_PROPERTIES,
		// Copies of one run share a timestamp; the original name keeps them apart
		add_original_name: { type: 'boolean', default: true },
	},
};

const parseConfig = createConfigParser<LocalFolderConfig>('localfolder', configSchema);

export class LocalFolderSource implements SourceConnector {
	readonly id = 'localfolder';
	private config: LocalFolderConfig | null = null;

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
	}

	async fetch(context: SourceContext): Promise<SourceOutput> {
		if (!this.config) throw new Error('localfolder source used before init()');
		const { path, extensions } = this.config;
		const wanted = extensions ? new Set(extensions.map((e) => e.replace(/^\./, '').toLowerCase())) : null;

		const dirents = await readdir(path, { withFileTypes: true });
		const names = dirents
			.filter((d) => d.isFile())
			.map((d) => d.name)
			.filter((name) => !wanted || wanted.has(extname(name).replace(/^\./, '').toLowerCase()))
			.sort();

		const now = new Date();
		const files: string[] = [];
		for (const fileName of names) {
			const { name, ext } = parse(fileName);
			const target = buildDownloadPath({
				workDir: context.workDir,
				service: context.service,
				subService: context.subService,
				downloader: this.id,
				extension: ext.replace(/^\./, ''),
				originalName: name,
				naming: this.config,
				timezone: context.timezone,
				now,
			});
			await mkdir(dirname(target), { recursive: true });
			await copyFile(join(path, fileName), target);
			files.push(target);
		}
		return { kind: 'files', files };
	}

	async shutdown(): Promise<void> {
		this.config = null;
	}
}
