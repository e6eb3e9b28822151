/**
 * Download path naming shared by file-producing sources.
 *
 * Files land in <workDir>/<service>/<subService>/ under a name assembled from
 * the downloader name, the original file stem, and a local timestamp.
 */

import { join } from 'node:path';
import type { SchemaObject } from 'ajv';

/** Naming switches, as they appear in a downloader block */
export interface DownloadNaming {
	/** Prefix with the downloader name (default: true) */
	add_downloader_name?: boolean;
	/** Include the original file stem (default: false) */
	add_original_name?: boolean;
	/** Append yyyyMMdd_HHmm (default: true) */
	add_timestamp?: boolean;
	/** Append yyyyMMdd_HHmmss instead (default: false) */
	add_full_timestamp?: boolean;
}

/** JSON Schema properties for the naming switches, for use in connector config schemas */
export const DOWNLOAD_NAMING_PROPERTIES: Record<string, SchemaObject> = {
	add_downloader_name: { type: 'boolean' },
	add_original_name: { type: 'boolean' },
	add_timestamp: { type: 'boolean' },
	add_full_timestamp: { type: 'boolean' },
};

export interface DownloadPathOptions {
	workDir: string;
	service: string;
	subService: string;
	downloader: string;
	/** Extension without the dot; empty for none */
	extension: string;
	originalName?: string;
	naming?: DownloadNaming;
	timezone: string;
	/** Clock override for tests */
	now?: Date;
}

/**
 * Format a date as yyyyMMdd_HHmm (or yyyyMMdd_HHmmss) in the given time zone.
 */
export function formatTimestamp(date: Date, timezone: string, withSeconds = false): string {
	const parts = new Intl.DateTimeFormat('en-US', {
		timeZone: timezone,
		year: 'numeric',
		month: '2-digit',
		day: '2-digit',
		hour: '2-digit',
		minute: '2-digit',
		second: '2-digit',
		hourCycle: 'h23',
	}).formatToParts(date);

	const part = (type: Intl.DateTimeFormatPartTypes): string =>
		parts.find((p) => p.type === type)?.value ?? '00';

	const stamp = `${part('year')}${part('month')}${part('day')}_${part('hour')}${part('minute')}`;
	return withSeconds ? `${stamp}${part('second')}` : stamp;
}

/** Directory downloads for a job land in */
export function downloadFolder(workDir: string, service: string, subService: string): string {
	return join(workDir, service, subService);
}

/**
 * Build the full path of a downloaded file.
 */
export function buildDownloadPath(options: DownloadPathOptions): string {
	const naming = options.naming ?? {};
	const parts: string[] = [];

	if (naming.add_downloader_name ?? true) parts.push(options.downloader);
	if (naming.add_original_name && options.originalName) parts.push(options.originalName);

	const now = options.now ?? new Date();
	if (naming.add_full_timestamp) {
		parts.push(formatTimestamp(now, options.timezone, true));
	} else if (naming.add_timestamp ?? true) {
		parts.push(formatTimestamp(now, options.timezone));
	}

	const stem = parts.length > 0 ? parts.join('_') : 'download';
	const fileName = options.extension ? `${stem}.${options.extension}` : stem;
	return join(downloadFolder(options.workDir, options.service, options.subService), fileName);
}
