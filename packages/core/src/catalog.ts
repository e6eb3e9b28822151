/**
 * Job catalog storage.
 *
 * A catalog entry is one job file: its identifier (the base file name, raw
 * priority tokens included) and the records parsed from it. The store is the
 * only component allowed to rewrite identifiers.
 */

import { readdir, readFile, rename, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { CatalogError } from './errors.js';
import { type CatalogRecord, parseJobFile } from './job.js';

export interface CatalogEntry {
	/** Base name of the job file */
	id: string;
	records: CatalogRecord[];
}

export interface CatalogStore {
	/** Read every entry. Throws CatalogError when the storage is unreadable. */
	scan(): Promise<CatalogEntry[]>;
	/** Atomically rename an entry. Throws CatalogError when the target exists. */
	rename(from: string, to: string): Promise<void>;
}

const JOB_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);

// ─── File store ───────────────────────────────────────────────────────────────

/**
 * Catalog backed by a directory of YAML job files.
 */
export class FileCatalogStore implements CatalogStore {
	constructor(readonly dir: string) {}

	async scan(): Promise<CatalogEntry[]> {
		let names: string[];
		try {
			const dirents = await readdir(this.dir, { withFileTypes: true });
			names = dirents
				.filter((d) => d.isFile() && JOB_FILE_EXTENSIONS.has(extname(d.name).toLowerCase()))
				.map((d) => d.name);
		} catch (err) {
			throw new CatalogError(`Cannot read job directory ${this.dir}`, { cause: err });
		}

		const entries: CatalogEntry[] = [];
		for (const name of names) {
			let content: string;
			try {
				content = await readFile(join(this.dir, name), 'utf-8');
			} catch (err) {
				throw new CatalogError(`Cannot read job file ${name}`, { cause: err });
			}
			entries.push({ id: name, records: parseJobFile(content, name) });
		}
		return entries;
	}

	async rename(from: string, to: string): Promise<void> {
		const target = join(this.dir, to);
		if (await exists(target)) {
			throw new CatalogError(`Cannot rename ${from} to ${to}: target already exists`);
		}
		try {
			await rename(join(this.dir, from), target);
		} catch (err) {
			throw new CatalogError(`Cannot rename ${from} to ${to}`, { cause: err });
		}
	}
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

// ─── In-memory store ──────────────────────────────────────────────────────────

/**
 * Catalog held in memory, keyed by identifier. Entries are given as YAML
 * text so that tests exercise the same parsing as the file store.
 */
export class InMemoryCatalogStore implements CatalogStore {
	private readonly files = new Map<string, string>();
	readonly renames: Array<{ from: string; to: string }> = [];

	constructor(files?: Record<string, string>) {
		for (const [id, content] of Object.entries(files ?? {})) {
			this.files.set(id, content);
		}
	}

	set(id: string, content: string): void {
		this.files.set(id, content);
	}

	ids(): string[] {
		return [...this.files.keys()];
	}

	async scan(): Promise<CatalogEntry[]> {
		return [...this.files].map(([id, content]) => ({ id, records: parseJobFile(content, id) }));
	}

	async rename(from: string, to: string): Promise<void> {
		const content = this.files.get(from);
		if (content === undefined) {
			throw new CatalogError(`Cannot rename ${from}: no such entry`);
		}
		if (this.files.has(to)) {
			throw new CatalogError(`Cannot rename ${from} to ${to}: target already exists`);
		}
		this.files.delete(from);
		this.files.set(to, content);
		this.renames.push({ from, to });
	}
}
