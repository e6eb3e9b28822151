/**
 * Job selector: decides which catalog entries a run executes, and in what order.
 *
 * Priority entries ([PP] and [P]) pre-empt everything else: when any is
 * present the run executes only those. Otherwise High, Normal and Low run in
 * that order. After a [P] entry has run, commit() drops its [P] token so the
 * next run treats it as an ordinary entry.
 */

import type { CatalogEntry, CatalogStore } from './catalog.js';
import { ConfigurationError } from './errors.js';
import type { CatalogRecord } from './job.js';
import { type PriorityTag, parsePriorityTag, stripPriorityToken } from './priority.js';

export interface SelectedEntry {
	id: string;
	tag: PriorityTag;
	/** Enabled records, in file order */
	records: CatalogRecord[];
}

export interface Selection {
	/** 'priority' when [PP]/[P] entries pre-empted the rest */
	mode: 'priority' | 'standard';
	entries: SelectedEntry[];
	/** Identifiers that look tagged but match no token */
	warnings: ConfigurationError[];
}

export interface Rename {
	from: string;
	to: string;
}

function isEnabled(record: CatalogRecord): boolean {
	return record.ok ? record.job.enabled : record.enabled;
}

function byIdentifier(a: SelectedEntry, b: SelectedEntry): number {
	if (a.id < b.id) return -1;
	if (a.id > b.id) return 1;
	return 0;
}

/**
 * Pure selection over scanned entries.
 */
export function selectEntries(entries: readonly CatalogEntry[]): Selection {
	const warnings: ConfigurationError[] = [];
	const partitions = new Map<PriorityTag, SelectedEntry[]>();

	for (const entry of entries) {
		const { tag, malformed } = parsePriorityTag(entry.id);
		if (malformed) {
			warnings.push(
				new ConfigurationError(`Job file "${entry.id}" starts with an unknown priority tag; treated as normal`),
			);
		}
		if (tag === 'disabled') continue;

		const records = entry.records.filter(isEnabled);
		if (records.length === 0) continue;

		const bucket = partitions.get(tag) ?? [];
		bucket.push({ id: entry.id, tag, records });
		partitions.set(tag, bucket);
	}

	const pick = (...tags: PriorityTag[]): SelectedEntry[] =>
		tags.flatMap((tag) => [...(partitions.get(tag) ?? [])].sort(byIdentifier));

	const priority = pick('permanent-priority', 'priority').sort(byIdentifier);
	if (priority.length > 0) {
		return { mode: 'priority', entries: priority, warnings };
	}
	return { mode: 'standard', entries: pick('high', 'normal', 'low'), warnings };
}

/**
 * Selector bound to a catalog store.
 */
export class JobSelector {
	constructor(private readonly store: CatalogStore) {}

	/** Scan the store and select. CatalogError from the scan propagates. */
	async select(): Promise<Selection> {
		return selectEntries(await this.store.scan());
	}

	/**
	 * Record that an entry has finished. Drops the [P] token of a Priority
	 * entry and returns the rename; other entries are left alone.
	 * Throws CatalogError when the store refuses the rename.
	 */
	async commit(entry: SelectedEntry): Promise<Rename | null> {
		if (entry.tag !== 'priority') return null;
		const to = stripPriorityToken(entry.id);
		if (to === entry.id) return null;
		await this.store.rename(entry.id, to);
		return { from: entry.id, to };
	}
}
