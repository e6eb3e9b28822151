import { describe, expect, it } from 'vitest';
import { InMemoryCatalogStore } from '../catalog.js';
import { CatalogError, ConfigurationError } from '../errors.js';
import { JobSelector, type SelectedEntry } from '../selector.js';

function job(subService: string, enabled = true): string {
	return `- service: test
  sub_service: ${subService}
  enabled: ${enabled}
  downloader:
    name: mock
`;
}

function ids(entries: SelectedEntry[]): string[] {
	return entries.map((e) => e.id);
}

describe('JobSelector.select', () => {
	it('runs only priority entries when any exist', async () => {
		const store = new InMemoryCatalogStore({
			'b.yaml': job('b'),
			'[H]a.yaml': job('a'),
			'[P]z.yaml': job('z'),
			'[PP]m.yaml': job('m'),
			'[L]c.yaml': job('c'),
		});
		const selection = await new JobSelector(store).select();
		expect(selection.mode).toBe('priority');
		expect(ids(selection.entries)).toEqual(['[PP]m.yaml', '[P]z.yaml']);
	});

	it('orders High, then Normal, then Low without priority entries', async () => {
		const store = new InMemoryCatalogStore({
			'[L]b.yaml': job('lb'),
			'z.yaml': job('z'),
			'[H]y.yaml': job('hy'),
			'[L]a.yaml': job('la'),
			'a.yaml': job('a'),
			'[H]b.yaml': job('hb'),
		});
		const selection = await new JobSelector(store).select();
		expect(selection.mode).toBe('standard');
		expect(ids(selection.entries)).toEqual([
			'[H]b.yaml',
			'[H]y.yaml',
			'a.yaml',
			'z.yaml',
			'[L]a.yaml',
			'[L]b.yaml',
		]);
	});

	it('orders identifiers by code unit', async () => {
		const store = new InMemoryCatalogStore({ 'b.yaml': job('b'), 'B.yaml': job('B'), 'a.yaml': job('a') });
		const selection = await new JobSelector(store).select();
		expect(ids(selection.entries)).toEqual(['B.yaml', 'a.yaml', 'b.yaml']);
	});

	it('never selects disabled entries or records', async () => {
		const store = new InMemoryCatalogStore({
			'[D]a.yaml': job('a'),
			'[D][P]b.yaml': job('b'),
			'c.yaml': job('c1', false) + job('c2'),
			'd.yaml': job('d', false),
		});
		const selection = await new JobSelector(store).select();
		expect(ids(selection.entries)).toEqual(['c.yaml']);
		const [entry] = selection.entries;
		expect(entry.records).toHaveLength(1);
		expect(entry.records[0].ok && entry.records[0].job.subService).toBe('c2');
	});

	it('classifies by the leading token only, so [P][D] still pre-empts the run', async () => {
		const store = new InMemoryCatalogStore({ '[P][D]sales.yaml': job('sales'), 'n.yaml': job('n') });
		const selection = await new JobSelector(store).select();
		expect(selection.mode).toBe('priority');
		expect(ids(selection.entries)).toEqual(['[P][D]sales.yaml']);
	});

	it('does not let a priority entry whose records are all disabled pre-empt the run', async () => {
		const store = new InMemoryCatalogStore({ '[P]a.yaml': job('a', false), 'b.yaml': job('b') });
		const selection = await new JobSelector(store).select();
		expect(selection.mode).toBe('standard');
		expect(ids(selection.entries)).toEqual(['b.yaml']);
	});

	it('keeps rejected records so they surface as failures', async () => {
		const store = new InMemoryCatalogStore({ 'a.yaml': '- service: broken\n' });
		const selection = await new JobSelector(store).select();
		expect(selection.entries[0].records[0].ok).toBe(false);
	});

	it('warns about a malformed leading bracket and treats the entry as normal', async () => {
		const store = new InMemoryCatalogStore({ '[Pfoo.yaml': job('foo') });
		const selection = await new JobSelector(store).select();
		expect(selection.entries[0].tag).toBe('normal');
		expect(selection.warnings).toHaveLength(1);
		expect(selection.warnings[0]).toBeInstanceOf(ConfigurationError);
		expect(selection.warnings[0].message).toBe(
			'Job file "[Pfoo.yaml" starts with an unknown priority tag; treated as normal',
		);
	});
});

describe('JobSelector.commit', () => {
	it('drops [P] from a priority entry', async () => {
		const store = new InMemoryCatalogStore({ '[P]sales.yaml': job('s') });
		const selector = new JobSelector(store);
		const [entry] = (await selector.select()).entries;
		expect(await selector.commit(entry)).toEqual({ from: '[P]sales.yaml', to: 'sales.yaml' });
		expect(store.ids()).toEqual(['sales.yaml']);
	});

	it('never rewrites a permanent-priority entry', async () => {
		const store = new InMemoryCatalogStore({ '[PP]sales.yaml': job('s') });
		const selector = new JobSelector(store);
		for (let i = 0; i < 3; i++) {
			const [entry] = (await selector.select()).entries;
			expect(await selector.commit(entry)).toBeNull();
		}
		expect(store.ids()).toEqual(['[PP]sales.yaml']);
	});

	it('refuses to rename onto an existing identifier', async () => {
		const store = new InMemoryCatalogStore({ '[P]sales.yaml': job('s'), 'sales.yaml': job('t') });
		const selector = new JobSelector(store);
		const [entry] = (await selector.select()).entries;
		await expect(selector.commit(entry)).rejects.toBeInstanceOf(CatalogError);
		expect(store.ids()).toEqual(['[P]sales.yaml', 'sales.yaml']);
	});
});
