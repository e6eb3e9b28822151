/**
 * Tests for ConsoleLogger: level filtering, formatting, color, error resilience.
 */

import type { LogEntry, LogPhase } from '@sluice/sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger } from '../console-logger.js';
import { formatCompact, formatVerbose, shouldLog } from '../format.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

function makeEntry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: '2024-01-15T10:30:45.123Z',
		run_id: 'run_test',
		phase: 'job.success',
		catalog_id: '[H]sales.yaml',
		job: 'sales - daily',
		...overrides,
	};
}

/** Drop the leading "HH:MM:SS.mmm " so assertions do not depend on the local time zone */
function withoutTime(line: string): string {
	return line.slice(13);
}

const RED = '\x1b[31m';
const RED_CLOSE = '\x1b[39m';
const GREEN = '\x1b[32m';
const DIM = '\x1b[2m';

// ─── shouldLog ───────────────────────────────────────────────────────────────

describe('shouldLog', () => {
	it('shows all phases at debug level', () => {
		expect(shouldLog('pipeline.step', 'debug')).toBe(true);
		expect(shouldLog('sink.load', 'debug')).toBe(true);
		expect(shouldLog('job.success', 'debug')).toBe(true);
		expect(shouldLog('system.error', 'debug')).toBe(true);
	});

	it('filters debug phases at info level', () => {
		expect(shouldLog('source.fetch', 'info')).toBe(false);
		expect(shouldLog('pipeline.step', 'info')).toBe(false);
		expect(shouldLog('job.start', 'info')).toBe(true);
		expect(shouldLog('catalog.rename', 'info')).toBe(true);
	});

	it('keeps warnings and failures at warn level', () => {
		expect(shouldLog('run.end', 'warn')).toBe(false);
		expect(shouldLog('catalog.warning', 'warn')).toBe(true);
		expect(shouldLog('job.failure', 'warn')).toBe(true);
	});

	it('only shows errors at error level', () => {
		expect(shouldLog('catalog.warning', 'error')).toBe(false);
		expect(shouldLog('job.failure', 'error')).toBe(true);
		expect(shouldLog('system.error', 'error')).toBe(true);
	});

	it('treats unknown phases as info', () => {
		expect(shouldLog('unknown.phase', 'info')).toBe(true);
		expect(shouldLog('unknown.phase', 'warn')).toBe(false);
	});

	it('lets everything through for an unknown level', () => {
		expect(shouldLog('pipeline.step', 'verbose')).toBe(true);
	});
});

// ─── formatCompact ───────────────────────────────────────────────────────────

describe('formatCompact', () => {
	it('renders one line with the entry fields in order', () => {
		const output = formatCompact(makeEntry({ rows: 12, duration_ms: 42 }), false);
		expect(withoutTime(output)).toBe('✓ job.success file=[H]sales.yaml job="sales - daily" rows=12 (42ms)');
	});

	it('starts with the time as HH:MM:SS.mmm', () => {
		expect(formatCompact(makeEntry(), false)).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} /);
	});

	it('renders source, processor, step, sink and result', () => {
		const entry = makeEntry({
			phase: 'pipeline.step',
			catalog_id: undefined,
			job: undefined,
			source: 'localpath',
			processor: 'csv',
			step: 'empty_asnull',
			sink: 'default',
			result: 'ok',
		});
		expect(withoutTime(formatCompact(entry, false))).toBe(
			'◆ pipeline.step src=localpath proc=csv step=empty_asnull sink=default result=ok',
		);
	});

	it('prefixes the error with its kind', () => {
		const entry = makeEntry({ phase: 'job.failure', error: 'Sheet "X" not found', error_kind: 'adapter' });
		expect(withoutTime(formatCompact(entry, false))).toBe(
			'✗ job.failure file=[H]sales.yaml job="sales - daily" err=[adapter] Sheet "X" not found',
		);
	});

	it('uses no ANSI codes when color is off', () => {
		expect(formatCompact(makeEntry({ error: 'boom' }), false)).not.toContain('\x1b[');
	});

	it('colors success green and errors red when color is on', () => {
		const output = formatCompact(makeEntry({ error: 'timeout' }), true);
		expect(output).toContain(`${GREEN}✓ job.success`);
		expect(output).toContain(`${RED}err=timeout${RED_CLOSE}`);
	});
});

// ─── Phase icons ─────────────────────────────────────────────────────────────

describe('phase icons', () => {
	const cases: [LogPhase, string][] = [
		['run.start', '●'],
		['catalog.warning', '⚠'],
		['catalog.rename', '↻'],
		['job.start', '▷'],
		['job.failure', '✗'],
		['source.fetch', '↓'],
		['sink.load', '↑'],
		['sink.execute', '►'],
	];

	for (const [phase, icon] of cases) {
		it(`${phase} → ${icon}`, () => {
			const output = formatCompact({ timestamp: '2024-01-15T10:30:45.123Z', run_id: 'r', phase }, false);
			expect(withoutTime(output)).toBe(`${icon} ${phase}`);
		});
	}
});

// ─── formatVerbose ───────────────────────────────────────────────────────────

describe('formatVerbose', () => {
	it('appends metadata below the line', () => {
		const output = formatVerbose(makeEntry({ metadata: { key: 'value' } }), false, true);
		const lines = output.split('\n');
		expect(lines.slice(1)).toEqual(['  metadata:', '    {', '      "key": "value"', '    }']);
	});

	it('is the compact line when metadata is hidden', () => {
		const entry = makeEntry({ metadata: { key: 'value' } });
		expect(formatVerbose(entry, false, false)).toBe(formatCompact(entry, false));
	});

	it('is the compact line when there is no metadata', () => {
		expect(formatVerbose(makeEntry(), false, true)).not.toContain('\n');
	});

	it('dims the metadata when color is on', () => {
		const output = formatVerbose(makeEntry({ metadata: { key: 'value' } }), true, true);
		expect(output.split('\n')[1].startsWith(DIM)).toBe(true);
	});
});

// ─── ConsoleLogger ───────────────────────────────────────────────────────────

describe('ConsoleLogger', () => {
	const written: string[] = [];

	beforeEach(() => {
		written.length = 0;
		vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
			written.push(String(chunk));
			return true;
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('writes one line to stderr', async () => {
		const logger = new ConsoleLogger();
		await logger.init({ color: false });
		await logger.log(makeEntry());
		expect(written).toHaveLength(1);
		expect(withoutTime(written[0])).toBe('✓ job.success file=[H]sales.yaml job="sales - daily"\n');
	});

	it('filters by level', async () => {
		const logger = new ConsoleLogger();
		await logger.init({ level: 'error' });
		await logger.log(makeEntry({ phase: 'job.success' }));
		expect(written).toHaveLength(0);

		await logger.log(makeEntry({ phase: 'job.failure' }));
		expect(written).toHaveLength(1);
	});

	it('uses compact mode by default', async () => {
		const logger = new ConsoleLogger();
		await logger.init({ show_metadata: true });
		await logger.log(makeEntry({ metadata: { key: 'value' } }));
		expect(written[0]).not.toContain('metadata:');
	});

	it('prints metadata in verbose mode', async () => {
		const logger = new ConsoleLogger();
		await logger.init({ compact: false, show_metadata: true });
		await logger.log(makeEntry({ metadata: { key: 'value' } }));
		expect(written[0]).toContain('metadata:');
	});

	it('rejects unknown options', async () => {
		await expect(new ConsoleLogger().init({ colour: false })).rejects.toThrow(
			"Invalid console config: /: must NOT have additional properties",
		);
	});

	it('does not throw when stderr fails', async () => {
		vi.spyOn(process.stderr, 'write').mockImplementation(() => {
			throw new Error('write failed');
		});
		const logger = new ConsoleLogger();
		await logger.init({});
		await expect(logger.log(makeEntry())).resolves.toBeUndefined();
	});
});

// ─── register() ──────────────────────────────────────────────────────────────

describe('register()', () => {
	it('returns the registration shape', async () => {
		const { default: register } = await import('../index.js');
		const reg = register();
		expect(reg.id).toBe('console');
		expect(reg.logger).toBe(ConsoleLogger);
		expect(reg.configSchema).toBeDefined();
	});
});
