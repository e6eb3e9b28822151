/**
 * Test harness for Sluice plugin authors.
 *
 * Provides mock implementations and helpers for testing sources,
 * processors, sinks, and loggers in isolation.
 */

import type {
	ExecuteOptions,
	SinkConnector,
	SinkResult,
	SourceConnector,
	SourceContext,
	SourceOutput,
} from './connector.js';
import { datasetFromRecords } from './dataset.js';
import type { Logger } from './logger.js';
import type { Processor } from './processor.js';
import type { Dataset, JobDefinition, LoadTarget, LogEntry } from './types.js';

// ─── Mock Source ──────────────────────────────────────────────────────────────

/**
 * Mock source connector for testing.
 * Returns a pre-configured output on fetch(), or throws when told to.
 */
export class MockSource implements SourceConnector {
	readonly id: string;
	output: SourceOutput = { kind: 'dataset', dataset: { columns: [], rows: [] } };
	failure: Error | null = null;
	readonly configs: Record<string, unknown>[] = [];
	readonly contexts: SourceContext[] = [];
	shutdownCalled = false;

	constructor(id = 'mock-source') {
		this.id = id;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		this.configs.push(config);
	}

	async fetch(context: SourceContext): Promise<SourceOutput> {
		this.contexts.push(context);
		if (this.failure) throw this.failure;
		return this.output;
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}

	get totalFetches(): number {
		return this.contexts.length;
	}
}

// ─── Mock Processor ───────────────────────────────────────────────────────────

/**
 * Mock processor for testing.
 * Serves datasets keyed by file path and records every read.
 */
export class MockProcessor implements Processor {
	readonly id: string;
	readonly files = new Map<string, Dataset>();
	readonly reads: string[] = [];

	constructor(id = 'mock-processor') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {}

	async read(file: string): Promise<Dataset> {
		this.reads.push(file);
		const dataset = this.files.get(file);
		if (!dataset) throw new Error(`No such file: ${file}`);
		return dataset;
	}
}

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Mock sink for testing.
 * Records every load and statement for assertion.
 */
export class MockSink implements SinkConnector {
	readonly id: string;
	readonly loads: Array<{ dataset: Dataset; target: LoadTarget }> = [];
	readonly statements: Array<{ statement: string; options?: ExecuteOptions }> = [];
	private failLoad = false;
	private failingStatement: string | null = null;
	initialized = false;
	shutdownCalled = false;

	constructor(id = 'mock-sink') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	/** Make subsequent loads report an error */
	setLoadError(fail: boolean): void {
		this.failLoad = fail;
	}

	/** Make execution of one statement text report an error */
	setStatementError(statement: string | null): void {
		this.failingStatement = statement;
	}

	async load(dataset: Dataset, target: LoadTarget): Promise<SinkResult> {
		this.loads.push({ dataset, target });
		if (this.failLoad) {
			return { status: 'error', error: new Error('Mock load error') };
		}
		return { status: 'ok', affected: dataset.rows.length };
	}

	async execute(statement: string, options?: ExecuteOptions): Promise<SinkResult> {
		this.statements.push({ statement, options });
		if (statement === this.failingStatement) {
			return { status: 'error', error: new Error('Mock statement error') };
		}
		return { status: 'ok' };
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}
}

// ─── Mock Logger ──────────────────────────────────────────────────────────────

/**
 * Mock logger for testing.
 * Records all log entries for assertion.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushed = false;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	/** Get entries for a specific phase */
	entriesForPhase(phase: LogEntry['phase']): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	/** Get entries for a specific job */
	entriesForJob(job: string): LogEntry[] {
		return this.entries.filter((e) => e.job === job);
	}
}

// ─── Factories ────────────────────────────────────────────────────────────────

/**
 * Create a test dataset from records.
 */
export function createTestDataset(records?: Record<string, unknown>[]): Dataset {
	return datasetFromRecords(
		records ?? [
			{ ID: '1', NAME: 'Ana' },
			{ ID: '2', NAME: 'Luis' },
		],
	);
}

/**
 * Create a test job definition with sensible defaults.
 */
export function createTestJob(overrides?: Partial<JobDefinition>): JobDefinition {
	return {
		catalogId: 'test-jobs.yaml',
		index: 0,
		name: 'test - job',
		service: 'test',
		subService: 'job',
		enabled: true,
		source: { name: 'mock', config: {} },
		processor: { name: 'mock', config: {}, cleaning: [] },
		sinks: [],
		...overrides,
	};
}
