/**
 * Orchestrator: runs jobs end to end: fetch, read, clean, load, execute.
 *
 * Library-first API:
 *   const orchestrator = new Orchestrator(options);
 *   const selection = await orchestrator.select(selector);
 *   const summary = await orchestrator.runAll(selection, selector);
 *
 * Every failure inside a job is turned into a failure outcome; the next job
 * always runs. Only a catalog scan failure escapes.
 */

import { randomUUID } from 'node:crypto';
import type {
	ConnectorRegistration,
	Dataset,
	JobDefinition,
	LogEntry,
	LogPhase,
	Processor,
	ProcessorRegistration,
	ProcessorSelection,
	SinkAction,
	SinkConnector,
	SinkResult,
	SourceConnector,
	SourceContext,
	SourceOutput,
	StatementRef,
} from '@sluice/sdk';
import { concatDatasets } from '@sluice/sdk';
import { AdapterError, ConfigurationError, type ErrorKind, SluiceError, describeError } from './errors.js';
import type { CatalogRecord } from './job.js';
import { LoggerManager } from './logger.js';
import { type StepReport, applyPipeline, resolvePipeline } from './pipeline.js';
import type { JobSelector, Rename, SelectedEntry, Selection } from './selector.js';
import { checkConfig } from './schema.js';
import type { StatementStore } from './statements.js';
import { createDefaultRegistry } from './steps/index.js';
import type { BoundStep, StepRegistry } from './steps/registry.js';

export const DEFAULT_TIMEZONE = 'America/Lima';

// ─── Options & results ────────────────────────────────────────────────────────

export interface OrchestratorOptions {
	/** Source-capable connector registrations, keyed by the name jobs select */
	sources: Map<string, ConnectorRegistration>;
	/** Processor registrations, keyed by name */
	processors: Map<string, ProcessorRegistration>;
	/** Initialized sinks, keyed by sink id */
	sinks: Map<string, SinkConnector>;
	statements: StatementStore;
	/** Cleaning-step registry (default: the built-in steps) */
	steps?: StepRegistry;
	loggers?: LoggerManager;
	/** Root directory for downloaded files */
	workDir: string;
	/** Time zone for download timestamps (default: America/Lima) */
	timezone?: string;
	runId?: string;
}

/** Where in the job a failure happened */
export type JobStage = 'config' | 'source' | 'processor' | 'pipeline' | 'sink';

export interface JobOutcome {
	job: string;
	catalogId: string;
	status: 'success' | 'failure';
	stage?: JobStage;
	errorKind?: ErrorKind;
	detail?: string;
	/** Rows in the final dataset */
	rows: number;
	durationMs: number;
}

export interface RunSummary {
	runId: string;
	mode: Selection['mode'];
	outcomes: JobOutcome[];
	succeeded: number;
	failed: number;
	renamed: Rename[];
	warnings: string[];
	durationMs: number;
}

export function generateRunId(): string {
	return `run_${randomUUID().replace(/-/g, '').substring(0, 16)}`;
}

/** Tracks the stage a job is in, so a failure can say where it happened */
interface JobProgress {
	stage: JobStage;
	rows: number;
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export class Orchestrator {
	readonly runId: string;
	private readonly sources: Map<string, ConnectorRegistration>;
	private readonly processors: Map<string, ProcessorRegistration>;
	private readonly sinks: Map<string, SinkConnector>;
	private readonly statements: StatementStore;
	private readonly steps: StepRegistry;
	private readonly loggerManager: LoggerManager;
	private readonly workDir: string;
	private readonly timezone: string;

	constructor(options: OrchestratorOptions) {
		this.sources = options.sources;
		this.processors = options.processors;
		this.sinks = options.sinks;
		this.statements = options.statements;
		this.steps = options.steps ?? createDefaultRegistry();
		this.loggerManager = options.loggers ?? new LoggerManager();
		this.workDir = options.workDir;
		this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
		this.runId = options.runId ?? generateRunId();
	}

	/** Get the logger manager (for adding loggers externally) */
	get loggers(): LoggerManager {
		return this.loggerManager;
	}

	/**
	 * Scan the catalog through the selector and log the selection.
	 * A CatalogError is logged and rethrown.
	 */
	async select(selector: JobSelector): Promise<Selection> {
		let selection: Selection;
		try {
			selection = await selector.select();
		} catch (err) {
			await this.emitLog('system.error', {
				error: describeError(err),
				error_kind: err instanceof SluiceError ? err.kind : undefined,
			});
			throw err;
		}

		await this.emitLog('catalog.scan', {
			result: selection.mode,
			metadata: {
				entries: selection.entries.map((e) => e.id),
				jobs: selection.entries.reduce((n, e) => n + e.records.length, 0),
			},
		});
		for (const warning of selection.warnings) {
			await this.emitLog('catalog.warning', { error: warning.message, error_kind: warning.kind });
		}
		return selection;
	}

	/**
	 * Run every selected entry in order, committing each entry once its
	 * records have completed.
	 */
	async runAll(selection: Selection, selector?: JobSelector): Promise<RunSummary> {
		const startTime = Date.now();
		const outcomes: JobOutcome[] = [];
		const renamed: Rename[] = [];
		const warnings = selection.warnings.map((w) => w.message);

		await this.emitLog('run.start', {
			result: selection.mode,
			metadata: { entries: selection.entries.length },
		});

		for (const entry of selection.entries) {
			for (const record of entry.records) {
				outcomes.push(await this.runRecord(record, entry.id));
			}
			if (selector) {
				const rename = await this.commit(selector, entry, warnings);
				if (rename) renamed.push(rename);
			}
		}

		const succeeded = outcomes.filter((o) => o.status === 'success').length;
		const summary: RunSummary = {
			runId: this.runId,
			mode: selection.mode,
			outcomes,
			succeeded,
			failed: outcomes.length - succeeded,
			renamed,
			warnings,
			durationMs: Date.now() - startTime,
		};

		await this.emitLog('run.end', {
			result: summary.failed > 0 ? 'failure' : 'success',
			duration_ms: summary.durationMs,
			metadata: { succeeded: summary.succeeded, failed: summary.failed },
		});
		await this.loggerManager.flush();

		return summary;
	}

	/** Run a parsed record, or report a rejected one as a failure. */
	async runRecord(record: CatalogRecord, catalogId: string): Promise<JobOutcome> {
		if (record.ok) return this.run(record.job);

		const outcome: JobOutcome = {
			job: record.label,
			catalogId,
			status: 'failure',
			stage: 'config',
			errorKind: record.error.kind,
			detail: record.error.message,
			rows: 0,
			durationMs: 0,
		};
		await this.emitLog('job.failure', {
			catalog_id: catalogId,
			job: record.label,
			result: 'config',
			error: record.error.message,
			error_kind: record.error.kind,
		});
		return outcome;
	}

	/**
	 * Run a single job. Never throws.
	 */
	async run(job: JobDefinition): Promise<JobOutcome> {
		const startTime = Date.now();
		const progress: JobProgress = { stage: 'source', rows: 0 };

		await this.emitLog('job.start', {
			catalog_id: job.catalogId,
			job: job.name,
			source: job.source.name,
			processor: job.processor?.name,
		});

		try {
			await this.execute(job, progress);
			const durationMs = Date.now() - startTime;
			await this.emitLog('job.success', {
				catalog_id: job.catalogId,
				job: job.name,
				rows: progress.rows,
				duration_ms: durationMs,
			});
			return {
				job: job.name,
				catalogId: job.catalogId,
				status: 'success',
				rows: progress.rows,
				durationMs,
			};
		} catch (err) {
			const durationMs = Date.now() - startTime;
			const errorKind: ErrorKind = err instanceof SluiceError ? err.kind : 'adapter';
			const detail = describeError(err);
			await this.emitLog('job.failure', {
				catalog_id: job.catalogId,
				job: job.name,
				result: progress.stage,
				error: detail,
				error_kind: errorKind,
				duration_ms: durationMs,
			});
			return {
				job: job.name,
				catalogId: job.catalogId,
				status: 'failure',
				stage: progress.stage,
				errorKind,
				detail,
				rows: progress.rows,
				durationMs,
			};
		}
	}

	/**
	 * Resolve everything a job refers to without running it: source and
	 * processor (with their config), cleaning steps, sinks and statement
	 * files. Returns one error per problem found.
	 */
	async check(job: JobDefinition): Promise<ConfigurationError[]> {
		const problems: ConfigurationError[] = [];
		const attempt = async (resolve: () => unknown): Promise<void> => {
			try {
				await resolve();
			} catch (err) {
				if (!(err instanceof ConfigurationError)) throw err;
				problems.push(err);
			}
		};

		await attempt(() => this.sourceClass(job));
		const selection = job.processor;
		if (selection) {
			await attempt(() => this.processorRegistration(selection));
			await attempt(() => resolvePipeline(selection.cleaning, this.steps));
		}
		for (const action of job.sinks) {
			await attempt(() => this.sink(action.sink));
			for (const ref of action.statements) {
				if (ref.kind === 'file') {
					await attempt(() => this.statements.read(ref.name));
				}
			}
		}
		return problems;
	}

	// ─── Internal: job stages ─────────────────────────────────────────────────

	private async execute(job: JobDefinition, progress: JobProgress): Promise<void> {
		const output = await this.fetch(job);

		let dataset: Dataset;
		if (output.kind === 'files') {
			if (!job.processor) {
				// Download-only job
				await this.emitLog('source.fetch', {
					catalog_id: job.catalogId,
					job: job.name,
					source: job.source.name,
					result: 'download-only',
					metadata: { files: output.files },
				});
				return;
			}
			progress.stage = 'pipeline';
			const steps = resolvePipeline(job.processor.cleaning, this.steps);
			progress.stage = 'processor';
			const processor = await this.createProcessor(job);
			const cleaned: Dataset[] = [];
			for (const file of output.files) {
				progress.stage = 'processor';
				const raw = await this.read(job, processor, file);
				progress.stage = 'pipeline';
				cleaned.push(await this.clean(job, raw, steps));
			}
			dataset = concatDatasets(cleaned);
		} else {
			progress.stage = 'pipeline';
			const steps = resolvePipeline(job.processor?.cleaning ?? [], this.steps);
			dataset = await this.clean(job, output.dataset, steps);
		}
		progress.rows = dataset.rows.length;

		progress.stage = 'sink';
		for (const action of job.sinks) {
			await this.performSinkAction(job, action, dataset);
		}
	}

	private async fetch(job: JobDefinition): Promise<SourceOutput> {
		const connector: SourceConnector = new (this.sourceClass(job))();
		const context: SourceContext = {
			job: job.name,
			service: job.service,
			subService: job.subService,
			workDir: this.workDir,
			timezone: this.timezone,
		};

		const startTime = Date.now();
		try {
			await connector.init(job.source.config);
			const output = await connector.fetch(context);
			await this.emitLog('source.fetch', {
				catalog_id: job.catalogId,
				job: job.name,
				source: job.source.name,
				result: output.kind,
				rows: output.kind === 'dataset' ? output.dataset.rows.length : undefined,
				duration_ms: Date.now() - startTime,
				metadata: output.kind === 'files' ? { files: output.files } : undefined,
			});
			return output;
		} catch (err) {
			const error =
				err instanceof SluiceError ? err : new AdapterError(job.source.name, 'Fetch failed', { cause: err });
			await this.emitLog('source.fetch', {
				catalog_id: job.catalogId,
				job: job.name,
				source: job.source.name,
				result: 'error',
				duration_ms: Date.now() - startTime,
				error: describeError(error),
				error_kind: error.kind,
			});
			throw error;
		} finally {
			await this.shutdownSource(job, connector);
		}
	}

	private async shutdownSource(job: JobDefinition, connector: SourceConnector): Promise<void> {
		try {
			await connector.shutdown();
		} catch (err) {
			await this.emitLog('system.error', {
				catalog_id: job.catalogId,
				job: job.name,
				source: job.source.name,
				error: describeError(new AdapterError(job.source.name, 'Error during source shutdown', { cause: err })),
				error_kind: 'adapter',
			});
		}
	}

	private async createProcessor(job: JobDefinition): Promise<Processor> {
		const selection = job.processor;
		if (!selection) {
			throw new ConfigurationError(`Job "${job.name}" has no processor`);
		}
		const processor = new (this.processorRegistration(selection).processor)();
		try {
			await processor.init(selection.config);
		} catch (err) {
			throw new AdapterError(selection.name, 'Failed to initialize processor', { cause: err });
		}
		return processor;
	}

	private async read(job: JobDefinition, processor: Processor, file: string): Promise<Dataset> {
		const startTime = Date.now();
		try {
			const dataset = await processor.read(file);
			await this.emitLog('processor.read', {
				catalog_id: job.catalogId,
				job: job.name,
				processor: processor.id,
				rows: dataset.rows.length,
				duration_ms: Date.now() - startTime,
				metadata: { file },
			});
			return dataset;
		} catch (err) {
			throw new AdapterError(processor.id, `Failed to read ${file}`, { cause: err });
		}
	}

	private async clean(job: JobDefinition, dataset: Dataset, steps: readonly BoundStep[]): Promise<Dataset> {
		const reports: StepReport[] = [];
		try {
			return applyPipeline(dataset, steps, { onStep: (report) => reports.push(report) });
		} finally {
			for (const report of reports) {
				await this.emitLog('pipeline.step', {
					catalog_id: job.catalogId,
					job: job.name,
					step: report.step,
					rows: report.rows,
					duration_ms: report.durationMs,
					metadata: { index: report.index, columns: report.columns },
				});
			}
		}
	}

	private async performSinkAction(job: JobDefinition, action: SinkAction, dataset: Dataset): Promise<void> {
		const sink = this.sink(action.sink);

		if (action.load) {
			const target = action.load;
			const startTime = Date.now();
			const result = await this.callSink(action.sink, `Load into ${target.table} failed`, () =>
				sink.load(dataset, target),
			);
			await this.emitLog('sink.load', {
				catalog_id: job.catalogId,
				job: job.name,
				sink: action.sink,
				result: target.mode,
				rows: result.affected ?? dataset.rows.length,
				duration_ms: Date.now() - startTime,
				metadata: { table: target.schema ? `${target.schema}.${target.table}` : target.table },
			});
		}

		for (const ref of action.statements) {
			const text = await this.statementText(ref);
			const startTime = Date.now();
			const label = ref.kind === 'file' ? ref.name : 'query';
			const result = await this.callSink(action.sink, `Statement ${label} failed`, () =>
				sink.execute(text, { database: action.database }),
			);
			await this.emitLog('sink.execute', {
				catalog_id: job.catalogId,
				job: job.name,
				sink: action.sink,
				result: 'ok',
				rows: result.affected,
				duration_ms: Date.now() - startTime,
				metadata: { statement: label },
			});
		}
	}

	private async statementText(ref: StatementRef): Promise<string> {
		return ref.kind === 'file' ? this.statements.read(ref.name) : ref.text;
	}

	/** Call a sink, turning a thrown error or an error result into AdapterError. */
	private async callSink(sinkId: string, message: string, call: () => Promise<SinkResult>): Promise<SinkResult> {
		let result: SinkResult;
		try {
			result = await call();
		} catch (err) {
			throw new AdapterError(sinkId, message, { cause: err });
		}
		if (result.status === 'error') {
			throw new AdapterError(sinkId, message, { cause: result.error });
		}
		return result;
	}

	private async commit(selector: JobSelector, entry: SelectedEntry, warnings: string[]): Promise<Rename | null> {
		try {
			const rename = await selector.commit(entry);
			if (rename) {
				await this.emitLog('catalog.rename', {
					catalog_id: entry.id,
					result: 'renamed',
					metadata: { from: rename.from, to: rename.to },
				});
			}
			return rename;
		} catch (err) {
			const detail = describeError(err);
			warnings.push(detail);
			await this.emitLog('catalog.rename', {
				catalog_id: entry.id,
				result: 'error',
				error: detail,
				error_kind: err instanceof SluiceError ? err.kind : 'catalog',
			});
			return null;
		}
	}

	// ─── Internal: lookups ────────────────────────────────────────────────────

	private sourceClass(job: JobDefinition): new () => SourceConnector {
		const registration = this.sources.get(job.source.name);
		if (!registration?.source) {
			throw new ConfigurationError(`Unknown source connector "${job.source.name}"`);
		}
		const problem = checkConfig(registration.configSchema, job.source.config);
		if (problem) {
			throw new ConfigurationError(`Invalid config for source "${job.source.name}": ${problem}`);
		}
		return registration.source;
	}

	private processorRegistration(selection: ProcessorSelection): ProcessorRegistration {
		const registration = this.processors.get(selection.name);
		if (!registration) {
			throw new ConfigurationError(`Unknown processor "${selection.name}"`);
		}
		const problem = checkConfig(registration.configSchema, selection.config);
		if (problem) {
			throw new ConfigurationError(`Invalid config for processor "${selection.name}": ${problem}`);
		}
		return registration;
	}

	private sink(id: string): SinkConnector {
		const sink = this.sinks.get(id);
		if (!sink) {
			throw new ConfigurationError(`Unknown sink "${id}"`);
		}
		return sink;
	}

	// ─── Internal: Emit structured log ────────────────────────────────────────

	private async emitLog(phase: LogPhase, fields: Partial<LogEntry>): Promise<void> {
		const entry: LogEntry = {
			...fields,
			timestamp: new Date().toISOString(),
			run_id: this.runId,
			phase,
		};
		await this.loggerManager.log(entry);
	}
}
