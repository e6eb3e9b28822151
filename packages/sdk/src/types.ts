/**
 * Core types shared by every Sluice package.
 */

// ─── Tabular data ─────────────────────────────────────────────────────────────

/** A single cell. `null` is the missing marker. */
export type CellValue = string | number | boolean | Date | null;

/** One row: column name → cell value */
export type Row = Record<string, CellValue>;

/**
 * An ordered table.
 *
 * Column names are unique and every row carries exactly the dataset's columns.
 * Datasets are handed between stages by value: a stage returns a new dataset
 * instead of mutating the one it received.
 */
export interface Dataset {
	columns: string[];
	rows: Row[];
}

// ─── Job definitions ─────────────────────────────────────────────────────────

/** Parameter bag of a cleaning step */
export type StepParams = Record<string, unknown>;

/** A cleaning step: a bare name, or a name with parameters */
export interface CleaningStepSpec {
	name: string;
	params?: StepParams;
}

/** Name-based selection of a plugin plus its config */
export interface PluginSelection {
	name: string;
	config: Record<string, unknown>;
}

export interface ProcessorSelection extends PluginSelection {
	/** Cleaning steps, applied in order */
	cleaning: CleaningStepSpec[];
}

export type WriteMode = 'replace' | 'append';

/** Where and how a dataset is loaded */
export interface LoadTarget {
	table: string;
	schema?: string;
	mode: WriteMode;
	/** Database override for sinks that serve several databases */
	database?: string;
	/** Width of the text columns created by the sink */
	columnSize?: number;
}

/** A statement run after a load: a named statement file, or literal text */
export type StatementRef = { kind: 'file'; name: string } | { kind: 'literal'; text: string };

/** One sink action: an optional load followed by statements */
export interface SinkAction {
	/** Sink id, as configured in the project */
	sink: string;
	load?: LoadTarget;
	/** Database the statements run against */
	database?: string;
	statements: StatementRef[];
}

/** A job record, materialized fresh from its job file on every run. */
export interface JobDefinition {
	/** Base name of the job file, raw priority tag included */
	catalogId: string;
	/** Position of the record inside its file */
	index: number;
	/** Display name: "<service> - <sub_service>" */
	name: string;
	service: string;
	subService: string;
	enabled: boolean;
	source: PluginSelection;
	processor?: ProcessorSelection;
	sinks: SinkAction[];
}

// ─── Logging ──────────────────────────────────────────────────────────────────

/** Pipeline phases that produce log entries */
export type LogPhase =
	| 'run.start'
	| 'run.end'
	| 'catalog.scan'
	| 'catalog.warning'
	| 'catalog.rename'
	| 'job.start'
	| 'job.success'
	| 'job.failure'
	| 'source.fetch'
	| 'processor.read'
	| 'pipeline.step'
	| 'sink.load'
	| 'sink.execute'
	| 'system.error';

/** Structured log entry: one per pipeline phase */
export interface LogEntry {
	timestamp: string;
	run_id: string;
	phase: LogPhase;
	catalog_id?: string;
	job?: string;
	source?: string;
	processor?: string;
	sink?: string;
	step?: string;
	result?: string;
	rows?: number;
	duration_ms?: number;
	error?: string;
	error_kind?: string;
	metadata?: Record<string, unknown>;
}
