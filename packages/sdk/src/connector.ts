/**
 * Connector interfaces: the contract between Sluice and external systems.
 *
 * A connector can provide a source (data comes in), a sink (data goes out), or both.
 * Connectors are selected by name from job and project configuration.
 */

import type { SchemaObject } from 'ajv';
import type { Dataset, LoadTarget } from './types.js';

// ─── Source Connector ─────────────────────────────────────────────────────────

/** Job-level context handed to a source on fetch */
export interface SourceContext {
	/** Display name of the job */
	job: string;
	service: string;
	subService: string;
	/** Root directory for downloaded files */
	workDir: string;
	/** IANA time zone used for timestamps in file names */
	timezone: string;
}

/**
 * What a fetch produced: a dataset ready for cleaning, or files that a
 * processor still has to read.
 */
export type SourceOutput = { kind: 'dataset'; dataset: Dataset } | { kind: 'files'; files: string[] };

/**
 * Source connector interface.
 *
 * A fresh instance is created per job: init() receives the job's
 * downloader block, fetch() runs once, shutdown() always follows.
 */
export interface SourceConnector {
	/** Unique connector ID */
	readonly id: string;

	/** Initialize with the job's downloader config */
	init(config: Record<string, unknown>): Promise<void>;

	/** Produce a dataset or files, or throw */
	fetch(context: SourceContext): Promise<SourceOutput>;

	/** Clean shutdown */
	shutdown(): Promise<void>;
}

// ─── Sink Connector ───────────────────────────────────────────────────────────

/** Result of a load or statement execution */
export interface SinkResult {
	status: 'ok' | 'error';
	/** Rows written or affected, when the store reports it */
	affected?: number;
	/** Error details if status is 'error' */
	error?: Error;
}

/** Options for statement execution */
export interface ExecuteOptions {
	/** Database override */
	database?: string;
}

/**
 * Sink connector interface.
 *
 * Sinks are long-lived: one instance per configured sink id, shared by
 * every job of a run.
 */
export interface SinkConnector {
	/** Unique connector ID */
	readonly id: string;

	/** Initialize with the project's sink config */
	init(config: Record<string, unknown>): Promise<void>;

	/** Write a dataset to a table with the given write mode */
	load(dataset: Dataset, target: LoadTarget): Promise<SinkResult>;

	/** Run an opaque statement */
	execute(statement: string, options?: ExecuteOptions): Promise<SinkResult>;

	/** Clean shutdown */
	shutdown(): Promise<void>;
}

// ─── Connector Registration ──────────────────────────────────────────────────

/**
 * Connector registration: what a connector package exports.
 *
 * A connector package's `register()` returns this object.
 * The CLI calls it once at startup to discover the connector's capabilities.
 */
export interface ConnectorRegistration {
	/** Unique connector ID, the name jobs select it by */
	id: string;
	/** Source connector class (if this connector can be a source) */
	source?: new () => SourceConnector;
	/** Sink connector class (if this connector can be a sink) */
	sink?: new () => SinkConnector;
	/** JSON Schema for config validation */
	configSchema?: SchemaObject;
	/** Environment variables the connector reads */
	env_vars?: string[];
}
