/**
 * Error taxonomy.
 *
 * Every job-level failure is one of ConfigurationError, AdapterError or
 * TransformError; the orchestrator turns them into failure outcomes.
 * CatalogError is the only kind allowed to abort a run.
 */

export type ErrorKind = 'configuration' | 'adapter' | 'transform' | 'catalog';

export class SluiceError extends Error {
	readonly kind: ErrorKind;

	constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SluiceError';
		this.kind = kind;
	}
}

/** Malformed job definition or project config, unknown plugin or step, bad parameters. */
export class ConfigurationError extends SluiceError {
	constructor(message: string, options?: ErrorOptions) {
		super('configuration', message, options);
		this.name = 'ConfigurationError';
	}
}

/** Failure reported by a source, processor or sink. */
export class AdapterError extends SluiceError {
	readonly adapter: string;

	constructor(adapter: string, message: string, options?: ErrorOptions) {
		super('adapter', message, options);
		this.name = 'AdapterError';
		this.adapter = adapter;
	}
}

/** A cleaning step's own invariant was violated. */
export class TransformError extends SluiceError {
	readonly step: string;

	constructor(step: string, message: string, options?: ErrorOptions) {
		super('transform', message, options);
		this.name = 'TransformError';
		this.step = step;
	}
}

/** Job storage could not be read, or an identifier could not be rewritten. */
export class CatalogError extends SluiceError {
	constructor(message: string, options?: ErrorOptions) {
		super('catalog', message, options);
		this.name = 'CatalogError';
	}
}

/**
 * Render an error and its cause chain on one line:
 * "Fetch failed: ENOENT: no such file or directory".
 */
export function describeError(err: unknown): string {
	const parts: string[] = [];
	let current: unknown = err;
	while (current !== undefined && current !== null && parts.length < 5) {
		if (current instanceof Error) {
			if (!parts.includes(current.message)) parts.push(current.message);
			current = current.cause;
		} else {
			parts.push(String(current));
			break;
		}
	}
	return parts.join(': ');
}
