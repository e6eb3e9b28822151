/**
 * Processor interface: turns a downloaded file into a dataset.
 */

import type { SchemaObject } from 'ajv';
import type { Dataset } from './types.js';

/**
 * Processor interface.
 *
 * A fresh instance is created per job and initialized with the job's
 * processor block (minus its name and cleaning list). read() is called
 * once per downloaded file.
 */
export interface Processor {
	/** Unique processor ID */
	readonly id: string;

	/** Initialize with config */
	init(config: Record<string, unknown>): Promise<void>;

	/** Read one file into a dataset */
	read(file: string): Promise<Dataset>;
}

/**
 * Processor registration: what a processor package exports.
 */
export interface ProcessorRegistration {
	/** Unique processor ID */
	id: string;
	/** Processor class */
	processor: new () => Processor;
	/** JSON Schema for config validation */
	configSchema?: SchemaObject;
}
