/**
 * @sluice/processor-csv: CSV processor registration.
 */

import type { ProcessorRegistration } from '@sluice/sdk';
import { CsvProcessor, configSchema } from './processor.js';

export default function register(): ProcessorRegistration {
	return {
		id: 'csv',
		processor: CsvProcessor,
		configSchema,
	};
}

export { CsvProcessor } from './processor.js';
export type { CsvProcessorConfig } from './processor.js';
