/**
 * @sluice/processor-excel: Excel processor registration.
 */

import type { ProcessorRegistration } from '@sluice/sdk';
import { ExcelProcessor, configSchema } from './processor.js';

export default function register(): ProcessorRegistration {
	return {
		id: 'excel',
		processor: ExcelProcessor,
		configSchema,
	};
}

export { ExcelProcessor } from './processor.js';
export type { ExcelProcessorConfig } from './processor.js';
