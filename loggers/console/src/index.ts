/**
 * @sluice/logger-console: registration entry point.
 */

import type { LoggerRegistration } from '@sluice/sdk';
import { ConsoleLogger } from './console-logger.js';
import { configSchema } from './schema.js';

export default function register(): LoggerRegistration {
	return {
		id: 'console',
		logger: ConsoleLogger,
		configSchema,
	};
}

export { ConsoleLogger, type ConsoleLoggerConfig } from './console-logger.js';
export { formatCompact, formatVerbose, type LogLevel, phaseLevel, shouldLog } from './format.js';
