/**
 * Console logger: human-readable colored output.
 *
 * Writes to process.stderr so stdout stays clean for JSON output.
 */

import type { LogEntry, Logger } from '@sluice/sdk';
import { createConfigParser } from '@sluice/sdk';
import { formatCompact, formatVerbose, type LogLevel, shouldLog } from './format.js';
import { configSchema } from './schema.js';

export interface ConsoleLoggerConfig {
	level: LogLevel;
	color: boolean;
	compact: boolean;
	show_metadata: boolean;
}

const parseConfig = createConfigParser<ConsoleLoggerConfig>('console', configSchema);

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private config: ConsoleLoggerConfig = {
		level: 'info',
		color: true,
		compact: true,
		show_metadata: false,
	};

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
	}

	async log(entry: LogEntry): Promise<void> {
		const { level, color, compact, show_metadata } = this.config;
		try {
			if (!shouldLog(entry.phase, level)) return;

			const formatted = compact
				? formatCompact(entry, color)
				: formatVerbose(entry, color, show_metadata);

			process.stderr.write(`${formatted}\n`);
		} catch {
			// Loggers must not throw
		}
	}

	async flush(): Promise<void> {
		// Console output is unbuffered
	}

	async shutdown(): Promise<void> {}
}
