/**
 * LoggerManager: fans log entries out to every registered logger.
 *
 * A failing logger never affects the run or its sibling loggers.
 */

import type { LogEntry, Logger } from '@sluice/sdk';

export class LoggerManager {
	private readonly loggers: Logger[] = [];

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	get size(): number {
		return this.loggers.length;
	}

	async log(entry: LogEntry): Promise<void> {
		await Promise.allSettled(this.loggers.map(async (logger) => logger.log(entry)));
	}

	async flush(): Promise<void> {
		await Promise.allSettled(this.loggers.map(async (logger) => logger.flush()));
	}

	async shutdown(): Promise<void> {
		await Promise.allSettled(this.loggers.map(async (logger) => logger.shutdown()));
		this.loggers.length = 0;
	}
}
