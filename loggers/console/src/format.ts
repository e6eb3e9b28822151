/**
 * Formatting for console log lines.
 */

import type { LogEntry, LogPhase } from '@sluice/sdk';
import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PHASE_LEVEL: Record<LogPhase, LogLevel> = {
	'run.start': 'info',
	'run.end': 'info',
	'catalog.scan': 'debug',
	'catalog.warning': 'warn',
	'catalog.rename': 'info',
	'job.start': 'info',
	'job.success': 'info',
	'job.failure': 'error',
	'source.fetch': 'debug',
	'processor.read': 'debug',
	'pipeline.step': 'debug',
	'sink.load': 'debug',
	'sink.execute': 'debug',
	'system.error': 'error',
};

const PHASE_ICON: Record<LogPhase, string> = {
	'run.start': '●',
	'run.end': '●',
	'catalog.scan': '□',
	'catalog.warning': '⚠',
	'catalog.rename': '↻',
	'job.start': '▷',
	'job.success': '✓',
	'job.failure': '✗',
	'source.fetch': '↓',
	'processor.read': '◆',
	'pipeline.step': '◆',
	'sink.load': '↑',
	'sink.execute': '►',
	'system.error': '⚠',
};

function isLevel(value: string): value is LogLevel {
	return value in LEVEL_ORDER;
}

/** Level of a phase; phases this logger does not know log at info. */
export function phaseLevel(phase: string): LogLevel {
	const levels: Record<string, LogLevel> = PHASE_LEVEL;
	return levels[phase] ?? 'info';
}

/** Whether an entry of `phase` passes the `level` threshold. Unknown levels let everything through. */
export function shouldLog(phase: string, level: string): boolean {
	if (!isLevel(level)) return true;
	return LEVEL_ORDER[phaseLevel(phase)] >= LEVEL_ORDER[level];
}

function palette(color: boolean): ChalkInstance {
	return new Chalk({ level: color ? 1 : 0 });
}

function colorPhase(c: ChalkInstance, phase: string, text: string): string {
	switch (phaseLevel(phase)) {
		case 'error':
			return c.red(text);
		case 'warn':
			return c.yellow(text);
		case 'debug':
			return c.dim(text);
		default:
			return phase === 'job.success' ? c.green(text) : c.cyan(text);
	}
}

function formatTime(timestamp: string): string {
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) return timestamp;
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * One line per entry:
 * `HH:MM:SS.mmm ✓ job.success job="sales - daily" rows=12 (42ms)`
 */
export function formatCompact(entry: LogEntry, color: boolean): string {
	const c = palette(color);
	const icons: Record<string, string> = PHASE_ICON;
	const icon = icons[entry.phase] ?? '·';

	const parts = [
		c.dim(formatTime(entry.timestamp)),
		colorPhase(c, entry.phase, `${icon} ${entry.phase}`),
	];

	if (entry.catalog_id) parts.push(`file=${entry.catalog_id}`);
	if (entry.job) parts.push(`job="${entry.job}"`);
	if (entry.source) parts.push(`src=${entry.source}`);
	if (entry.processor) parts.push(`proc=${entry.processor}`);
	if (entry.step) parts.push(`step=${entry.step}`);
	if (entry.sink) parts.push(`sink=${entry.sink}`);
	if (entry.rows !== undefined) parts.push(`rows=${entry.rows}`);
	if (entry.result) parts.push(`result=${entry.result}`);
	if (entry.error) {
		const kind = entry.error_kind ? `[${entry.error_kind}] ` : '';
		parts.push(c.red(`err=${kind}${entry.error}`));
	}
	if (entry.duration_ms !== undefined) parts.push(c.dim(`(${entry.duration_ms}ms)`));

	return parts.join(' ');
}

/** Compact line, followed by the entry metadata when asked for. */
export function formatVerbose(entry: LogEntry, color: boolean, showMetadata: boolean): string {
	const line = formatCompact(entry, color);
	if (!showMetadata || !entry.metadata || Object.keys(entry.metadata).length === 0) {
		return line;
	}
	const c = palette(color);
	const body = JSON.stringify(entry.metadata, null, 2)
		.split('\n')
		.map((l) => `    ${l}`)
		.join('\n');
	return `${line}\n${c.dim(`  metadata:\n${body}`)}`;
}
