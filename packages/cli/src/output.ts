/**
 * Terminal output for the sluice CLI.
 *
 * Messages go through one gate that honors --json, --quiet and --verbose.
 * Run summaries, selection plans and validation reports are rendered here
 * as plain lines (`format*`) and printed by the matching `print*` helper.
 */

import type { JobOutcome, RunSummary, Selection } from '@sluice/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { RecordReport } from './commands/validate.js';

/** `result` lines go to stdout and are kept under --quiet */
type Level = 'info' | 'verbose' | 'result' | 'warn' | 'error';

const mode = { json: false, quiet: false, verbose: false };

export function setJsonMode(enabled: boolean): void {
	mode.json = enabled;
}

export function setQuietMode(enabled: boolean): void {
	mode.quiet = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	mode.verbose = enabled;
}

export function isJsonMode(): boolean {
	return mode.json;
}

/** Errors survive --quiet; nothing but JSON is written under --json. */
function shown(level: Level): boolean {
	if (mode.json) return false;
	if (level === 'error' || level === 'result') return true;
	if (mode.quiet) return false;
	return level !== 'verbose' || mode.verbose;
}

function emit(level: Level, lines: readonly string[]): void {
	if (!shown(level)) return;
	const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
	for (const line of lines) write(line);
}

export function info(message: string): void {
	emit('info', [message]);
}

export function success(message: string): void {
	emit('info', [chalk.green(`  ✓ ${message}`)]);
}

export function error(message: string): void {
	emit('error', [chalk.red(`  ✗ ${message}`)]);
}

export function warn(message: string): void {
	emit('warn', [chalk.yellow(`  ! ${message}`)]);
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

export function spinner(text: string): Ora {
	if (!shown('info')) return ora({ text, isSilent: true });
	return ora({ text, color: 'cyan' }).start();
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface TableColumn<K extends string = string> {
	header: string;
	key: K;
	align?: 'left' | 'right';
	/** Styles a cell after padding, so color codes never skew the widths */
	style?: (padded: string, raw: string) => string;
}

export function formatTable<K extends string>(
	columns: readonly TableColumn<K>[],
	rows: readonly Record<K, string>[],
): string[] {
	const widths = columns.map((col) =>
		rows.reduce((max, row) => Math.max(max, row[col.key].length), col.header.length),
	);
	const lines = [chalk.dim(`  ${columns.map((col, i) => col.header.padEnd(widths[i])).join('  ')}`.trimEnd())];
	for (const row of rows) {
		const cells = columns.map((col, i) => {
			const raw = row[col.key];
			const padded = col.align === 'right' ? raw.padStart(widths[i]) : raw.padEnd(widths[i]);
			return col.style ? col.style(padded, raw) : padded;
		});
		lines.push(`  ${cells.join('  ')}`.trimEnd());
	}
	return lines;
}

/** Print rows as a table, or as a JSON array under --json. */
export function table<K extends string>(columns: readonly TableColumn<K>[], rows: readonly Record<K, string>[]): void {
	if (mode.json) {
		json(rows);
		return;
	}
	emit('info', formatTable(columns, rows));
}

// ─── Run summary ─────────────────────────────────────────────────────────────

type OutcomeKey = 'file' | 'job' | 'rows' | 'time' | 'status';

const OUTCOME_COLUMNS: TableColumn<OutcomeKey>[] = [
	{ header: 'FILE', key: 'file' },
	{ header: 'JOB', key: 'job' },
	{ header: 'ROWS', key: 'rows', align: 'right' },
	{ header: 'TIME', key: 'time', align: 'right' },
	{
		header: 'STATUS',
		key: 'status',
		style: (padded, raw) => (raw === 'ok' ? chalk.green(padded) : chalk.red(padded)),
	},
];

function outcomeRow(outcome: JobOutcome): Record<OutcomeKey, string> {
	return {
		file: outcome.catalogId,
		job: outcome.job,
		rows: String(outcome.rows),
		time: `${outcome.durationMs}ms`,
		status: outcome.status === 'success' ? 'ok' : 'failed',
	};
}

/** Where and why a failed job stopped, e.g. "sales [load/database]: timeout" */
export function describeFailure(outcome: JobOutcome): string {
	return `${outcome.job} [${outcome.stage ?? 'unknown'}/${outcome.errorKind ?? 'error'}]: ${outcome.detail ?? ''}`;
}

export function formatRunSummary(summary: RunSummary): string[] {
	const lines = ['', chalk.bold(`Run ${summary.runId} (${summary.mode})`)];
	if (summary.outcomes.length === 0) {
		lines.push('  No jobs selected.');
	} else {
		lines.push(...formatTable(OUTCOME_COLUMNS, summary.outcomes.map(outcomeRow)));
	}
	return lines;
}

export function printRunSummary(summary: RunSummary): void {
	if (mode.json) {
		json(summary);
		return;
	}
	emit('info', formatRunSummary(summary));

	const failures = summary.outcomes.filter((o) => o.status === 'failure');
	if (failures.length > 0) {
		emit('info', [chalk.bold.dim('\n  Failures:')]);
		for (const failure of failures) error(describeFailure(failure));
	}
	emit('verbose', summary.renamed.map((r) => chalk.dim(`  … renamed ${r.from} → ${r.to}`)));
	for (const warning of summary.warnings) warn(warning);

	emit('info', ['']);
	const totals = `${summary.succeeded} succeeded, ${summary.failed} failed in ${summary.durationMs}ms`;
	if (summary.failed > 0) {
		error(totals);
	} else {
		success(totals);
	}
}

// ─── Selection plan ──────────────────────────────────────────────────────────

type SelectedRecord = Selection['entries'][number]['records'][number];

function recordLabel(record: SelectedRecord): string {
	return record.ok ? record.job.name : `${record.label} (invalid)`;
}

export function formatSelectionPlan(selection: Selection): string[] {
	const lines = [chalk.bold(`Selection: ${selection.mode}`)];
	if (selection.entries.length === 0) lines.push('  Nothing to run.');
	for (const entry of selection.entries) {
		lines.push(chalk.bold.dim(`\n  ${entry.id} [${entry.tag}]:`));
		for (const record of entry.records) lines.push(`    ${recordLabel(record)}`);
	}
	return lines;
}

export function printSelectionPlan(selection: Selection): void {
	if (mode.json) {
		json({
			mode: selection.mode,
			entries: selection.entries.map((e) => ({ id: e.id, tag: e.tag, jobs: e.records.map(recordLabel) })),
			warnings: selection.warnings.map((w) => w.message),
		});
		return;
	}
	emit('info', formatSelectionPlan(selection));
	for (const warning of selection.warnings) warn(warning.message);
}

// ─── Validation report ───────────────────────────────────────────────────────

function validationLine(report: RecordReport): string {
	return report.problems.length === 0
		? `${chalk.green('✓')} ${report.file}: ${report.job}`
		: `${chalk.red('✗')} ${report.file}: ${report.job}: ${report.problems.join('; ')}`;
}

function validationTotals(reports: readonly RecordReport[]): string {
	const invalid = reports.filter((r) => r.problems.length > 0).length;
	return `${reports.length - invalid} valid, ${invalid} invalid`;
}

export function formatValidationReport(reports: readonly RecordReport[]): string[] {
	return [...reports.map(validationLine), '', validationTotals(reports)];
}

export function printValidationReport(reports: readonly RecordReport[]): void {
	if (mode.json) {
		json({ valid: reports.every((r) => r.problems.length === 0), records: reports });
		return;
	}
	for (const report of reports) {
		emit(report.problems.length === 0 ? 'info' : 'result', [validationLine(report)]);
	}
	emit('info', ['', validationTotals(reports)]);
}
