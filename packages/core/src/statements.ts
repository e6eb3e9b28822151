/**
 * Statement storage: the SQL files that sink actions refer to by name.
 */

import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { ConfigurationError } from './errors.js';

export interface StatementStore {
	/** Text of a named statement. Throws ConfigurationError when missing. */
	read(name: string): Promise<string>;
}

/**
 * Statements read from a directory. Names are reduced to their base name,
 * so "sql/refresh.sql" and "refresh.sql" resolve to the same file.
 */
export class FileStatementStore implements StatementStore {
	constructor(readonly dir: string) {}

	async read(name: string): Promise<string> {
		const file = join(this.dir, basename(name));
		try {
			return await readFile(file, 'utf-8');
		} catch (err) {
			throw new ConfigurationError(`Statement file not found: ${file}`, { cause: err });
		}
	}
}

export class InMemoryStatementStore implements StatementStore {
	private readonly statements: Map<string, string>;

	constructor(statements?: Record<string, string>) {
		this.statements = new Map(Object.entries(statements ?? {}));
	}

	async read(name: string): Promise<string> {
		const text = this.statements.get(basename(name));
		if (text === undefined) {
			throw new ConfigurationError(`Statement file not found: ${basename(name)}`);
		}
		return text;
	}
}
