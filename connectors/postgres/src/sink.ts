/**
 * Postgres sink: loads datasets into tables and runs SQL statements.
 *
 * One pool per database: the base connection string serves jobs that name no
 * database, and a job's `database` override gets a pool of its own. Loads and
 * statements each run inside a single transaction.
 */

import type { Dataset, ExecuteOptions, LoadTarget, SinkConnector, SinkResult } from '@sluice/sdk';
import { createConfigParser } from '@sluice/sdk';
import type { SchemaObject } from 'ajv';
import pg from 'pg';
import {
	type SqlParam,
	createTableSql,
	dropTableSql,
	insertBatches,
	qualifiedName,
	withDatabase,
} from './sql.js';

export const DEFAULT_COLUMN_SIZE = 2500;

export interface PostgresSinkConfig {
	/** Environment variable holding the connection string */
	connection_env: string;
	/** Explicit connection string; wins over connection_env */
	connection_string?: string;
	/** Rows per INSERT statement */
	batch_size: number;
}

export const configSchema: SchemaObject = {
	type: 'object',
	properties: {
		connection_env: { type: 'string', minLength: 1, default: 'DATABASE_URL' },
		connection_string: { type: 'string', minLength: 1 },
		batch_size: { type: 'integer', minimum: 1, default: 1000 },
	},
	additionalProperties: false,
};

const parseConfig = createConfigParser<PostgresSinkConfig>('postgres', configSchema);

// ─── Pool seam ────────────────────────────────────────────────────────────────

export interface SqlClient {
	query(text: string, values?: SqlParam[]): Promise<{ rowCount: number | null }>;
	release(): void;
}

export interface SqlPool {
	connect(): Promise<SqlClient>;
	end(): Promise<void>;
}

export type PoolFactory = (connectionString: string) => SqlPool;

/** Pool factory backed by node-postgres */
export function createPgPool(connectionString: string): SqlPool {
	const pool = new pg.Pool({ connectionString });

	pool.on('error', (err: Error) => {
		console.error('[postgres] unexpected error on idle client', err);
	});

	return {
		async connect() {
			const client = await pool.connect();
			return {
				async query(text, values) {
					const result = await client.query(text, values);
					return { rowCount: result.rowCount };
				},
				release: () => client.release(),
			};
		},
		end: () => pool.end(),
	};
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

// ─── Sink ─────────────────────────────────────────────────────────────────────

export class PostgresSink implements SinkConnector {
	readonly id = 'postgres';
	private config: PostgresSinkConfig | null = null;
	private readonly pools = new Map<string, SqlPool>();

	constructor(private readonly createPool: PoolFactory = createPgPool) {}

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = parseConfig(config);
	}

	async load(dataset: Dataset, target: LoadTarget): Promise<SinkResult> {
		try {
			const affected = await this.withTransaction(target.database, async (client) => {
				const name = qualifiedName(target.table, target.schema);
				if (target.mode === 'replace') {
					await client.query(dropTableSql(name));
				}
				await client.query(
					createTableSql(name, dataset.columns, target.columnSize ?? DEFAULT_COLUMN_SIZE, target.mode === 'append'),
				);

				let inserted = 0;
				for (const batch of insertBatches(name, dataset.columns, dataset.rows, this.requireConfig().batch_size)) {
					await client.query(batch.text, batch.values);
					inserted += batch.rows;
				}
				return inserted;
			});
			return { status: 'ok', affected };
		} catch (err) {
			return { status: 'error', error: toError(err) };
		}
	}

	async execute(statement: string, options?: ExecuteOptions): Promise<SinkResult> {
		try {
			const result = await this.withTransaction(options?.database, (client) => client.query(statement));
			return { status: 'ok', affected: result.rowCount ?? undefined };
		} catch (err) {
			return { status: 'error', error: toError(err) };
		}
	}

	async shutdown(): Promise<void> {
		const pools = [...this.pools.values()];
		this.pools.clear();
		await Promise.all(pools.map((pool) => pool.end()));
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private requireConfig(): PostgresSinkConfig {
		if (!this.config) throw new Error('postgres sink used before init()');
		return this.config;
	}

	/** The connection string is only required once a job actually uses the sink. */
	private connectionString(): string {
		const config = this.requireConfig();
		const value = config.connection_string ?? process.env[config.connection_env];
		if (!value) {
			throw new Error(`Environment variable ${config.connection_env} is not set`);
		}
		return value;
	}

	private pool(database: string | undefined): SqlPool {
		const key = database ?? '';
		let pool = this.pools.get(key);
		if (!pool) {
			pool = this.createPool(withDatabase(this.connectionString(), database));
			this.pools.set(key, pool);
		}
		return pool;
	}

	private async withTransaction<T>(database: string | undefined, fn: (client: SqlClient) => Promise<T>): Promise<T> {
		const client = await this.pool(database).connect();
		try {
			await client.query('BEGIN');
			try {
				const result = await fn(client);
				await client.query('COMMIT');
				return result;
			} catch (err) {
				try {
					await client.query('ROLLBACK');
				} catch (rollbackErr) {
					console.error('[postgres] failed to rollback transaction', rollbackErr);
				}
				throw err;
			}
		} finally {
			client.release();
		}
	}
}
