/**
 * @sluice/connector-postgres: PostgreSQL sink registration.
 */

import type { ConnectorRegistration } from '@sluice/sdk';
import { PostgresSink, configSchema } from './sink.js';

export default function register(): ConnectorRegistration {
	return {
		id: 'postgres',
		sink: PostgresSink,
		configSchema,
		env_vars: ['DATABASE_URL'],
	};
}

export { PostgresSink, createPgPool } from './sink.js';
export type { PoolFactory, PostgresSinkConfig, SqlClient, SqlPool } from './sink.js';
export * from './sql.js';
