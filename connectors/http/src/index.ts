/**
 * @sluice/connector-http: HTTP source registration.
 *
 * The url and header values may reference environment variables
 * (`Authorization: Bearer ${API_TOKEN}`).
 */

import type { ConnectorRegistration } from '@sluice/sdk';
import { HttpSource, configSchema } from './source.js';

export default function register(): ConnectorRegistration {
	return {
		id: 'http',
		source: HttpSource,
		configSchema,
		env_vars: [],
	};
}

export { HttpSource, recordsAt } from './source.js';
export type { HttpSourceConfig } from './source.js';
