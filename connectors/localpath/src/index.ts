/**
 * @sluice/connector-localpath: local file source registration.
 *
 * No env vars required: the file path comes from the job's downloader block.
 */

import type { ConnectorRegistration } from '@sluice/sdk';
import { LocalPathSource, configSchema } from './source.js';

export default function register(): ConnectorRegistration {
	return {
		id: 'localpath',
		source: LocalPathSource,
		configSchema,
		env_vars: [],
	};
}

export { LocalPathSource } from './source.js';
export type { LocalPathConfig } from './source.js';
