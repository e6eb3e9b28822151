/**
 * @sluice/connector-localfolder: local folder source registration.
 */

import type { ConnectorRegistration } from '@sluice/sdk';
import { LocalFolderSource, configSchema } from './source.js';

export default function register(): ConnectorRegistration {
	return {
		id: 'localfolder',
		source: LocalFolderSource,
		configSchema,
		env_vars: [],
	};
}

export { LocalFolderSource } from './source.js';
export type { LocalFolderConfig } from './source.js';
