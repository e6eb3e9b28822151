/**
 * @sluice/sdk: public API.
 */

export type {
	CellValue,
	CleaningStepSpec,
	Dataset,
	JobDefinition,
	LoadTarget,
	LogEntry,
	LogPhase,
	PluginSelection,
	ProcessorSelection,
	Row,
	SinkAction,
	StatementRef,
	StepParams,
	WriteMode,
} from './types.js';

export {
	cellOf,
	concatDatasets,
	createRow,
	datasetFromMatrix,
	datasetFromRecords,
	emptyDataset,
	isCellValue,
	isConsistent,
	toCellValue,
	uniqueColumnNames,
} from './dataset.js';

export type {
	ConnectorRegistration,
	ExecuteOptions,
	SinkConnector,
	SinkResult,
	SourceConnector,
	SourceContext,
	SourceOutput,
} from './connector.js';

export type { Processor, ProcessorRegistration } from './processor.js';

export type { Logger, LoggerRegistration } from './logger.js';

export { createConfigParser, expandEnv } from './config.js';
export type { ConfigParser } from './config.js';

export { DOWNLOAD_NAMING_PROPERTIES, buildDownloadPath, downloadFolder, formatTimestamp } from './download.js';
export type { DownloadNaming, DownloadPathOptions } from './download.js';

export { closeHttpAgent, createHttpAgent, fetchWithAgent } from './http.js';
export type { HttpAgent, HttpAgentOptions } from './http.js';

export {
	MockLogger,
	MockProcessor,
	MockSink,
	MockSource,
	createTestDataset,
	createTestJob,
} from './testing.js';
