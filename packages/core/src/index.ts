/**
 * @sluice/core: job selection, cleaning pipeline, and orchestration.
 */

export * from './errors.js';
export * from './priority.js';
export * from './schema.js';
export * from './job.js';
export * from './catalog.js';
export * from './selector.js';
export * from './statements.js';
export * from './pipeline.js';
export * from './steps/index.js';
export { LoggerManager } from './logger.js';
export * from './orchestrator.js';
