/**
 * CV ranking pipelines
 */

export * from './ranking';
export * from './shared/llm';
export * from './shared/errors';
export { createComponentLogger, loggers } from './shared/logging/logger';
