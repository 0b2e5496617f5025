/**
 * Library entry point for the A2A supervisor.
 *
 * Exposes the workflow dispatcher, the task state store, the classifier,
 * the A2A client and server, the worker agent registry and configuration.
 */

export * from './workflow/index.js';
export type { TaskState } from './workflow/index.js';
export * from './a2a/index.js';
export * from './agents/index.js';
export { Config, type ConfigLoadOptions } from './config/index.js';
export { loadConfigFile, resolveConfig, findConfigFile } from './config/loader.js';
export type { ResolvedConfig, SupervisorFileConfig } from './config/types.js';
export * from './runners/index.js';
export * from './utils/errors.js';
export { ErrorCategory, classifyError, handleError } from './utils/error-handler.js';
export { createLogger, initLogger, type LogLevel, type LoggerConfig } from './utils/logger.js';
