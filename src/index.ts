// Plugin Workbench — Public API Surface
export { createCLI } from './cli/index.js';
export { ConfigLoader, parseConfig, resolveConfigPath } from './config/loader.js';
export { DEFAULT_CONFIG, CONFIG_FILENAME } from './config/defaults.js';
export { WorkbenchConfigSchema } from './config/schema.js';
export { Logger, logger } from './logging/logger.js';
export { HistoryStore } from './history/store.js';
export { ExecFileRunner, findGitRoot } from './utils/exec.js';
export * from './errors.js';
export * from './documents/index.js';
export * from './plugins/index.js';
export * from './evaluation/index.js';
export * from './linting/index.js';
export * from './gitlab/index.js';

// Types
export type { WorkbenchConfig } from './config/schema.js';
export type { LogLevel, LogSink } from './logging/logger.js';
export type { EvaluationRun, LintRun, AuditEvent, EvaluationRecord, LintRecord } from './history/store.js';
export type { CommandRunner, CommandResult, RunOptions } from './utils/exec.js';
