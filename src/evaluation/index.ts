export type * from './types.js';
export {
    McpServerConfigSchema,
    StdioServerConfigSchema,
    SseServerConfigSchema,
    HttpServerConfigSchema,
    transportOf,
    parseEnvPairs,
    parseHeaders,
    buildServerConfig,
    TRANSPORT_KINDS,
} from './server-config.js';
export type { McpServerConfig, StdioServerConfig, SseServerConfig, HttpServerConfig, TransportKind, ServerFlags } from './server-config.js';
export { parseEvaluationFile, loadEvaluationFile } from './dataset.js';
export { McpConnection, connectTransport, createConnection, createTransport, flattenContent } from './connection.js';
export { AnthropicModelClient } from './model.js';
export { runAgentLoop, EVALUATION_PROMPT } from './agent-loop.js';
export type { AgentLoopOptions, AgentLoopResult, ToolExecutor } from './agent-loop.js';
export { EvaluationRunner, evaluateTask, extractTag } from './runner.js';
export type { EvaluationRunnerOptions, ProgressCallback, ToolSource } from './runner.js';
export { renderReport, summarizeResults } from './report.js';
export type { EvaluationSummary } from './report.js';
