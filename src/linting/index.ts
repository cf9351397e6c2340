export type * from './types.js';
export {
    KNOWN_TOOLS,
    mapHookToLinter,
    matchesPattern,
    PYTHON_PATTERNS,
    PRETTIER_PATTERNS,
    ESLINT_PATTERNS,
    MARKDOWN_PATTERNS,
    SHELL_PATTERNS,
} from './patterns.js';
export {
    scanPreCommitConfig,
    scanPyproject,
    scanPackageJson,
    scanConfigFiles,
    detectPreCommitTool,
    checkGitHooks,
    discoverLinters,
} from './discovery.js';
export type { DiscoverOptions } from './discovery.js';
export {
    LINTERS_HEADING,
    generateLintersSection,
    findLintersSection,
    upsertLintersSection,
    parseToolLine,
    parseLintersSection,
} from './section.js';
export type { UpsertResult } from './section.js';
export { LintOrchestrator, TOOL_COMMANDS, collectFiles, isFailure, summarizeLint } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
