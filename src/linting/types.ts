/**
 * Linting — Types
 */

export interface LinterTool {
    name: string;
    patterns: string[];
    isFormatter: boolean;
    isLinter: boolean;
}

export type PreCommitTool = 'pre-commit' | 'husky' | 'manual';

export interface ProjectLinters {
    gitHooksEnabled: boolean;
    preCommitTool: PreCommitTool | null;
    formatters: LinterTool[];
    linters: LinterTool[];
}

/**
 * Tools listed in a project's LINTERS section
 */
export interface LintersConfig {
    formatters: LinterTool[];
    linters: LinterTool[];
}

export type ExecutionMode = 'all' | 'format-only' | 'lint-only';

export interface ToolRun {
    tool: string;
    file: string;
    exitCode: number;
    stdout: string;
    stderr: string;
    durationMs: number;
    /** The tool could not be started or has no known command */
    error?: string;
}

export interface CategorySummary {
    files: number;
    tools: number;
    errors: number;
}

export interface LintReport {
    formatters: ToolRun[];
    linters: ToolRun[];
}
