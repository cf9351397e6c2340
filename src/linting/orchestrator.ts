import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { CommandRunner } from '../utils/exec.js';
import { isDirectory, isFile } from '../utils/fs.js';
import { matchesPattern } from './patterns.js';
import type { CategorySummary, ExecutionMode, LinterTool, LintersConfig, LintReport, ToolRun } from './types.js';

/**
 * Command prefix per tool; the file path is appended
 */
export const TOOL_COMMANDS: Readonly<Record<string, readonly string[]>> = {
    'ruff format': ['uv', 'run', 'ruff', 'format'],
    'ruff check': ['uv', 'run', 'ruff', 'check'],
    mypy: ['uv', 'run', 'mypy'],
    pyright: ['uv', 'run', 'pyright'],
    bandit: ['uv', 'run', 'bandit'],
    prettier: ['npx', 'prettier', '--write'],
    eslint: ['npx', 'eslint'],
    markdownlint: ['npx', 'markdownlint-cli2', '--fix'],
    shellcheck: ['shellcheck'],
    shfmt: ['shfmt', '-w'],
};

const SKIPPED_DIRS = new Set(['.git', 'node_modules']);

/**
 * Files as given, directories walked recursively (sorted, VCS and
 * dependency directories skipped)
 */
export async function collectFiles(paths: string[]): Promise<string[]> {
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
        const entries = await readdir(dir, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (!SKIPPED_DIRS.has(entry.name)) await walk(full);
            } else if (entry.isFile()) {
                files.push(full);
            }
        }
    };

    for (const p of paths) {
        if (await isFile(p)) files.push(p);
        else if (await isDirectory(p)) await walk(p);
    }
    return files;
}

export interface OrchestratorOptions {
    runner: CommandRunner;
    /** Per-tool command overrides from configuration */
    commands?: Record<string, string[]>;
    timeoutMs?: number;
    cwd?: string;
    log?: Logger;
    /** Called after each tool run */
    onRun?: (run: ToolRun, category: 'formatter' | 'linter') => void;
}

/**
 * Lint Orchestrator — runs configured formatters, then linters, on files
 */
export class LintOrchestrator {
    private commands: Record<string, readonly string[]>;
    private log: Logger;

    constructor(private config: LintersConfig, private options: OrchestratorOptions) {
        this.commands = { ...TOOL_COMMANDS, ...options.commands };
        this.log = (options.log ?? rootLogger).child('lint');
    }

    commandFor(tool: string, file: string): string[] | null {
        const prefix = this.commands[tool];
        return prefix && prefix.length > 0 ? [...prefix, file] : null;
    }

    async run(files: string[], mode: ExecutionMode = 'all'): Promise<LintReport> {
        const report: LintReport = { formatters: [], linters: [] };

        if (mode !== 'lint-only') {
            report.formatters = await this.runTools(this.config.formatters, files, 'formatter');
        }
        if (mode !== 'format-only') {
            report.linters = await this.runTools(this.config.linters, files, 'linter');
        }
        return report;
    }

    private async runTools(tools: LinterTool[], files: string[], category: 'formatter' | 'linter'): Promise<ToolRun[]> {
        const runs: ToolRun[] = [];
        for (const file of files) {
            for (const tool of tools) {
                if (!matchesPattern(file, tool.patterns)) continue;

                const run = await this.runTool(tool.name, file);
                runs.push(run);
                this.options.onRun?.(run, category);
            }
        }
        return runs;
    }

    private async runTool(tool: string, file: string): Promise<ToolRun> {
        const command = this.commandFor(tool, file);
        if (!command) {
            this.log.warn(`Unknown tool: ${tool}`);
            return { tool, file, exitCode: 1, stdout: '', stderr: '', durationMs: 0, error: `Unknown tool: ${tool}` };
        }

        const [program = '', ...args] = command;
        this.log.debug(`Running ${command.join(' ')}`);
        const result = await this.options.runner.run(program, args, {
            cwd: this.options.cwd,
            timeoutMs: this.options.timeoutMs,
        });

        return {
            tool,
            file,
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
            durationMs: result.durationMs,
            ...(result.error ? { error: result.error } : {}),
        };
    }
}

export function isFailure(run: ToolRun): boolean {
    return run.exitCode !== 0 || run.error !== undefined;
}

function summarizeCategory(runs: ToolRun[]): CategorySummary {
    return {
        files: new Set(runs.map(r => r.file)).size,
        tools: new Set(runs.map(r => r.tool)).size,
        errors: runs.filter(isFailure).length,
    };
}

export function summarizeLint(report: LintReport): { formatters: CategorySummary; linters: CategorySummary; totalErrors: number } {
    const formatters = summarizeCategory(report.formatters);
    const linters = summarizeCategory(report.linters);
    return { formatters, linters, totalErrors: formatters.errors + linters.errors };
}
