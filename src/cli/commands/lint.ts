import { Command } from 'commander';
import chalk from 'chalk';
import { watch } from 'chokidar';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { LintConfigError, WorkbenchError, errorMessage } from '../../errors.js';
import { discoverLinters } from '../../linting/discovery.js';
import { LintOrchestrator, collectFiles, isFailure, summarizeLint } from '../../linting/orchestrator.js';
import { generateLintersSection, parseLintersSection, upsertLintersSection } from '../../linting/section.js';
import type { CategorySummary, ExecutionMode, LintersConfig, ToolRun } from '../../linting/types.js';
import { ExecFileRunner } from '../../utils/exec.js';
import { isNotFound } from '../../utils/fs.js';
import { loadContext, runAction, withHistory, type CliContext } from '../context.js';
import { renderError } from '../ui/render.js';

async function readOptional(file: string): Promise<string | null> {
    try {
        return await readFile(file, 'utf-8');
    } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
    }
}

async function readLintersConfig(ctx: CliContext, configFile?: string): Promise<LintersConfig> {
    const file = ctx.resolve(configFile ?? ctx.config.linting.configFile);
    const content = await readOptional(file);
    if (content === null) {
        throw new LintConfigError(`${file} not found; run \`workbench lint discover\` first`);
    }
    return parseLintersSection(content);
}

function orchestrator(ctx: CliContext, config: LintersConfig): LintOrchestrator {
    return new LintOrchestrator(config, {
        runner: new ExecFileRunner(),
        commands: ctx.config.linting.commands,
        timeoutMs: ctx.config.linting.timeoutMs,
        cwd: ctx.root,
        onRun: renderRun,
    });
}

function renderRun(run: ToolRun): void {
    const file = path.relative(process.cwd(), run.file) || run.file;
    if (!isFailure(run)) {
        console.log(`  ${chalk.green('✓')} ${chalk.dim(run.tool)} ${file}`);
        return;
    }

    console.log(`  ${chalk.red('✗')} ${run.tool} ${file}${run.error ? chalk.red(` (${run.error})`) : ''}`);
    const output = `${run.stdout}${run.stderr}`.trim();
    if (output) {
        console.log(chalk.dim(output.split('\n').map(line => `      ${line}`).join('\n')));
    }
}

function renderCategory(label: string, summary: CategorySummary): void {
    const errors = summary.errors > 0 ? chalk.red(`${summary.errors} errors`) : chalk.green('0 errors');
    console.log(`  ${label}: ${summary.files} files, ${summary.tools} tools, ${errors}`);
}

function modeFrom(opts: { formatOnly?: boolean; lintOnly?: boolean }): ExecutionMode {
    if (opts.formatOnly && opts.lintOnly) {
        throw new WorkbenchError('--format-only and --lint-only cannot be used together');
    }
    if (opts.formatOnly) return 'format-only';
    return opts.lintOnly ? 'lint-only' : 'all';
}

export function createLintCommand(): Command {
    const cmd = new Command('lint')
        .description('Discover and run a project\'s formatters and linters');

    // ─── Discover ───
    cmd.command('discover')
        .description('Detect linting tools and write the LINTERS section')
        .option('-o, --output <file>', 'Instructions file to update (default from config)')
        .option('-f, --force', 'Replace an existing LINTERS section')
        .action(runAction(async (opts: { output?: string; force?: boolean }) => {
            const ctx = await loadContext();
            const linters = await discoverLinters(ctx.root, { git: new ExecFileRunner() });
            const section = generateLintersSection(linters);

            const target = ctx.resolve(opts.output ?? ctx.config.linting.configFile);
            const result = upsertLintersSection(await readOptional(target), section, opts.force ?? false);

            if (!result.updated) {
                console.log(chalk.yellow(`⚠ ${path.basename(target)} already has a LINTERS section:\n`));
                console.log(chalk.dim(result.existingSection ?? ''));
                console.log(chalk.dim('\n  Re-run with --force to replace it.'));
                return;
            }

            await writeFile(target, result.content, 'utf-8');
            console.log(chalk.green(`✓ Wrote LINTERS section to ${target}`));
            console.log(chalk.dim(
                `  ${linters.formatters.length} formatters, ${linters.linters.length} linters, ` +
                `pre-commit tool: ${linters.preCommitTool ?? 'none'}`
            ));
        }));

    // ─── Run ───
    cmd.command('run')
        .description('Run formatters, then linters, on files and directories')
        .argument('<paths...>', 'Files or directories to check')
        .option('-c, --config <file>', 'File holding the LINTERS section (default from config)')
        .option('--format-only', 'Run formatters only')
        .option('--lint-only', 'Run linters only')
        .action(runAction(async (paths: string[], opts: { config?: string; formatOnly?: boolean; lintOnly?: boolean }) => {
            const mode = modeFrom(opts);
            const ctx = await loadContext();
            const config = await readLintersConfig(ctx, opts.config);
            const files = await collectFiles(paths.map(p => path.resolve(p)));

            const report = await orchestrator(ctx, config).run(files, mode);
            const summary = summarizeLint(report);

            console.log();
            if (mode !== 'lint-only') renderCategory('Formatters', summary.formatters);
            if (mode !== 'format-only') renderCategory('Linters', summary.linters);

            withHistory(ctx, store => store.recordLint({ mode, files: files.length, errors: summary.totalErrors }));
            if (summary.totalErrors > 0) process.exitCode = 1;
        }));

    // ─── Watch ───
    cmd.command('watch')
        .description('Lint files as they change')
        .argument('<paths...>', 'Files or directories to watch')
        .option('-c, --config <file>', 'File holding the LINTERS section (default from config)')
        .action(runAction(async (paths: string[], opts: { config?: string }) => {
            const ctx = await loadContext();
            const runner = orchestrator(ctx, await readLintersConfig(ctx, opts.config));

            const lintFile = async (file: string): Promise<void> => {
                const summary = summarizeLint(await runner.run([path.resolve(file)]));
                if (summary.totalErrors > 0) {
                    console.log(chalk.red(`  ${summary.totalErrors} problem(s) in ${file}`));
                }
            };
            const onChange = (file: string): void => {
                lintFile(file).catch(err => renderError(errorMessage(err)));
            };

            const watcher = watch(paths, {
                ignoreInitial: true,
                ignored: /(^|[/\\])(\.git|node_modules)([/\\]|$)/,
            });
            watcher.on('add', onChange).on('change', onChange);

            console.log(chalk.cyan(`👀 Watching ${paths.join(', ')} (Ctrl+C to stop)`));
            await new Promise<void>(resolve => {
                process.once('SIGINT', () => {
                    watcher.close().then(resolve, resolve);
                });
            });
        }));

    return cmd;
}
