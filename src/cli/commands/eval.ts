import { Command, Option } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { EvaluationError } from '../../errors.js';
import { createConnection } from '../../evaluation/connection.js';
import { loadEvaluationFile } from '../../evaluation/dataset.js';
import { AnthropicModelClient } from '../../evaluation/model.js';
import { renderReport, summarizeResults } from '../../evaluation/report.js';
import { EvaluationRunner } from '../../evaluation/runner.js';
import { TRANSPORT_KINDS, buildServerConfig, type TransportKind } from '../../evaluation/server-config.js';
import type { TaskResult } from '../../evaluation/types.js';
import { collect, loadContext, parsePositiveInt, runAction, withHistory } from '../context.js';
import { Spinner } from '../ui/spinner.js';
import { truncate } from '../ui/render.js';

interface EvalOptions {
    transport: TransportKind;
    model?: string;
    command?: string;
    args?: string[];
    env: string[];
    url?: string;
    header: string[];
    output?: string;
    maxTurns?: number;
}

export function createEvalCommand(): Command {
    return new Command('eval')
        .description('Evaluate an MCP server by having a model answer questions with its tools')
        .argument('<file>', 'Evaluation XML file of <qa_pair> entries')
        .addOption(new Option('-t, --transport <kind>', 'Server transport').choices(TRANSPORT_KINDS).default('stdio'))
        .option('-m, --model <model>', 'Model to evaluate with (default from config)')
        .option('-c, --command <command>', 'Server command (stdio)')
        .option('-a, --args <args...>', 'Server arguments (stdio)')
        .option('-e, --env <KEY=VALUE>', 'Server environment variable (stdio, repeatable)', collect, [])
        .option('-u, --url <url>', 'Server URL (sse, http)')
        .option('-H, --header <"Name: value">', 'Request header (sse, http, repeatable)', collect, [])
        .option('-o, --output <file>', 'Write the report to a file instead of stdout')
        .option('--max-turns <n>', 'Model turns allowed per question', parsePositiveInt)
        .action(runAction(async (file: string, opts: EvalOptions) => {
            const ctx = await loadContext();
            const serverConfig = buildServerConfig({
                transport: opts.transport,
                command: opts.command,
                args: opts.args,
                env: opts.env,
                url: opts.url,
                headers: opts.header,
            });

            const pairs = await loadEvaluationFile(path.resolve(file));
            if (pairs.length === 0) {
                throw new EvaluationError(`No <qa_pair> entries found in ${file}`);
            }

            const model = opts.model ?? ctx.config.evaluation.model;
            const spinner = new Spinner();
            const connection = await spinner.track(
                `Connecting to ${opts.transport} MCP server`,
                () => createConnection(serverConfig)
            );

            const started = performance.now();
            let results: TaskResult[];
            try {
                const runner = new EvaluationRunner(new AnthropicModelClient(), connection, {
                    model,
                    maxTokens: ctx.config.evaluation.maxTokens,
                    maxTurns: opts.maxTurns ?? ctx.config.evaluation.maxTurns,
                    onProgress: ({ index, total, pair, result }) => {
                        const label = `Task ${index + 1}/${total}: ${truncate(pair.question, 50)}`;
                        if (!result) spinner.start(label);
                        else if (result.score === 1) spinner.success(label);
                        else spinner.fail(result.error ? `${label} (${truncate(result.error, 40)})` : label);
                    },
                });
                results = await runner.run(pairs);
            } finally {
                spinner.stop();
                await connection.close();
            }

            const report = renderReport(results);
            const reportPath = opts.output ? path.resolve(opts.output) : undefined;
            if (reportPath) {
                await writeFile(reportPath, report, 'utf-8');
                console.log(chalk.green(`\n✓ Report saved to ${reportPath}`));
            } else {
                console.log(report);
            }

            const summary = summarizeResults(results);
            withHistory(ctx, store => store.recordEvaluation({
                file: path.resolve(file),
                model,
                transport: opts.transport,
                total: summary.total,
                correct: summary.correct,
                durationSeconds: (performance.now() - started) / 1000,
                reportPath,
            }));

            const colour = summary.correct === summary.total ? chalk.green : chalk.yellow;
            console.error(colour(`Accuracy: ${summary.correct}/${summary.total} (${summary.accuracy.toFixed(1)}%)`));
            if (summary.correct < summary.total) process.exitCode = 1;
        }));
}
