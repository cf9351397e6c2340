import { Command, Option } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { loadContext, parsePositiveInt, runAction, withHistory } from '../context.js';
import { renderHeading } from '../ui/render.js';

type HistoryKind = 'eval' | 'lint' | 'audit';

export function createHistoryCommand(): Command {
    return new Command('history')
        .description('Show recorded evaluation and lint runs')
        .option('-l, --limit <n>', 'Max entries', parsePositiveInt, 20)
        .addOption(new Option('-k, --kind <kind>', 'Only this kind of entry').choices(['eval', 'lint', 'audit']))
        .action(runAction(async (opts: { limit: number; kind?: HistoryKind }) => {
            const ctx = await loadContext();
            const show = (kind: HistoryKind): boolean => !opts.kind || opts.kind === kind;

            withHistory(ctx, store => {
                if (show('eval')) {
                    const runs = store.listEvaluations(opts.limit);
                    renderHeading(`📊 Evaluations (${runs.length})`);
                    for (const run of runs) {
                        const pct = run.total > 0 ? ((run.correct / run.total) * 100).toFixed(1) : '0.0';
                        const colour = run.correct === run.total ? chalk.green : chalk.yellow;
                        console.log(
                            `  ${chalk.dim(`#${run.id}`)} ${chalk.dim(run.created_at)} ` +
                            `${colour(`${run.correct}/${run.total} (${pct}%)`)} ${path.basename(run.file)}`
                        );
                        console.log(chalk.dim(`      ${run.model} via ${run.transport}, ${run.duration_seconds.toFixed(1)}s`));
                    }
                }

                if (show('lint')) {
                    const runs = store.listLintRuns(opts.limit);
                    renderHeading(`🧹 Lint runs (${runs.length})`);
                    for (const run of runs) {
                        const errors = run.errors > 0 ? chalk.red(`${run.errors} errors`) : chalk.green('clean');
                        console.log(`  ${chalk.dim(`#${run.id}`)} ${chalk.dim(run.created_at)} ${run.mode} ${run.files} files, ${errors}`);
                    }
                }

                if (show('audit')) {
                    const events = store.getAuditLog(opts.limit);
                    renderHeading(`📜 Audit log (${events.length})`);
                    for (const event of events) {
                        console.log(`  ${chalk.dim(event.created_at)} ${chalk.magenta(event.event_type)} ${event.details ?? ''}`);
                    }
                }
            });
            console.log();
        }));
}
